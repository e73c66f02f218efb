import type { TypedDocumentNode } from "@graphql-typed-document-node/core";
import { print } from "graphql";
import { gql, GraphQLClient, type Variables } from "graphql-request";

export { gql };

export type Transport = (
  input: string | URL | Request,
  init?: RequestInit,
) => Promise<Response>;

export class UpstreamStatusError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = "UpstreamStatusError";
  }
}

// A 2xx answer whose body is not a JSON object (proxy pages, truncated bodies).
export class UpstreamPayloadError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = "UpstreamPayloadError";
  }
}

const isJsonObject = (body: string): boolean => {
  try {
    const parsed: unknown = JSON.parse(body);

    return typeof parsed === "object" && parsed !== null;
  } catch {
    return false;
  }
};

const extractUpstreamMessage = (body: string): string | null => {
  try {
    const parsed: unknown = JSON.parse(body);

    if (typeof parsed !== "object" || parsed === null) return null;

    if ("errors" in parsed && Array.isArray(parsed.errors)) {
      const messages = parsed.errors
        .map((entry: unknown) =>
          typeof entry === "object" &&
          entry !== null &&
          "message" in entry &&
          typeof entry.message === "string"
            ? entry.message
            : null,
        )
        .filter((message): message is string => message !== null);

      if (messages.length > 0) return messages.join("; ");
    }

    if ("message" in parsed && typeof parsed.message === "string") {
      return parsed.message;
    }

    return null;
  } catch {
    return body.trim() || null;
  }
};

// Every attempt gets a fresh abort timer. Once a response has arrived, any
// failure is raised here as an upstream error so it is never retried.
const withTimeoutAndStatus = (transport: Transport, timeoutMs: number): Transport =>
  async (input, init) => {
    const response = await transport(input, {
      ...init,
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (!response.ok) {
      const text = await response.text();
      const upstream = extractUpstreamMessage(text);

      throw new UpstreamStatusError(
        response.status,
        upstream ?? `${response.status} ${response.statusText}`.trim(),
      );
    }

    const text = await response.text();

    if (!isJsonObject(text)) {
      const contentType = response.headers.get("content-type") ?? "unknown content type";

      throw new UpstreamPayloadError(
        response.status,
        `Unreadable response body (${contentType})`,
      );
    }

    return new Response(text, {
      status: response.status,
      statusText: response.statusText,
      headers: response.headers,
    });
  };

export const graphqlRequest = async <
  TData,
  TVariables extends Variables = Variables,
>(params: {
  url: string;
  document: TypedDocumentNode<TData, TVariables>;
  variables: TVariables;
  fetch?: Transport;
  timeoutMs: number;
}): Promise<TData> => {
  const client = new GraphQLClient(params.url, {
    fetch: withTimeoutAndStatus(params.fetch ?? globalThis.fetch, params.timeoutMs),
  });

  const query = print(params.document);

  return client.request<TData, Variables>(query, params.variables);
};
