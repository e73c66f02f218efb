import { ClientError } from "graphql-request";
import { ZodError } from "zod";
import type { FetchError } from "../../types";
import { UpstreamPayloadError, UpstreamStatusError } from "../graphql/graphqlRequest";

const describeCause = (error: unknown): string => {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : "";

    return `${error.name}: ${error.message}${cause}`;
  }

  return String(error);
};

const clientErrorMessage = (error: ClientError): string => {
  const messages = (error.response.errors ?? []).map((entry) => entry.message);

  return messages.length > 0
    ? messages.join("; ")
    : `GraphQL request failed with status ${error.response.status}`;
};

const findUpstreamError = (
  error: unknown,
): ClientError | UpstreamStatusError | UpstreamPayloadError | ZodError | null => {
  let current: unknown = error;

  // Walk `cause` in case the client library wraps transport rejections.
  for (let depth = 0; depth < 4 && current instanceof Error; depth += 1) {
    if (
      current instanceof ClientError ||
      current instanceof UpstreamStatusError ||
      current instanceof UpstreamPayloadError ||
      current instanceof ZodError
    ) {
      return current;
    }

    current = current.cause;
  }

  return null;
};

// Anything the API actually answered is final. Everything else is treated
// as a transport failure and may be retried.
export const isTransportFailure = (error: unknown): boolean =>
  findUpstreamError(error) === null;

export const toFetchError = (error: unknown): FetchError => {
  const upstream = findUpstreamError(error);

  if (upstream instanceof ClientError) {
    return {
      kind: "ApiError",
      message: clientErrorMessage(upstream),
      status: upstream.response.status,
    };
  }

  if (upstream instanceof UpstreamStatusError || upstream instanceof UpstreamPayloadError) {
    return { kind: "ApiError", message: upstream.message, status: upstream.status };
  }

  if (upstream instanceof ZodError) {
    const issue = upstream.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";

    return {
      kind: "ApiError",
      message: `Unexpected response shape${where}: ${issue?.message ?? "invalid payload"}`,
    };
  }

  return { kind: "NetworkUnreachable", detail: describeCause(error) };
};
