import type { Transport } from "../../../src/resolvers/graphql/graphqlRequest";

export interface MockRequest {
  url: string;
  body: unknown;
}

export type MockFetchHandler = (request: MockRequest) => Promise<Response | null>;

export const jsonResponse = (
  data: unknown,
  options?: { status?: number; headers?: Record<string, string> },
): Response =>
  new Response(JSON.stringify(data), {
    status: options?.status ?? 200,
    headers: { "content-type": "application/json", ...options?.headers },
  });

const readBody = (body: RequestInit["body"]): unknown => {
  if (typeof body !== "string") return null;

  try {
    return JSON.parse(body);
  } catch {
    return body;
  }
};

// GraphQL traffic all goes to one URL, so handlers match on the POST body.
export const createMockFetch = (config: {
  handlers: MockFetchHandler[];
  enabledProviders: string[];
  allowRealFetch?: boolean;
}): Transport => {
  const { handlers, enabledProviders, allowRealFetch = false } = config;
  const realFetch = globalThis.fetch;

  return async (input, init) => {
    const url =
      typeof input === "string"
        ? input
        : input instanceof URL
          ? input.href
          : input.url;

    const request: MockRequest = { url, body: readBody(init?.body) };

    for (const handler of handlers) {
      const response = await handler(request);
      if (response) return response;
    }

    if (allowRealFetch) {
      return realFetch(input, init);
    }

    throw new Error(
      `No fixture for URL: ${url}\nEnabled providers: ${enabledProviders.join(", ") || "(none)"}`,
    );
  };
};
