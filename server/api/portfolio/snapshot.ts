import type { VercelRequest, VercelResponse } from "@vercel/node";
import { handlePortfolioQuery } from "./handler";

const toSearchParams = (query: VercelRequest["query"]): URLSearchParams => {
  const params = new URLSearchParams();

  for (const [key, value] of Object.entries(query)) {
    const first = Array.isArray(value) ? value[0] : value;

    if (first != null) params.set(key, first);
  }

  return params;
};

const handler = async (request: VercelRequest, response: VercelResponse) => {
  // Read-only endpoint; reject anything but GET.
  if (request.method && request.method !== "GET") {
    response.status(405).json({ error: "Method Not Allowed" });

    return;
  }

  try {
    const result = await handlePortfolioQuery(toSearchParams(request.query));

    response.status(result.status).json(result.body);
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error";

    response.status(500).json({ error: message });
  }
};

export default handler;
