import type { MockFetchHandler } from "../core/mock-fetch";
import { jsonResponse } from "../core/mock-fetch";

// One recorded `UserPortfolio` payload per lowercase wallet address.
export type AaveAccountFixtures = Record<string, unknown>;

export const EMPTY_PORTFOLIO_PAYLOAD = {
  userSupplies: [],
  userBorrows: [],
  userMarketState: null,
};

const readUser = (body: unknown): string | null => {
  if (typeof body !== "object" || body === null) return null;
  if (!("variables" in body)) return null;

  const variables = body.variables;

  if (typeof variables !== "object" || variables === null) return null;
  if (!("user" in variables) || typeof variables.user !== "string") return null;

  return variables.user.toLowerCase();
};

export const createAavePortfolioHandler = (config: {
  apiUrl: string;
  accounts: AaveAccountFixtures;
}): MockFetchHandler => {
  const { apiUrl, accounts } = config;

  return async ({ url, body }) => {
    if (url !== apiUrl) return null;

    const user = readUser(body);

    if (!user) {
      return jsonResponse(
        { errors: [{ message: "Variable \"$user\" was not provided." }] },
        { status: 400 },
      );
    }

    return jsonResponse({ data: accounts[user] ?? EMPTY_PORTFOLIO_PAYLOAD });
  };
};
