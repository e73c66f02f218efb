import { loadConfig } from "../../src/config";
import { createLogger } from "../../src/logger";
import { loadPortfolio } from "../../src/portfolio";
import { describePortfolioError } from "../../src/presentation/format";
import { createPositionFetcher } from "../../src/resolvers/aave/fetcher";
import type { PortfolioError, PositionFetcher } from "../../src/types";

export interface HandlerResult {
  status: number;
  body: Record<string, unknown>;
}

const ERROR_STATUS: Record<
  Exclude<PortfolioError["kind"], "EmptyResult">,
  { status: number; code: string }
> = {
  UnknownNetwork: { status: 400, code: "UNKNOWN_NETWORK" },
  InvalidAddress: { status: 400, code: "INVALID_ADDRESS" },
  ApiError: { status: 502, code: "API_ERROR" },
  NetworkUnreachable: { status: 504, code: "NETWORK_UNREACHABLE" },
};

const defaultFetcher = (): PositionFetcher => {
  const config = loadConfig();

  return createPositionFetcher({
    config,
    logger: createLogger("aave", config.logLevel),
  });
};

export const handlePortfolioQuery = async (
  params: URLSearchParams,
  deps: { fetcher?: PositionFetcher } = {},
): Promise<HandlerResult> => {
  const network = params.get("network")?.trim();
  const address = params.get("address")?.trim();

  if (!network || !address) {
    return {
      status: 400,
      body: {
        error: "MISSING_PARAMETER",
        message: "Both `network` and `address` query parameters are required.",
      },
    };
  }

  const fetcher = deps.fetcher ?? defaultFetcher();
  const result = await loadPortfolio(fetcher, { network, address });

  if (result.ok) {
    return { status: 200, body: { status: "ok", snapshot: result.value } };
  }

  const error = result.error;
  const message = describePortfolioError(error);

  if (error.kind === "EmptyResult") {
    return { status: 200, body: { status: "empty", message } };
  }

  const { status, code } = ERROR_STATUS[error.kind];

  return { status, body: { error: code, message } };
};
