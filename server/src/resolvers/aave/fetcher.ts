import type { AppConfig } from "../../config";
import { withRetry, type Sleep } from "../../core/retry";
import { isWalletAddress } from "../../address";
import { createLogger, type Logger } from "../../logger";
import type {
  FetchError,
  NetworkDescriptor,
  PositionFetcher,
  RawPositions,
  Result,
} from "../../types";
import { graphqlRequest, type Transport } from "../graphql/graphqlRequest";
import { isTransportFailure, toFetchError } from "./errors";
import { USER_PORTFOLIO_QUERY } from "./query";
import { userPortfolioSchema } from "./schema";

export interface PositionFetcherOptions {
  config: Pick<AppConfig, "apiUrl" | "timeoutMs" | "retry">;
  fetch?: Transport;
  sleep?: Sleep;
  logger?: Logger;
}

export const createPositionFetcher = (
  options: PositionFetcherOptions,
): PositionFetcher => {
  const { config, sleep } = options;
  const logger = options.logger ?? createLogger("aave");

  return {
    async fetch(
      network: NetworkDescriptor,
      address: string,
    ): Promise<Result<RawPositions, FetchError>> {
      if (!isWalletAddress(address)) {
        return { ok: false, error: { kind: "InvalidAddress", address } };
      }

      const variables = {
        markets: [{ address: network.marketAddress, chainId: network.chainId }],
        market: network.marketAddress,
        user: address,
        chainId: network.chainId,
      };

      try {
        const payload = await withRetry(
          async (attempt) => {
            logger.debug(
              `requesting positions for ${address} on ${network.name} (attempt ${attempt})`,
            );

            return graphqlRequest({
              url: config.apiUrl,
              document: USER_PORTFOLIO_QUERY,
              variables,
              timeoutMs: config.timeoutMs,
              ...(options.fetch ? { fetch: options.fetch } : {}),
            });
          },
          {
            policy: config.retry,
            shouldRetry: isTransportFailure,
            ...(sleep ? { sleep } : {}),
            onRetry: (error, attempt) => {
              logger.warn(
                `attempt ${attempt} failed for ${network.name}, retrying in ${config.retry.delayMs}ms`,
                error instanceof Error ? error.message : error,
              );
            },
          },
        );

        const parsed = userPortfolioSchema.parse(payload);

        if (parsed.userSupplies.length === 0 && parsed.userBorrows.length === 0) {
          logger.info(`no positions for ${address} on ${network.name}`);

          return { ok: false, error: { kind: "EmptyResult", network, address } };
        }

        return {
          ok: true,
          value: {
            network,
            address,
            supplies: parsed.userSupplies,
            borrows: parsed.userBorrows,
            health: parsed.userMarketState,
          },
        };
      } catch (error) {
        const fetchError = toFetchError(error);

        logger.error(
          `fetch failed for ${address} on ${network.name}: ${fetchError.kind}`,
          fetchError.kind === "ApiError" ? fetchError.message : fetchError,
        );

        return { ok: false, error: fetchError };
      }
    },
  };
};
