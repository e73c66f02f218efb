import { findNetwork } from "./networks";
import { normalize } from "./normalizer/normalize";
import type {
  PortfolioError,
  PortfolioSnapshot,
  PositionFetcher,
  Result,
} from "./types";

export interface PortfolioRequest {
  network: string;
  address: string;
}

// Fetch errors end the request as-is; a snapshot is only built from a
// successful fetch so an error is never rendered as "zero positions".
export const loadPortfolio = async (
  fetcher: PositionFetcher,
  request: PortfolioRequest,
): Promise<Result<PortfolioSnapshot, PortfolioError>> => {
  const network = findNetwork(request.network);

  if (!network) {
    return {
      ok: false,
      error: { kind: "UnknownNetwork", network: request.network },
    };
  }

  const fetched = await fetcher.fetch(network, request.address.trim());

  if (!fetched.ok) return fetched;

  return { ok: true, value: normalize(fetched.value) };
};
