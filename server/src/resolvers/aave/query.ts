import type { TypedDocumentNode } from "@graphql-typed-document-node/core";
import { parse } from "graphql";
import { gql } from "../graphql/graphqlRequest";

export type UserPortfolioVariables = {
  markets: { address: string; chainId: number }[];
  market: string;
  user: string;
  chainId: number;
};

// The payload is typed as unknown on purpose: every field goes through
// `userPortfolioSchema` before it is used.
export const USER_PORTFOLIO_QUERY: TypedDocumentNode<
  unknown,
  UserPortfolioVariables
> = parse(gql`
  query UserPortfolio(
    $markets: [MarketInput!]!
    $market: String!
    $user: String!
    $chainId: Int!
  ) {
    userSupplies(request: { markets: $markets, user: $user }) {
      currency {
        symbol
        name
      }
      balance {
        amount {
          value
        }
        usdPerToken
      }
      apy {
        value
      }
      isCollateral
      canBeCollateral
    }
    userBorrows(request: { markets: $markets, user: $user }) {
      currency {
        symbol
        name
      }
      debt {
        amount {
          value
        }
        usdPerToken
      }
      apy {
        value
      }
    }
    userMarketState(
      request: { market: $market, user: $user, chainId: $chainId }
    ) {
      healthFactor
      totalCollateralBase
      totalDebtBase
      availableBorrowsBase
      currentLiquidationThreshold {
        value
      }
      ltv {
        value
      }
      eModeEnabled
      isInIsolationMode
    }
  }
`);
