import type { Address } from "viem";

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export interface NetworkDescriptor {
  name: string;
  slug: string;
  chainId: number;
  marketAddress: Address;
}

export type RateMode = "stable" | "variable";

export interface RawSupplyRecord {
  symbol: string;
  name: string;
  quantity: number | null;
  priceUsd: number | null;
  // Decimal ratio, 0.05 == 5%.
  apy: number | null;
  isCollateral: boolean;
  canBeCollateral: boolean;
}

export interface RawBorrowRecord {
  symbol: string;
  name: string;
  quantity: number | null;
  priceUsd: number | null;
  apy: number | null;
  rateMode: RateMode | null;
}

export interface RawAccountHealth {
  // `Infinity` when upstream reports "∞", null when it reports nothing.
  healthFactor: number | null;
  totalCollateralUsd: number | null;
  totalDebtUsd: number | null;
  availableBorrowsUsd: number | null;
  currentLtv: number | null;
  liquidationThreshold: number | null;
  eModeEnabled: boolean;
  isInIsolationMode: boolean;
}

export interface RawPositions {
  network: NetworkDescriptor;
  address: Address;
  supplies: RawSupplyRecord[];
  borrows: RawBorrowRecord[];
  health: RawAccountHealth;
}

interface InvalidAddressError {
  kind: "InvalidAddress";
  address: string;
}

interface NetworkUnreachableError {
  kind: "NetworkUnreachable";
  detail: string;
}

interface ApiErrorDetail {
  kind: "ApiError";
  message: string;
  status?: number;
}

interface EmptyResultError {
  kind: "EmptyResult";
  network: NetworkDescriptor;
  address: Address;
}

export type FetchError =
  | InvalidAddressError
  | NetworkUnreachableError
  | ApiErrorDetail
  | EmptyResultError;

export type PortfolioError =
  | FetchError
  | { kind: "UnknownNetwork"; network: string };

// "usdValue" marks a product of quantity and price that is not finite.
export type MissingField = "quantity" | "priceUsd" | "apy" | "usdValue";

interface PositionQuality {
  usdValue: number;
  // Fraction of total collateral (supplies) or total debt (borrows).
  share: number;
  incomplete: boolean;
  missingFields: readonly MissingField[];
}

export type SupplyPosition = Readonly<RawSupplyRecord & PositionQuality>;

export type BorrowPosition = Readonly<RawBorrowRecord & PositionQuality>;

export type HealthFactorBucket =
  | "no-debt"
  | "unknown"
  | "liquidatable"
  | "low"
  | "moderate"
  | "safe";

export type AccountHealth = Readonly<
  RawAccountHealth & {
    healthFactorBucket: HealthFactorBucket;
    // True only for a finite health factor at or above 1.0.
    healthFactorSafe: boolean;
  }
>;

export interface PortfolioSnapshot {
  readonly network: Readonly<NetworkDescriptor>;
  readonly address: Address;
  readonly supplies: readonly SupplyPosition[];
  readonly borrows: readonly BorrowPosition[];
  readonly health: AccountHealth;
  readonly totals: Readonly<{ collateralUsd: number; debtUsd: number }>;
  readonly netWorthUsd: number;
  readonly utilization: number;
  readonly netApy: number | null;
  readonly hasIncompleteData: boolean;
}

export interface PositionFetcher {
  fetch(
    network: NetworkDescriptor,
    address: string,
  ): Promise<Result<RawPositions, FetchError>>;
}
