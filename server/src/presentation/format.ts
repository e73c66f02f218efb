import { shortenAddress } from "../address";
import type {
  AccountHealth,
  HealthFactorBucket,
  PortfolioError,
  PortfolioSnapshot,
} from "../types";

const NOT_AVAILABLE = "N/A";

const twoDecimals = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export const formatCurrency = (amount: number): string => {
  const sign = amount < 0 ? "-" : "";
  const abs = Math.abs(amount);

  if (abs >= 1_000_000) return `${sign}$${(abs / 1_000_000).toFixed(2)}M`;
  if (abs >= 1_000) return `${sign}$${(abs / 1_000).toFixed(1)}K`;

  return `${sign}$${twoDecimals.format(abs)}`;
};

export const formatPercent = (ratio: number | null): string =>
  ratio === null ? NOT_AVAILABLE : `${(ratio * 100).toFixed(2)}%`;

export const formatHealthFactor = (healthFactor: number | null): string => {
  if (healthFactor === null || Number.isNaN(healthFactor)) return NOT_AVAILABLE;
  if (healthFactor === Infinity) return "∞";

  return healthFactor.toFixed(2);
};

export const describeHealth = (bucket: HealthFactorBucket): string | null => {
  switch (bucket) {
    case "liquidatable":
      return "LIQUIDATION RISK - Health Factor below 1.0";
    case "low":
      return "LOW Health Factor - Consider reducing debt or adding collateral";
    default:
      return null;
  }
};

export const describeAccountStatus = (
  health: Pick<AccountHealth, "eModeEnabled" | "isInIsolationMode">,
): string => {
  const items: string[] = [];

  if (health.eModeEnabled) items.push("E-Mode Enabled");
  if (health.isInIsolationMode) items.push("Isolation Mode Active");

  return items.length > 0 ? items.join(" | ") : "Normal Mode";
};

export const describePortfolioError = (error: PortfolioError): string => {
  switch (error.kind) {
    case "UnknownNetwork":
      return `Unsupported network: ${error.network}`;
    case "InvalidAddress":
      return "Invalid address format. Address must start with 0x and be 42 characters long.";
    case "NetworkUnreachable":
      return "Could not reach the Aave API. Check your connection and try again.";
    case "ApiError":
      return `The Aave API returned an error: ${error.message}`;
    case "EmptyResult":
      return `No positions found for ${shortenAddress(error.address)} on ${error.network.name}.`;
  }
};

// Plain-text rendering used by the fixture runner. Every number comes from
// the snapshot; nothing is recomputed here.
export const renderPortfolio = (snapshot: PortfolioSnapshot): string[] => {
  const { health } = snapshot;
  const lines = [
    `Portfolio ${shortenAddress(snapshot.address)} on ${snapshot.network.name}`,
    `Net worth: ${formatCurrency(snapshot.netWorthUsd)}`,
    `Total supplied: ${formatCurrency(snapshot.totals.collateralUsd)}`,
    `Total borrowed: ${formatCurrency(snapshot.totals.debtUsd)}`,
    `Health factor: ${formatHealthFactor(health.healthFactor)}`,
    `Utilization: ${formatPercent(snapshot.utilization)}`,
    `Net APY: ${formatPercent(snapshot.netApy)}`,
    `Current LTV: ${formatPercent(health.currentLtv)}`,
    `Liquidation threshold: ${formatPercent(health.liquidationThreshold)}`,
    `Status: ${describeAccountStatus(health)}`,
  ];

  const warning = describeHealth(health.healthFactorBucket);

  if (warning) lines.push(warning);

  for (const supply of snapshot.supplies) {
    const collateral = supply.isCollateral ? "collateral" : "not collateral";
    const flag = supply.incomplete ? " [incomplete data]" : "";

    lines.push(
      `  supply ${supply.symbol}: ${formatCurrency(supply.usdValue)} @ ${formatPercent(supply.apy)} (${collateral})${flag}`,
    );
  }

  for (const borrow of snapshot.borrows) {
    const flag = borrow.incomplete ? " [incomplete data]" : "";

    lines.push(
      `  borrow ${borrow.symbol}: ${formatCurrency(borrow.usdValue)} @ ${formatPercent(borrow.apy)}${flag}`,
    );
  }

  return lines;
};
