import type { HealthFactorBucket } from "../types";

export const LIQUIDATION_THRESHOLD = 1.0;
export const LOW_HEALTH_THRESHOLD = 1.2;
export const MODERATE_HEALTH_THRESHOLD = 1.5;

export const isHealthFactorSafe = (healthFactor: number | null): boolean =>
  healthFactor !== null &&
  Number.isFinite(healthFactor) &&
  healthFactor >= LIQUIDATION_THRESHOLD;

// The health factor itself is never computed here: liquidation-threshold
// weighting is only known upstream.
export const bucketHealthFactor = (
  healthFactor: number | null,
  totalDebtUsd: number,
): HealthFactorBucket => {
  if (healthFactor === Infinity) return "no-debt";

  if (healthFactor === null || Number.isNaN(healthFactor)) {
    return totalDebtUsd === 0 ? "no-debt" : "unknown";
  }

  if (healthFactor < LIQUIDATION_THRESHOLD) return "liquidatable";
  if (healthFactor < LOW_HEALTH_THRESHOLD) return "low";
  if (healthFactor < MODERATE_HEALTH_THRESHOLD) return "moderate";

  return "safe";
};
