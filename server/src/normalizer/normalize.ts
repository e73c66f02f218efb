import type {
  BorrowPosition,
  MissingField,
  PortfolioSnapshot,
  RawBorrowRecord,
  RawPositions,
  RawSupplyRecord,
  SupplyPosition,
} from "../types";
import { sumBy } from "../utils";
import { bucketHealthFactor, isHealthFactorSafe } from "./health";

interface Valuation {
  usdValue: number;
  incomplete: boolean;
  missingFields: MissingField[];
}

const valueRecord = (record: RawSupplyRecord | RawBorrowRecord): Valuation => {
  const missingFields: MissingField[] = [];

  if (record.quantity === null) missingFields.push("quantity");
  if (record.priceUsd === null) missingFields.push("priceUsd");
  if (record.apy === null) missingFields.push("apy");

  const product =
    record.quantity !== null && record.priceUsd !== null
      ? record.quantity * record.priceUsd
      : 0;
  const usdValue = Number.isFinite(product) ? product : 0;

  if (usdValue !== product) missingFields.push("usdValue");

  return {
    usdValue,
    incomplete: missingFields.length > 0,
    missingFields,
  };
};

const shareOf = (value: number, total: number): number =>
  total > 0 ? value / total : 0;

const weightedYield = (
  positions: readonly { usdValue: number; apy: number | null }[],
): number => sumBy(positions, (position) => position.usdValue * (position.apy ?? 0));

const deepFreeze = <T>(value: T): T => {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) {
    return value;
  }

  for (const nested of Object.values(value)) deepFreeze(nested);

  return Object.freeze(value);
};

/**
 * Turns one fetch result into the snapshot the presentation layer renders.
 * Pure: identical input yields a structurally identical, frozen snapshot.
 */
export const normalize = (raw: RawPositions): PortfolioSnapshot => {
  const suppliesValued = raw.supplies.map((record) => ({
    ...record,
    ...valueRecord(record),
  }));
  const borrowsValued = raw.borrows.map((record) => ({
    ...record,
    ...valueRecord(record),
  }));

  const collateralUsd = sumBy(suppliesValued, (position) => position.usdValue);
  const debtUsd = sumBy(borrowsValued, (position) => position.usdValue);
  const netWorthUsd = collateralUsd - debtUsd;

  const supplies: SupplyPosition[] = suppliesValued.map((position) => ({
    ...position,
    share: shareOf(position.usdValue, collateralUsd),
  }));
  const borrows: BorrowPosition[] = borrowsValued.map((position) => ({
    ...position,
    share: shareOf(position.usdValue, debtUsd),
  }));

  const netApy =
    netWorthUsd > 0
      ? (weightedYield(supplies) - weightedYield(borrows)) / netWorthUsd
      : null;

  const snapshot: PortfolioSnapshot = {
    network: { ...raw.network },
    address: raw.address,
    supplies,
    borrows,
    health: {
      ...raw.health,
      healthFactorBucket: bucketHealthFactor(raw.health.healthFactor, debtUsd),
      healthFactorSafe: isHealthFactorSafe(raw.health.healthFactor),
    },
    totals: { collateralUsd, debtUsd },
    netWorthUsd,
    utilization: collateralUsd > 0 ? debtUsd / collateralUsd : 0,
    netApy,
    hasIncompleteData: [...supplies, ...borrows].some((position) => position.incomplete),
  };

  return deepFreeze(snapshot);
};
