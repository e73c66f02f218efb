import { z } from "zod";
import type {
  RawAccountHealth,
  RawBorrowRecord,
  RawSupplyRecord,
} from "../../types";
import { parseHealthFactor, parseNumeric } from "../../utils";

// Numeric fields arrive as numbers, BigDecimal strings, or not at all.
// The schema only checks the outer shape; values that do not parse become
// null and are flagged later by the normalizer.
const numeric = z.unknown().transform(parseNumeric);

const percent = z
  .object({ value: z.unknown() })
  .nullish()
  .transform((input) => parseNumeric(input?.value));

const flag = z
  .boolean()
  .nullish()
  .transform((value) => value ?? false);

const currency = z.object({
  symbol: z.string(),
  name: z.string().nullish(),
});

const tokenAmount = z
  .object({
    amount: z.object({ value: z.unknown() }).nullish(),
    usdPerToken: z.unknown(),
  })
  .nullish();

const supplySchema = z
  .object({
    currency,
    balance: tokenAmount,
    apy: percent,
    isCollateral: flag,
    canBeCollateral: flag,
  })
  .transform(
    (entry): RawSupplyRecord => ({
      symbol: entry.currency.symbol,
      name: entry.currency.name ?? entry.currency.symbol,
      quantity: parseNumeric(entry.balance?.amount?.value),
      priceUsd: parseNumeric(entry.balance?.usdPerToken),
      apy: entry.apy,
      isCollateral: entry.isCollateral,
      canBeCollateral: entry.canBeCollateral,
    }),
  );

const borrowSchema = z
  .object({
    currency,
    debt: tokenAmount,
    apy: percent,
  })
  .transform(
    (entry): RawBorrowRecord => ({
      symbol: entry.currency.symbol,
      name: entry.currency.name ?? entry.currency.symbol,
      quantity: parseNumeric(entry.debt?.amount?.value),
      priceUsd: parseNumeric(entry.debt?.usdPerToken),
      apy: entry.apy,
      // V3 markets only carry variable-rate debt.
      rateMode: "variable",
    }),
  );

const EMPTY_HEALTH: RawAccountHealth = {
  healthFactor: null,
  totalCollateralUsd: null,
  totalDebtUsd: null,
  availableBorrowsUsd: null,
  currentLtv: null,
  liquidationThreshold: null,
  eModeEnabled: false,
  isInIsolationMode: false,
};

const marketStateSchema = z
  .object({
    healthFactor: z.unknown().transform(parseHealthFactor),
    totalCollateralBase: numeric,
    totalDebtBase: numeric,
    availableBorrowsBase: numeric,
    currentLiquidationThreshold: percent,
    ltv: percent,
    eModeEnabled: flag,
    isInIsolationMode: flag,
  })
  .nullish()
  .transform((state): RawAccountHealth => {
    if (!state) return { ...EMPTY_HEALTH };

    return {
      healthFactor: state.healthFactor,
      totalCollateralUsd: state.totalCollateralBase,
      totalDebtUsd: state.totalDebtBase,
      availableBorrowsUsd: state.availableBorrowsBase,
      currentLtv: state.ltv,
      liquidationThreshold: state.currentLiquidationThreshold,
      eModeEnabled: state.eModeEnabled,
      isInIsolationMode: state.isInIsolationMode,
    };
  });

export const userPortfolioSchema = z.object({
  userSupplies: z
    .array(supplySchema)
    .nullish()
    .transform((items) => items ?? []),
  userBorrows: z
    .array(borrowSchema)
    .nullish()
    .transform((items) => items ?? []),
  userMarketState: marketStateSchema,
});
