import { fileURLToPath } from "node:url";
import type { Address } from "viem";
import { vi } from "vitest";

import { readJson } from "../fixtures/scripts/core/io";
import type { AaveAccountFixtures } from "../fixtures/scripts/aave/mock";
import { createLogger } from "../src/logger";
import { findNetwork } from "../src/networks";
import type { Transport } from "../src/resolvers/graphql/graphqlRequest";
import type { NetworkDescriptor, RawAccountHealth, RawPositions } from "../src/types";

export const TEST_API_URL = "https://aave.test/graphql";

export const silentLogger = createLogger("test", "silent");

export const BURN_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

export const requireNetwork = (name: string): NetworkDescriptor => {
  const network = findNetwork(name);

  if (!network) throw new Error(`missing network fixture: ${name}`);

  return network;
};

export const createTransport = (impl: Transport) =>
  vi.fn(async (...args: Parameters<Transport>) => impl(...args));

export const requestUrl = (input: Parameters<Transport>[0]): string =>
  typeof input === "string" ? input : input instanceof URL ? input.href : input.url;

export const loadAccountFixtures = (): Promise<AaveAccountFixtures> =>
  readJson<AaveAccountFixtures>(
    fileURLToPath(new URL("../fixtures/providers/aave/accounts.json", import.meta.url)),
  );

export const emptyHealth = (overrides: Partial<RawAccountHealth> = {}): RawAccountHealth => ({
  healthFactor: null,
  totalCollateralUsd: null,
  totalDebtUsd: null,
  availableBorrowsUsd: null,
  currentLtv: null,
  liquidationThreshold: null,
  eModeEnabled: false,
  isInIsolationMode: false,
  ...overrides,
});

export const rawPositions = (overrides: Partial<RawPositions> = {}): RawPositions => ({
  network: requireNetwork("Ethereum Mainnet"),
  address: "0x1234567890abcdef1234567890abcdef12345678",
  supplies: [],
  borrows: [],
  health: emptyHealth(),
  ...overrides,
});
