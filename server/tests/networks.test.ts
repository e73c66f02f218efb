import { describe, expect, it } from "vitest";
import { DEFAULT_NETWORK, findNetwork, listNetworks } from "../src/networks";

describe("supported networks", () => {
  it("lists the 18 Aave markets with unique slugs", () => {
    const networks = listNetworks();

    expect(networks).toHaveLength(18);
    expect(new Set(networks.map((network) => network.slug)).size).toBe(18);
    expect(networks[0]?.name).toBe(DEFAULT_NETWORK);
  });

  it("freezes the table and its entries", () => {
    const networks = listNetworks();

    expect(Object.isFrozen(networks)).toBe(true);
    expect(networks.every((network) => Object.isFrozen(network))).toBe(true);
  });

  it("finds a network by display name", () => {
    expect(findNetwork("Ethereum Mainnet")).toEqual({
      name: "Ethereum Mainnet",
      slug: "ethereum-mainnet",
      chainId: 1,
      marketAddress: "0x87870bca3f3fd6335c3f4ce8392d69350b4fa4e2",
    });
  });

  it("finds a network by slug, ignoring case and whitespace", () => {
    expect(findNetwork("horizon-rwa")?.name).toBe("Horizon RWA");
    expect(findNetwork("  ZKSYNC ")?.chainId).toBe(324);
    expect(findNetwork("Base")?.marketAddress).toBe(
      "0xA238Dd80C259a72e81d7e4664a9801593F98d1c5",
    );
  });

  it("returns null for unsupported names", () => {
    expect(findNetwork("Fantom")).toBeNull();
    expect(findNetwork("")).toBeNull();
  });
});
