import type { Address } from "viem";
import type { NetworkDescriptor } from "./types";
import { toSlug } from "./utils";

const defineNetwork = (
  name: string,
  chainId: number,
  marketAddress: Address,
): NetworkDescriptor =>
  Object.freeze({ name, slug: toSlug(name), chainId, marketAddress });

// Aave V3 pool addresses, one market per entry. Several L2 deployments share
// the canonical pool address and differ only by chain.
const NETWORKS: readonly NetworkDescriptor[] = Object.freeze([
  defineNetwork("Ethereum Mainnet", 1, "0x87870bca3f3fd6335c3f4ce8392d69350b4fa4e2"),
  defineNetwork("EtherFi", 1, "0x0AA97c284e98396202b6A04024F5E2c65026F3c0"),
  defineNetwork("Lido", 1, "0x4e033931ad43597d96D6bcc25c280717730B58B1"),
  defineNetwork("Horizon RWA", 1, "0xAe05Cd22df81871bc7cC2a04BeCfb516bFe332C8"),
  defineNetwork("Polygon", 137, "0x794a61358d6845594f94dc1db02a252b5b4814ad"),
  defineNetwork("Avalanche", 43114, "0x794a61358d6845594f94dc1db02a252b5b4814ad"),
  defineNetwork("Arbitrum", 42161, "0x794a61358d6845594f94dc1db02a252b5b4814ad"),
  defineNetwork("Base", 8453, "0xA238Dd80C259a72e81d7e4664a9801593F98d1c5"),
  defineNetwork("Optimism", 10, "0x794a61358d6845594f94dc1db02a252b5b4814ad"),
  defineNetwork("Sonic", 146, "0x5362dBb1e601abF3a4c14c22ffEdA64042E5eAA3"),
  defineNetwork("Metis", 1088, "0x90df02551bB792286e8D4f13E0e357b4Bf1D6a57"),
  defineNetwork("Gnosis", 100, "0xb50201558B00496A145fE76f7424749556E326D8"),
  defineNetwork("BNB", 56, "0x6807dc923806fE8Fd134338EABCA509979a7e0cB"),
  defineNetwork("Scroll", 534352, "0x11fCfe756c05AD438e312a7fd934381537D3cFfe"),
  defineNetwork("ZkSync", 324, "0x78e30497a3c7527d953c6B1E3541b021A98Ac43c"),
  defineNetwork("Linea", 59144, "0xc47b8C00b0f69a36fa203Ffeac0334874574a8Ac"),
  defineNetwork("Celo", 42220, "0x3E59A31363E2ad014dcbc521c4a0d5757d9f3402"),
  defineNetwork("Soneium", 1868, "0xDd3d7A7d03D9fD9ef45f3E587287922eF65CA38B"),
]);

export const DEFAULT_NETWORK = "Ethereum Mainnet";

export const listNetworks = (): readonly NetworkDescriptor[] => NETWORKS;

// Accepts either the display name or its slug ("Horizon RWA", "horizon-rwa").
export const findNetwork = (nameOrSlug: string): NetworkDescriptor | null => {
  const slug = toSlug(nameOrSlug);

  if (!slug) return null;

  return NETWORKS.find((network) => network.slug === slug) ?? null;
};
