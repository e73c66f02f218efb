import { describe, expect, it } from "vitest";
import { isWalletAddress, shortenAddress } from "../src/address";

const HEX = "0123456789abcdefABCDEF";

// Deterministic pseudo-random addresses so failures are reproducible.
const generateAddresses = (count: number): string[] => {
  let seed = 42;
  const next = (): number => {
    seed = (seed * 48271) % 2147483647;
    return seed;
  };

  return Array.from({ length: count }, () => {
    let body = "";
    for (let i = 0; i < 40; i += 1) body += HEX[next() % HEX.length];
    return `0x${body}`;
  });
};

describe("isWalletAddress", () => {
  it("accepts every 0x-prefixed 40 hex character string", () => {
    for (const address of generateAddresses(250)) {
      expect(isWalletAddress(address)).toBe(true);
    }
  });

  it("does not verify the EIP-55 checksum", () => {
    expect(isWalletAddress(`0x${"A".repeat(20)}${"a".repeat(20)}`)).toBe(true);
  });

  it.each([
    ["too short", "0x123"],
    ["empty", ""],
    ["39 hex chars", `0x${"a".repeat(39)}`],
    ["41 hex chars", `0x${"a".repeat(41)}`],
    ["missing prefix", "a".repeat(42)],
    ["upper-case prefix", `0X${"a".repeat(40)}`],
    ["non-hex characters", `0x${"g".repeat(40)}`],
    ["surrounding whitespace", ` 0x${"a".repeat(40)} `],
  ])("rejects %s", (_label, value) => {
    expect(isWalletAddress(value)).toBe(false);
  });
});

describe("shortenAddress", () => {
  it("keeps the prefix and the last four characters", () => {
    expect(shortenAddress("0x1234567890abcdef1234567890abcdef12345678")).toBe(
      "0x1234...5678",
    );
  });

  it("leaves short strings alone", () => {
    expect(shortenAddress("0x123")).toBe("0x123");
  });
});
