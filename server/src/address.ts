import { isAddress, type Address } from "viem";

// Format check only (`0x` + 40 hex chars). Mixed-case input is accepted
// without verifying its EIP-55 checksum, and existence is never checked.
export const isWalletAddress = (value: string): value is Address =>
  isAddress(value, { strict: false });

export const shortenAddress = (address: string): string =>
  address.length > 10 ? `${address.slice(0, 6)}...${address.slice(-4)}` : address;
