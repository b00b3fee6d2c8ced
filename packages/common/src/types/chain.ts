// ============================================
// Chain & Network Types
// ============================================

export enum Chain {
  ETHEREUM = "ethereum",
  ARBITRUM = "arbitrum",
  BASE = "base",
  OPTIMISM = "optimism",
  // Local anvil / hardhat node
  LOCAL = "local",
}

export interface ChainConfig {
  chain: Chain;
  name: string;
  nativeToken: string;
  rpcUrl: string;
  explorerUrl: string;
  chainIdNumeric: number;
}

export const SUPPORTED_CHAINS = [
  Chain.ETHEREUM,
  Chain.ARBITRUM,
  Chain.BASE,
  Chain.OPTIMISM,
  Chain.LOCAL,
] as const;

export function isChain(value: string): value is Chain {
  return SUPPORTED_CHAINS.some((chain) => chain === value);
}

/** EVM address as carried through configs and adapters. */
export type Address = `0x${string}`;

export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";
