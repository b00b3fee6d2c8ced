// ============================================
// Chain Configuration Constants
// ============================================

import { Chain, type ChainConfig } from "../types/chain.js";

export const CHAIN_CONFIGS: Record<Chain, ChainConfig> = {
  [Chain.ETHEREUM]: {
    chain: Chain.ETHEREUM,
    name: "Ethereum",
    nativeToken: "ETH",
    rpcUrl: process.env.ETHEREUM_RPC_URL || process.env.ETH_RPC_URL || "https://eth.llamarpc.com",
    explorerUrl: "https://etherscan.io",
    chainIdNumeric: 1,
  },
  [Chain.ARBITRUM]: {
    chain: Chain.ARBITRUM,
    name: "Arbitrum One",
    nativeToken: "ETH",
    rpcUrl: process.env.ARBITRUM_RPC_URL || "https://arb1.arbitrum.io/rpc",
    explorerUrl: "https://arbiscan.io",
    chainIdNumeric: 42161,
  },
  [Chain.BASE]: {
    chain: Chain.BASE,
    name: "Base",
    nativeToken: "ETH",
    rpcUrl: process.env.BASE_RPC_URL || "https://mainnet.base.org",
    explorerUrl: "https://basescan.org",
    chainIdNumeric: 8453,
  },
  [Chain.OPTIMISM]: {
    chain: Chain.OPTIMISM,
    name: "Optimism",
    nativeToken: "ETH",
    rpcUrl: process.env.OPTIMISM_RPC_URL || "https://mainnet.optimism.io",
    explorerUrl: "https://optimistic.etherscan.io",
    chainIdNumeric: 10,
  },
  [Chain.LOCAL]: {
    chain: Chain.LOCAL,
    name: "Local Node",
    nativeToken: "ETH",
    rpcUrl: process.env.LOCAL_RPC_URL || "http://127.0.0.1:8545",
    explorerUrl: "",
    chainIdNumeric: 31337,
  },
};
