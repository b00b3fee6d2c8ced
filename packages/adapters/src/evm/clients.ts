// ============================================
// viem Client Wiring
// ============================================

import {
  createPublicClient,
  createWalletClient,
  http,
  type Chain as ViemChain,
  type Hash,
  type Hex,
} from "viem";
import { privateKeyToAccount } from "viem/accounts";
import { arbitrum, base, foundry, mainnet, optimism } from "viem/chains";
import { Chain, TransactionRevertedError, createLogger } from "@stakequeue/common";

const logger = createLogger("adapters:evm");

const CHAIN_TO_VIEM: Record<Chain, ViemChain> = {
  [Chain.ETHEREUM]: mainnet,
  [Chain.ARBITRUM]: arbitrum,
  [Chain.BASE]: base,
  [Chain.OPTIMISM]: optimism,
  [Chain.LOCAL]: foundry,
};

export interface EvmClientOptions {
  chain: Chain;
  rpcUrl: string;
  privateKey: Hex;
}

/** Public + wallet client pair bound to the strategy account. */
export function createEvmClients(options: EvmClientOptions) {
  const viemChain = CHAIN_TO_VIEM[options.chain];
  const account = privateKeyToAccount(options.privateKey);
  const transport = http(options.rpcUrl);

  const publicClient = createPublicClient({ chain: viemChain, transport });
  const walletClient = createWalletClient({ account, chain: viemChain, transport });

  logger.info(`EVM clients ready on ${options.chain}`, { account: account.address });
  return { publicClient, walletClient, account: account.address };
}

export type EvmClients = ReturnType<typeof createEvmClients>;

/** Wait for `hash` and fail on a reverted receipt. */
export async function confirm(clients: EvmClients, hash: Hash, functionName: string): Promise<void> {
  const receipt = await clients.publicClient.waitForTransactionReceipt({ hash });
  if (receipt.status === "reverted") {
    throw new TransactionRevertedError(functionName, hash);
  }
  logger.debug(`${functionName} confirmed`, { hash, blockNumber: receipt.blockNumber });
}
