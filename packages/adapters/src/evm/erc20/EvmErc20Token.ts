// ============================================
// ERC20 Token & Native Balance (viem)
// ============================================

import { BaseError as ViemBaseError, ExecutionRevertedError, erc20Abi, maxUint256 } from "viem";
import { createLogger, type Address } from "@stakequeue/common";
import type { IAssetToken, INativeBalance } from "../../base/IAssetToken.js";
import { confirm, type EvmClients } from "../clients.js";

const logger = createLogger("adapters:erc20");

export class EvmErc20Token implements IAssetToken {
  constructor(
    private readonly clients: EvmClients,
    readonly address: Address,
  ) {}

  async balanceOf(holder: Address): Promise<bigint> {
    return this.clients.publicClient.readContract({
      address: this.address,
      abi: erc20Abi,
      functionName: "balanceOf",
      args: [holder],
    });
  }

  async transfer(to: Address, amount: bigint): Promise<void> {
    const { request } = await this.clients.publicClient.simulateContract({
      account: this.clients.walletClient.account,
      address: this.address,
      abi: erc20Abi,
      functionName: "transfer",
      args: [to, amount],
    });
    await confirm(this.clients, await this.clients.walletClient.writeContract(request), "transfer");
  }
}

/**
 * Approve `spender` for the max amount when the current allowance of the
 * strategy account does not cover `amount`.
 */
export async function ensureAllowance(
  clients: EvmClients,
  token: Address,
  spender: Address,
  amount: bigint,
): Promise<void> {
  const allowance = await clients.publicClient.readContract({
    address: token,
    abi: erc20Abi,
    functionName: "allowance",
    args: [clients.account, spender],
  });
  if (allowance >= amount) return;

  logger.info(`Approving ${token} for ${spender}`);
  const { request } = await clients.publicClient.simulateContract({
    account: clients.walletClient.account,
    address: token,
    abi: erc20Abi,
    functionName: "approve",
    args: [spender, maxUint256],
  });
  await confirm(clients, await clients.walletClient.writeContract(request), "approve");
}

export class EvmNativeBalance implements INativeBalance {
  constructor(private readonly clients: EvmClients) {}

  async balanceOf(holder: Address): Promise<bigint> {
    return this.clients.publicClient.getBalance({ address: holder });
  }

  async send(to: Address, amount: bigint): Promise<boolean> {
    try {
      const hash = await this.clients.walletClient.sendTransaction({ to, value: amount });
      const receipt = await this.clients.publicClient.waitForTransactionReceipt({ hash });
      return receipt.status === "success";
    } catch (err) {
      // Recipient refused the value; anything else (RPC, nonce) is not a failed transfer
      if (err instanceof ViemBaseError && err.walk((e) => e instanceof ExecutionRevertedError)) {
        logger.warn(`Native transfer to ${to} reverted`, { amount });
        return false;
      }
      throw err;
    }
  }
}
