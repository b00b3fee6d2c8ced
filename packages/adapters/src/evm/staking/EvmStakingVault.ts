// ============================================
// Cooldown Staking Vault Adapter (viem)
// ============================================

import { createLogger, type Address } from "@stakequeue/common";
import type { CooldownEntry, IStakingVault } from "../../base/IStakingVault.js";
import { STAKED_VAULT_ABI } from "../abis.js";
import { confirm, type EvmClients } from "../clients.js";
import { ensureAllowance } from "../erc20/EvmErc20Token.js";

const logger = createLogger("adapters:staking-vault");

export class EvmStakingVault implements IStakingVault {
  constructor(
    private readonly clients: EvmClients,
    readonly address: Address,
  ) {}

  async asset(): Promise<Address> {
    return this.clients.publicClient.readContract({
      address: this.address,
      abi: STAKED_VAULT_ABI,
      functionName: "asset",
    });
  }

  async cooldownDuration(): Promise<bigint> {
    // uint24 decodes to number
    const seconds = await this.clients.publicClient.readContract({
      address: this.address,
      abi: STAKED_VAULT_ABI,
      functionName: "cooldownDuration",
    });
    return BigInt(seconds);
  }

  async cooldowns(holder: Address): Promise<CooldownEntry> {
    const [cooldownEnd, underlyingAmount] = await this.clients.publicClient.readContract({
      address: this.address,
      abi: STAKED_VAULT_ABI,
      functionName: "cooldowns",
      args: [holder],
    });
    return { cooldownEnd, underlyingAmount };
  }

  async maxWithdraw(holder: Address): Promise<bigint> {
    return this.clients.publicClient.readContract({
      address: this.address,
      abi: STAKED_VAULT_ABI,
      functionName: "maxWithdraw",
      args: [holder],
    });
  }

  async deposit(assets: bigint, receiver: Address): Promise<bigint> {
    await ensureAllowance(this.clients, await this.asset(), this.address, assets);
    const { result, request } = await this.clients.publicClient.simulateContract({
      account: this.clients.walletClient.account,
      address: this.address,
      abi: STAKED_VAULT_ABI,
      functionName: "deposit",
      args: [assets, receiver],
    });
    await confirm(this.clients, await this.clients.walletClient.writeContract(request), "deposit");
    logger.info("Staked into vault", { assets, shares: result });
    return result;
  }

  async withdraw(assets: bigint, receiver: Address, owner: Address): Promise<bigint> {
    const { result, request } = await this.clients.publicClient.simulateContract({
      account: this.clients.walletClient.account,
      address: this.address,
      abi: STAKED_VAULT_ABI,
      functionName: "withdraw",
      args: [assets, receiver, owner],
    });
    await confirm(this.clients, await this.clients.walletClient.writeContract(request), "withdraw");
    logger.info("Withdrew from vault", { assets, shares: result });
    return result;
  }

  async cooldownAssets(assets: bigint): Promise<bigint> {
    const { result, request } = await this.clients.publicClient.simulateContract({
      account: this.clients.walletClient.account,
      address: this.address,
      abi: STAKED_VAULT_ABI,
      functionName: "cooldownAssets",
      args: [assets],
    });
    await confirm(this.clients, await this.clients.walletClient.writeContract(request), "cooldownAssets");
    return result;
  }

  async cooldownShares(shares: bigint): Promise<bigint> {
    const { result, request } = await this.clients.publicClient.simulateContract({
      account: this.clients.walletClient.account,
      address: this.address,
      abi: STAKED_VAULT_ABI,
      functionName: "cooldownShares",
      args: [shares],
    });
    await confirm(this.clients, await this.clients.walletClient.writeContract(request), "cooldownShares");
    return result;
  }

  async unstake(receiver: Address): Promise<void> {
    const { request } = await this.clients.publicClient.simulateContract({
      account: this.clients.walletClient.account,
      address: this.address,
      abi: STAKED_VAULT_ABI,
      functionName: "unstake",
      args: [receiver],
    });
    await confirm(this.clients, await this.clients.walletClient.writeContract(request), "unstake");
  }
}
