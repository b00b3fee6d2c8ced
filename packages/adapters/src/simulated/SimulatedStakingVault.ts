// ============================================
// Simulated Cooldown Staking Vault
//
// ERC-4626 share accounting (OpenZeppelin 4.9 virtual offset of 1) with the
// StakedUSDeV2 cooldown silo. Reverts carry the real contract's error names.
// ============================================

import { SimulatedRevertError, type Address } from "@stakequeue/common";
import type { CooldownEntry, IStakingVault } from "../base/IStakingVault.js";
import { sameAddress, type SimulatedChain } from "./SimulatedChain.js";

export const MAX_COOLDOWN_DURATION = 90n * 24n * 60n * 60n;

export interface SimulatedVaultConfig {
  address: Address;
  asset: Address;
  /** Holds assets while they cool down */
  silo: Address;
}

export class SimulatedStakingVault implements IStakingVault {
  readonly address: Address;

  constructor(
    private readonly chain: SimulatedChain,
    private readonly config: SimulatedVaultConfig,
    private readonly account: Address,
  ) {
    this.address = config.address;
  }

  /** Same vault, acting as another account */
  connect(account: Address): SimulatedStakingVault {
    return new SimulatedStakingVault(this.chain, this.config, account);
  }

  // ---- Admin (not part of IStakingVault) ----

  setCooldownDuration(seconds: bigint): void {
    if (seconds > MAX_COOLDOWN_DURATION) this.revert("InvalidCooldown", { seconds });
    this.chain.writeSlot(this.address, "cooldownDuration", seconds);
  }

  /** Yield arrives as assets sent to the vault without minting shares */
  accrueRewards(amount: bigint): void {
    this.chain.mint(this.config.asset, this.address, amount);
  }

  // ---- ERC-4626 views ----

  async asset(): Promise<Address> {
    return this.config.asset;
  }

  totalAssets(): bigint {
    return this.chain.balanceOf(this.config.asset, this.address);
  }

  sharesOf(holder: Address): bigint {
    return this.chain.balanceOf(this.address, holder);
  }

  convertToShares(assets: bigint): bigint {
    return (assets * (this.chain.totalSupply(this.address) + 1n)) / (this.totalAssets() + 1n);
  }

  convertToAssets(shares: bigint): bigint {
    return (shares * (this.totalAssets() + 1n)) / (this.chain.totalSupply(this.address) + 1n);
  }

  /** Shares to burn for `assets`, rounded up */
  previewWithdraw(assets: bigint): bigint {
    const numerator = assets * (this.chain.totalSupply(this.address) + 1n);
    const denominator = this.totalAssets() + 1n;
    return (numerator + denominator - 1n) / denominator;
  }

  async maxWithdraw(holder: Address): Promise<bigint> {
    return this.convertToAssets(this.sharesOf(holder));
  }

  // ---- Cooldown views ----

  async cooldownDuration(): Promise<bigint> {
    return this.chain.readSlot(this.address, "cooldownDuration");
  }

  async cooldowns(holder: Address): Promise<CooldownEntry> {
    return {
      cooldownEnd: this.chain.readSlot(this.address, `cooldownEnd:${holder}`),
      underlyingAmount: this.chain.readSlot(this.address, `cooldownAmount:${holder}`),
    };
  }

  // ---- Mutations ----

  async deposit(assets: bigint, receiver: Address): Promise<bigint> {
    if (assets === 0n) this.revert("InvalidAmount", { assets });
    const shares = this.convertToShares(assets);
    if (shares === 0n) this.revert("InvalidAmount", { assets });

    this.chain.move(this.config.asset, this.account, this.address, assets, "asset");
    this.chain.mint(this.address, receiver, shares);
    return shares;
  }

  async withdraw(assets: bigint, receiver: Address, owner: Address): Promise<bigint> {
    await this.ensureCooldownOff();
    if (!sameAddress(owner, this.account)) {
      this.revert("ERC20InsufficientAllowance", { owner, spender: this.account });
    }
    const max = await this.maxWithdraw(owner);
    if (assets > max) this.revert("ERC4626ExceededMaxWithdraw", { owner, assets, max });

    const shares = this.previewWithdraw(assets);
    this.chain.burn(this.address, owner, shares, "shares");
    this.chain.move(this.config.asset, this.address, receiver, assets, "asset");
    return shares;
  }

  async cooldownAssets(assets: bigint): Promise<bigint> {
    await this.ensureCooldownOn();
    const max = await this.maxWithdraw(this.account);
    if (assets > max) this.revert("ExcessiveWithdrawAmount", { assets, max });

    const shares = this.previewWithdraw(assets);
    await this.startCooldown(assets, shares);
    return shares;
  }

  async cooldownShares(shares: bigint): Promise<bigint> {
    await this.ensureCooldownOn();
    const max = this.sharesOf(this.account);
    if (shares > max) this.revert("ExcessiveRedeemAmount", { shares, max });

    const assets = this.convertToAssets(shares);
    await this.startCooldown(assets, shares);
    return assets;
  }

  async unstake(receiver: Address): Promise<void> {
    const entry = await this.cooldowns(this.account);
    const duration = await this.cooldownDuration();
    if (this.chain.timestamp < entry.cooldownEnd && duration !== 0n) {
      this.revert("InvalidCooldown", { cooldownEnd: entry.cooldownEnd, now: this.chain.timestamp });
    }

    this.chain.writeSlot(this.address, `cooldownEnd:${this.account}`, 0n);
    this.chain.writeSlot(this.address, `cooldownAmount:${this.account}`, 0n);
    this.chain.move(this.config.asset, this.config.silo, receiver, entry.underlyingAmount, "silo");
  }

  // New requests add to the parked amount and restart the timer.
  private async startCooldown(assets: bigint, shares: bigint): Promise<void> {
    const duration = await this.cooldownDuration();
    const entry = await this.cooldowns(this.account);

    this.chain.burn(this.address, this.account, shares, "shares");
    this.chain.move(this.config.asset, this.address, this.config.silo, assets, "asset");
    this.chain.writeSlot(this.address, `cooldownEnd:${this.account}`, this.chain.timestamp + duration);
    this.chain.writeSlot(this.address, `cooldownAmount:${this.account}`, entry.underlyingAmount + assets);
  }

  private async ensureCooldownOff(): Promise<void> {
    if ((await this.cooldownDuration()) !== 0n) this.revert("OperationNotAllowed");
  }

  private async ensureCooldownOn(): Promise<void> {
    if ((await this.cooldownDuration()) === 0n) this.revert("OperationNotAllowed");
  }

  private revert(reason: string, context: Record<string, unknown> = {}): never {
    throw new SimulatedRevertError("StakingVault", reason, context);
  }
}
