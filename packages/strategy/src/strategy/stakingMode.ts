// ============================================
// Staking Mode Resolution
//
// The vault redeems either immediately (cooldownDuration == 0) or through a
// cooldown silo. Every reader and mover goes through the mode picked here.
// ============================================

import { StakingModeKind, type Address } from "@stakequeue/common";
import type { IStakingVault } from "@stakequeue/adapters";

export interface StakingMode {
  readonly kind: StakingModeKind;
  /** Pool amount the holder can realise in this mode */
  available(holder: Address): Promise<bigint>;
  /** Pull at least `amount` of underlying out of the pool into `holder` */
  realize(holder: Address, amount: bigint): Promise<void>;
  /** Leave the pool entirely */
  exit(holder: Address): Promise<void>;
}

export class ImmediateMode implements StakingMode {
  readonly kind = StakingModeKind.IMMEDIATE;

  constructor(private readonly vault: IStakingVault) {}

  available(holder: Address): Promise<bigint> {
    return this.vault.maxWithdraw(holder);
  }

  async realize(holder: Address, amount: bigint): Promise<void> {
    await this.vault.withdraw(amount, holder, holder);
  }

  async exit(holder: Address): Promise<void> {
    const max = await this.vault.maxWithdraw(holder);
    if (max === 0n) return;
    await this.vault.withdraw(max, holder, holder);
  }
}

/**
 * Cooldown mode never splits a draw: `unstake` releases the whole matured
 * cooldown amount, whatever was asked for.
 */
export class CooldownMode implements StakingMode {
  readonly kind = StakingModeKind.COOLDOWN;

  constructor(private readonly vault: IStakingVault) {}

  async available(holder: Address): Promise<bigint> {
    const entry = await this.vault.cooldowns(holder);
    return entry.underlyingAmount;
  }

  async realize(holder: Address, _amount: bigint): Promise<void> {
    await this.vault.unstake(holder);
  }

  async exit(holder: Address): Promise<void> {
    await this.vault.unstake(holder);
  }
}

export async function resolveStakingMode(vault: IStakingVault): Promise<StakingMode> {
  const duration = await vault.cooldownDuration();
  return duration > 0n ? new CooldownMode(vault) : new ImmediateMode(vault);
}
