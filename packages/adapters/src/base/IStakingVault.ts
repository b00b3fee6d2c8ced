// ============================================
// Cooldown Staking Vault Interface
// ============================================

import type { Address } from "@stakequeue/common";

export interface CooldownEntry {
  cooldownEnd: bigint;        // unix seconds at which unstake is allowed
  underlyingAmount: bigint;   // assets parked in the silo for `holder`
}

/**
 * ERC-4626 staking vault with an optional cooldown redemption path
 * (StakedUSDeV2 semantics).
 *
 * - cooldownDuration == 0: withdraw/redeem directly; cooldown calls revert.
 * - cooldownDuration > 0: withdraw reverts; holders call cooldownAssets /
 *   cooldownShares, wait, then unstake.
 *
 * Write methods act as the adapter's bound account.
 */
export interface IStakingVault {
  readonly address: Address;

  /** Asset accepted by deposit() */
  asset(): Promise<Address>;

  cooldownDuration(): Promise<bigint>;

  cooldowns(holder: Address): Promise<CooldownEntry>;

  maxWithdraw(holder: Address): Promise<bigint>;

  /** Returns shares minted */
  deposit(assets: bigint, receiver: Address): Promise<bigint>;

  /** Returns shares burned */
  withdraw(assets: bigint, receiver: Address, owner: Address): Promise<bigint>;

  /** Returns shares burned */
  cooldownAssets(assets: bigint): Promise<bigint>;

  /** Returns assets moved into cooldown */
  cooldownShares(shares: bigint): Promise<bigint>;

  /** Releases the whole matured cooldown amount to `receiver` */
  unstake(receiver: Address): Promise<void>;
}
