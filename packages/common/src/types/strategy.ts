// ============================================
// Strategy Types
// ============================================

import type { Address } from "./chain.js";

export enum PauseDirection {
  DEPOSIT = "deposit",
  WITHDRAW = "withdraw",
}

/**
 * How the staking protocol currently redeems.
 * Selected at call time from the protocol's cooldown duration.
 */
export enum StakingModeKind {
  IMMEDIATE = "immediate",   // cooldownDuration == 0, direct withdraw
  COOLDOWN = "cooldown",     // cooldownDuration > 0, unstake after maturity
}

export enum CooldownKind {
  ASSETS = "assets",
  SHARES = "shares",
}

export interface StrategyStatus {
  name: string;
  owner: Address;
  depositThreshold: bigint;
  depositPaused: boolean;
  withdrawPaused: boolean;
  mode: StakingModeKind;
  queuedBalance: bigint;
  poolBalance: bigint;       // readable staking position for `mode`
  currentBalance: bigint;    // queuedBalance + poolBalance
}
