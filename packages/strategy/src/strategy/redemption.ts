// ============================================
// Redemption Planning
// ============================================

import { InsufficientFundsError, NegativeAmountError, saturatingSub } from "@stakequeue/common";

export interface WithdrawalPlan {
  requested: bigint;
  held: bigint;
  available: bigint;
  /** Part of the request the pool must cover; 0 when held balance suffices */
  poolDraw: bigint;
}

export function assertNonNegative(field: string, amount: bigint): void {
  if (amount < 0n) throw new NegativeAmountError(field, amount);
}

/** Split a withdrawal between held balance and the staking pool. */
export function planWithdrawal(requested: bigint, held: bigint, available: bigint): WithdrawalPlan {
  assertNonNegative("requested", requested);
  if (held + available < requested) {
    throw new InsufficientFundsError(requested, held + available);
  }
  return { requested, held, available, poolDraw: saturatingSub(requested, held) };
}

/**
 * A deposit call commits the whole queue once it reaches the threshold.
 * An empty queue never commits: the vault rejects zero deposits.
 */
export function shouldCommit(queued: bigint, threshold: bigint): boolean {
  return queued > 0n && queued >= threshold;
}
