// ============================================
// Periodic Balance Report
// ============================================

import { createLogger, type QueryFn, type StrategyStatus } from "@stakequeue/common";
import type { CooldownStakingStrategy } from "@stakequeue/strategy";

const logger = createLogger("worker:report");

export const INSERT_SNAPSHOT_SQL = `INSERT INTO strategy_snapshots
  (strategy, mode, queued_balance, pool_balance, current_balance, deposit_threshold, deposit_paused, withdraw_paused)
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`;

export async function reportBalance(
  strategy: Pick<CooldownStakingStrategy, "status">,
  query: QueryFn,
): Promise<StrategyStatus> {
  const status = await strategy.status();

  await query(INSERT_SNAPSHOT_SQL, [
    status.name,
    status.mode,
    status.queuedBalance.toString(),
    status.poolBalance.toString(),
    status.currentBalance.toString(),
    status.depositThreshold.toString(),
    status.depositPaused,
    status.withdrawPaused,
  ]);

  logger.info("Balance reported", {
    mode: status.mode,
    queued: status.queuedBalance,
    pool: status.poolBalance,
    current: status.currentBalance,
  });
  return status;
}
