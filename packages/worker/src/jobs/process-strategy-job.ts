// ============================================
// Strategy Job Processor
//
// Turns one queue job into one strategy call. Amounts arrive as decimal
// strings and are parsed here.
// ============================================

import {
  CooldownKind,
  InvalidJobError,
  PauseDirection,
  createLogger,
  parseAmount,
  type StrategyJob,
  type StrategyJobType,
} from "@stakequeue/common";
import type { CooldownStakingStrategy } from "@stakequeue/strategy";

const logger = createLogger("worker:jobs");

export type StrategyOperations = Pick<
  CooldownStakingStrategy,
  "onDeposit" | "onWithdraw" | "setPause" | "setDepositThreshold" | "requestCooldown" | "emergencyWithdraw"
>;

export interface JobOutcome {
  type: StrategyJobType;
  /** Amount the call returned, where it returns one */
  result?: string;
}

function amountField(raw: unknown, field: string): bigint {
  const value = typeof raw === "string" ? parseAmount(raw) : null;
  if (value === null) {
    throw new InvalidJobError(`Job field ${field} must be an integer amount in base units`, { field, value: raw });
  }
  return value;
}

function isPauseDirection(value: unknown): value is PauseDirection {
  return Object.values(PauseDirection).some((direction) => direction === value);
}

function isCooldownKind(value: unknown): value is CooldownKind {
  return Object.values(CooldownKind).some((kind) => kind === value);
}

export async function processStrategyJob(strategy: StrategyOperations, job: StrategyJob): Promise<JobOutcome> {
  switch (job.type) {
    case "deposit":
      await strategy.onDeposit(amountField(job.amount, "amount"));
      return { type: job.type };

    case "withdraw":
      await strategy.onWithdraw(job.recipient, amountField(job.amount, "amount"));
      return { type: job.type };

    case "pause":
      if (!isPauseDirection(job.direction)) {
        throw new InvalidJobError(`Unknown pause direction: ${job.direction}`);
      }
      await strategy.setPause(job.caller, job.direction, job.value);
      return { type: job.type };

    case "threshold":
      await strategy.setDepositThreshold(job.caller, amountField(job.amount, "amount"));
      return { type: job.type };

    case "cooldown": {
      if (!isCooldownKind(job.kind)) {
        throw new InvalidJobError(`Unknown cooldown kind: ${job.kind}`);
      }
      const result = await strategy.requestCooldown(job.caller, job.kind, amountField(job.quantity, "quantity"));
      return { type: job.type, result: result.toString() };
    }

    case "emergency": {
      const realized = await strategy.emergencyWithdraw(job.caller);
      logger.warn("Emergency job completed", { caller: job.caller, realized });
      return { type: job.type, result: realized.toString() };
    }

    default: {
      const unhandled: never = job;
      throw new InvalidJobError("Unknown job type", { job: unhandled });
    }
  }
}
