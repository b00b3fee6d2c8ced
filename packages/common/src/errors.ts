// ============================================
// Error Hierarchy
// ============================================

import type { Address } from "./types/chain.js";
import { PauseDirection } from "./types/strategy.js";

/**
 * Base error class for all application errors
 */
export class BaseError extends Error {
  constructor(
    message: string,
    public readonly context: Record<string, unknown>,
    public readonly retryable: boolean = false,
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// -------- Configuration Errors --------

export class ConfigurationError extends BaseError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, context, false);
    this.name = "ConfigurationError";
  }
}

// -------- Strategy Errors --------

export class StrategyError extends BaseError {
  constructor(
    message: string,
    context: Record<string, unknown>,
    retryable: boolean = false,
  ) {
    super(message, context, retryable);
    this.name = "StrategyError";
  }
}

export class NotOwnerError extends StrategyError {
  constructor(caller: Address, operation: string) {
    super(`Caller ${caller} is not the owner (${operation})`, { caller, operation });
    this.name = "NotOwnerError";
  }
}

export class PauserNotAuthorizedError extends StrategyError {
  constructor(caller: Address) {
    super(`Caller ${caller} may not change pause state`, { caller });
    this.name = "PauserNotAuthorizedError";
  }
}

export class CooldownNotAuthorizedError extends StrategyError {
  constructor(caller: Address) {
    super(`Caller ${caller} may not request a cooldown`, { caller });
    this.name = "CooldownNotAuthorizedError";
  }
}

export class DepositBlockedError extends StrategyError {
  constructor() {
    super("Deposits are paused", {});
    this.name = "DepositBlockedError";
  }
}

export class WithdrawBlockedError extends StrategyError {
  constructor() {
    super("Withdrawals are paused", {});
    this.name = "WithdrawBlockedError";
  }
}

/** Paused-gate error for a direction. */
export function blockedError(direction: PauseDirection): StrategyError {
  return direction === PauseDirection.DEPOSIT ? new DepositBlockedError() : new WithdrawBlockedError();
}

export class InsufficientFundsError extends StrategyError {
  constructor(
    public readonly requested: bigint,
    public readonly available: bigint,
  ) {
    super(
      `Insufficient funds: requested ${requested}, available ${available}`,
      { requested, available },
      // More liquidity may arrive (deposits, matured cooldowns)
      true,
    );
    this.name = "InsufficientFundsError";
  }
}

export class TransferFailedError extends StrategyError {
  constructor(to: Address, amount: bigint) {
    super(`Native transfer of ${amount} to ${to} failed`, { to, amount });
    this.name = "TransferFailedError";
  }
}

export class ReentrantCallError extends StrategyError {
  constructor(operation: string, inFlight: string) {
    super(`${operation} called while ${inFlight} is in progress`, { operation, inFlight });
    this.name = "ReentrantCallError";
  }
}

export class NegativeAmountError extends StrategyError {
  constructor(
    public readonly field: string,
    public readonly amount: bigint,
  ) {
    super(`${field} must not be negative, got ${amount}`, { field, amount });
    this.name = "NegativeAmountError";
  }
}

// -------- Worker Errors --------

/** Queue job whose payload cannot be turned into a strategy call */
export class InvalidJobError extends BaseError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, context, false);
    this.name = "InvalidJobError";
  }
}

// -------- Adapter Errors --------

/**
 * A simulated contract call reverted. `reason` carries the custom error name
 * the real contract would revert with.
 */
export class SimulatedRevertError extends BaseError {
  constructor(
    public readonly contract: string,
    public readonly reason: string,
    context: Record<string, unknown> = {},
  ) {
    super(`${contract} reverted: ${reason}`, context, false);
    this.name = "SimulatedRevertError";
  }
}

export class TransactionRevertedError extends BaseError {
  constructor(functionName: string, hash: string) {
    super(`Transaction ${functionName} reverted`, { functionName, hash }, false);
    this.name = "TransactionRevertedError";
  }
}
