import { describe, it, expect } from "vitest";
import { InsufficientFundsError, NegativeAmountError, PauseDirection, DepositBlockedError, WithdrawBlockedError } from "@stakequeue/common";
import { planWithdrawal, shouldCommit } from "../strategy/redemption.js";
import { PauseGate } from "../strategy/PauseGate.js";

describe("planWithdrawal", () => {
  it("serves requests from held balance first", () => {
    expect(planWithdrawal(8n, 10n, 200n)).toEqual({ requested: 8n, held: 10n, available: 200n, poolDraw: 0n });
  });

  it("draws only the shortfall from the pool", () => {
    expect(planWithdrawal(50n, 10n, 200n).poolDraw).toBe(40n);
  });

  it("accepts a request equal to held plus available", () => {
    expect(planWithdrawal(210n, 10n, 200n).poolDraw).toBe(200n);
  });

  it("rejects a request above held plus available", () => {
    expect(() => planWithdrawal(211n, 10n, 200n)).toThrow("Insufficient funds: requested 211, available 210");
  });

  it("marks insufficiency as retryable", () => {
    let caught: unknown;
    try {
      planWithdrawal(1n, 0n, 0n);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InsufficientFundsError);
    expect(caught).toMatchObject({ requested: 1n, available: 0n, retryable: true });
  });

  it("rejects a negative request before checking funds", () => {
    expect(() => planWithdrawal(-5n, 0n, 0n)).toThrow(NegativeAmountError);
    expect(() => planWithdrawal(-5n, 0n, 0n)).toThrow("requested must not be negative, got -5");
  });
});

describe("shouldCommit", () => {
  it("commits at or above the threshold", () => {
    expect(shouldCommit(100n, 100n)).toBe(true);
    expect(shouldCommit(110n, 100n)).toBe(true);
    expect(shouldCommit(99n, 100n)).toBe(false);
  });

  it("never commits an empty queue", () => {
    expect(shouldCommit(0n, 0n)).toBe(false);
  });

  it("commits any queue with a zero threshold", () => {
    expect(shouldCommit(1n, 0n)).toBe(true);
  });
});

describe("PauseGate", () => {
  it("keeps the two directions independent", () => {
    const gate = new PauseGate();
    expect(gate.set(PauseDirection.DEPOSIT, true)).toBe(false);

    expect(gate.isPaused(PauseDirection.DEPOSIT)).toBe(true);
    expect(gate.isPaused(PauseDirection.WITHDRAW)).toBe(false);
    expect(() => gate.assertOpen(PauseDirection.DEPOSIT)).toThrow(DepositBlockedError);
    expect(() => gate.assertOpen(PauseDirection.WITHDRAW)).not.toThrow();
  });

  it("raises the withdraw error for the withdraw gate", () => {
    const gate = new PauseGate();
    gate.set(PauseDirection.WITHDRAW, true);
    expect(() => gate.assertOpen(PauseDirection.WITHDRAW)).toThrow(WithdrawBlockedError);
  });

  it("undoes a closure nobody has overridden", () => {
    const gate = new PauseGate();
    const closure = gate.close(PauseDirection.DEPOSIT);
    expect(closure.previous).toBe(false);

    closure.undo();
    expect(gate.isPaused(PauseDirection.DEPOSIT)).toBe(false);
  });

  it("keeps a later set over an undone closure", () => {
    const gate = new PauseGate();
    const closure = gate.close(PauseDirection.WITHDRAW);
    gate.set(PauseDirection.WITHDRAW, true);

    closure.undo();
    expect(gate.isPaused(PauseDirection.WITHDRAW)).toBe(true);
  });
});
