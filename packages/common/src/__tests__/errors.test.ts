import { describe, it, expect } from "vitest";
import {
  BaseError,
  blockedError,
  DepositBlockedError,
  errorMessage,
  NotOwnerError,
  SimulatedRevertError,
  StrategyError,
  WithdrawBlockedError,
} from "../errors.js";
import { PauseDirection } from "../types/strategy.js";

const CALLER = "0x00000000000000000000000000000000000000d1";

describe("errors", () => {
  it("picks the gate error by direction", () => {
    expect(blockedError(PauseDirection.DEPOSIT)).toBeInstanceOf(DepositBlockedError);
    expect(blockedError(PauseDirection.WITHDRAW)).toBeInstanceOf(WithdrawBlockedError);
  });

  it("carries context through the hierarchy", () => {
    const err = new NotOwnerError(CALLER, "setCluster");

    expect(err).toBeInstanceOf(StrategyError);
    expect(err).toBeInstanceOf(BaseError);
    expect(err.name).toBe("NotOwnerError");
    expect(err.message).toBe(`Caller ${CALLER} is not the owner (setCluster)`);
    expect(err.context).toEqual({ caller: CALLER, operation: "setCluster" });
    expect(err.retryable).toBe(false);
  });

  it("names the contract and reason of a simulated revert", () => {
    const err = new SimulatedRevertError("StakingVault", "InvalidCooldown");
    expect(err.message).toBe("StakingVault reverted: InvalidCooldown");
    expect(err.reason).toBe("InvalidCooldown");
  });

  it("extracts messages from anything thrown", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
  });
});
