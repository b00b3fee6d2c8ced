import { beforeEach, describe, it, expect } from "vitest";
import {
  CooldownKind,
  InvalidJobError,
  PauseDirection,
  PauserNotAuthorizedError,
  type Address,
} from "@stakequeue/common";
import type { SimulatedWorld } from "@stakequeue/adapters";
import {
  createSimulatedStrategy,
  SIMULATED_OWNER as OWNER,
  SIMULATED_STRATEGY_ACCOUNT as ACCOUNT,
  type CooldownStakingStrategy,
} from "@stakequeue/strategy";
import { processStrategyJob } from "../jobs/process-strategy-job.js";

const RECIPIENT: Address = "0x00000000000000000000000000000000000000c1";
const STRANGER: Address = "0x00000000000000000000000000000000000000d1";

describe("processStrategyJob", () => {
  let strategy: CooldownStakingStrategy;
  let world: SimulatedWorld;

  beforeEach(async () => {
    ({ strategy, world } = await createSimulatedStrategy({}, { cooldownDuration: 60n }));
    world.wrapAdapter.fund(ACCOUNT, 100n);
  });

  it("commits deposits", async () => {
    expect(await processStrategyJob(strategy, { type: "deposit", amount: "100" })).toEqual({ type: "deposit" });
    expect(await strategy.harvestable()).toBe(0n);
    expect(await strategy.immediateWithdrawable()).toBe(100n);
  });

  it("pays withdrawals from held balance", async () => {
    await processStrategyJob(strategy, { type: "withdraw", recipient: RECIPIENT, amount: "40" });
    expect(await world.wrapped.balanceOf(RECIPIENT)).toBe(40n);
  });

  it("toggles a gate on behalf of the caller", async () => {
    await processStrategyJob(strategy, { type: "pause", caller: OWNER, direction: PauseDirection.WITHDRAW, value: true });
    expect(strategy.withdrawPaused).toBe(true);

    await expect(
      processStrategyJob(strategy, { type: "pause", caller: STRANGER, direction: PauseDirection.DEPOSIT, value: true }),
    ).rejects.toBeInstanceOf(PauserNotAuthorizedError);
  });

  it("updates the threshold", async () => {
    await processStrategyJob(strategy, { type: "threshold", caller: OWNER, amount: "500" });
    expect(strategy.depositThreshold).toBe(500n);
  });

  it("starts a cooldown and returns the shares burned", async () => {
    await processStrategyJob(strategy, { type: "deposit", amount: "100" });

    const outcome = await processStrategyJob(strategy, {
      type: "cooldown",
      caller: OWNER,
      kind: CooldownKind.ASSETS,
      quantity: "30",
    });

    expect(outcome).toEqual({ type: "cooldown", result: "30" });
    expect(await strategy.pendingCooldownAmount()).toBe(30n);
  });

  it("returns the realised amount of an emergency exit", async () => {
    await processStrategyJob(strategy, { type: "deposit", amount: "100" });
    await processStrategyJob(strategy, { type: "cooldown", caller: OWNER, kind: CooldownKind.SHARES, quantity: "100" });
    world.chain.advanceTime(60n);

    expect(await processStrategyJob(strategy, { type: "emergency", caller: OWNER })).toEqual({
      type: "emergency",
      result: "100",
    });
    expect(strategy.depositPaused).toBe(true);
  });

  it("rejects amounts that are not base-unit integers", async () => {
    await expect(processStrategyJob(strategy, { type: "deposit", amount: "1.5" })).rejects.toThrow(
      "Job field amount must be an integer amount in base units",
    );
    await expect(processStrategyJob(strategy, { type: "deposit", amount: "-3" })).rejects.toBeInstanceOf(
      InvalidJobError,
    );
    expect(await strategy.queuedBalance()).toBe(100n);
  });
});
