import { describe, it, expect, vi } from "vitest";
import { ReentrantCallError } from "@stakequeue/common";
import { CallGuard } from "../strategy/CallGuard.js";

function fakeSnapshots() {
  const restore = vi.fn(async () => {});
  const takeSnapshot = vi.fn(async () => ({ restore }));
  return { provider: { takeSnapshot }, takeSnapshot, restore };
}

/** Let every pending microtask run */
const settle = (): Promise<void> => new Promise<void>((resolve) => setTimeout(resolve, 0));

describe("CallGuard", () => {
  it("returns the body's result and releases the guard", async () => {
    const guard = new CallGuard();

    await expect(guard.run("op", async () => 7)).resolves.toBe(7);
    expect(guard.active).toBeUndefined();
  });

  it("rejects a second call while one is in flight", async () => {
    const guard = new CallGuard();
    let release = (): void => {};
    const first = guard.run(
      "onWithdraw",
      () =>
        new Promise<void>((resolve) => {
          release = () => resolve();
        }),
    );

    await expect(guard.run("onDeposit", async () => undefined)).rejects.toThrow(
      new ReentrantCallError("onDeposit", "onWithdraw").message,
    );
    expect(guard.active).toBe("onWithdraw");

    release();
    await first;
    expect(guard.active).toBeUndefined();
  });

  it("restores chain state when the body fails", async () => {
    const snapshots = fakeSnapshots();
    const guard = new CallGuard({ snapshots: snapshots.provider });

    await expect(
      guard.run("op", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(snapshots.takeSnapshot).toHaveBeenCalledTimes(1);
    expect(snapshots.restore).toHaveBeenCalledTimes(1);
    expect(guard.active).toBeUndefined();
  });

  it("leaves state alone on success", async () => {
    const snapshots = fakeSnapshots();
    const guard = new CallGuard({ snapshots: snapshots.provider });

    await guard.run("op", async () => "ok");

    expect(snapshots.restore).not.toHaveBeenCalled();
  });

  it("queues a serialized call until the guarded call settles", async () => {
    const snapshots = fakeSnapshots();
    const guard = new CallGuard({ snapshots: snapshots.provider });
    const order: string[] = [];
    let fail = (): void => {};
    const first = guard.run(
      "onWithdraw",
      () =>
        new Promise<void>((_resolve, reject) => {
          fail = () => reject(new Error("short"));
        }),
    );

    const queued = guard.serialize("requestCooldown", async () => {
      order.push(`cooldown after restore=${snapshots.restore.mock.calls.length}`);
      return 50n;
    });
    await settle();
    expect(order).toEqual([]);

    fail();
    await expect(first).rejects.toThrow("short");
    await expect(queued).resolves.toBe(50n);

    expect(order).toEqual(["cooldown after restore=1"]);
    expect(snapshots.takeSnapshot).toHaveBeenCalledTimes(1);
    expect(guard.active).toBeUndefined();
  });

  it("runs queued serialized calls one at a time", async () => {
    const guard = new CallGuard();
    const seen: Array<string | undefined> = [];
    let release = (): void => {};
    const first = guard.serialize(
      "rescueEth",
      () =>
        new Promise<void>((resolve) => {
          release = () => resolve();
        }),
    );
    const second = guard.serialize("requestCooldown", async () => {
      seen.push(guard.active);
    });

    await expect(guard.run("onDeposit", async () => undefined)).rejects.toBeInstanceOf(ReentrantCallError);

    release();
    await first;
    await second;
    expect(seen).toEqual(["requestCooldown"]);
  });
});
