import { describe, it, expect } from "vitest";
import { PauseDirection } from "@stakequeue/common";
import { EventRecorder, INSERT_EVENT_SQL } from "../jobs/record-events.js";
import { fakeQuery } from "./helpers.js";

describe("EventRecorder", () => {
  it("writes buffered events in emission order", async () => {
    const { query, calls } = fakeQuery();
    const recorder = new EventRecorder(query, "test-strategy");

    recorder.listener({ type: "DepositQueued", amount: 50n });
    recorder.listener({ type: "PauseToggled", direction: PauseDirection.DEPOSIT, previous: false, current: true });

    expect(await recorder.flush()).toBe(2);
    expect(calls).toEqual([
      { text: INSERT_EVENT_SQL, params: ["test-strategy", "DepositQueued", '{"type":"DepositQueued","amount":"50"}'] },
      {
        text: INSERT_EVENT_SQL,
        params: [
          "test-strategy",
          "PauseToggled",
          '{"type":"PauseToggled","direction":"deposit","previous":false,"current":true}',
        ],
      },
    ]);
    expect(recorder.size).toBe(0);
  });

  it("does nothing when there is nothing to write", async () => {
    const { query, calls } = fakeQuery();
    const recorder = new EventRecorder(query, "test-strategy");

    expect(await recorder.flush()).toBe(0);
    expect(calls).toEqual([]);
  });

  it("keeps unwritten events after a failed insert", async () => {
    const { query, calls } = fakeQuery(2);
    const recorder = new EventRecorder(query, "test-strategy");
    recorder.listener({ type: "DepositQueued", amount: 1n });
    recorder.listener({ type: "DepositQueued", amount: 2n });
    recorder.listener({ type: "DepositCommitted", amount: 3n });

    await expect(recorder.flush()).rejects.toThrow("connection reset");
    expect(recorder.size).toBe(2);

    expect(await recorder.flush()).toBe(2);
    expect(calls.map((call) => call.params[2])).toEqual([
      '{"type":"DepositQueued","amount":"1"}',
      '{"type":"DepositQueued","amount":"2"}',
      '{"type":"DepositQueued","amount":"2"}',
      '{"type":"DepositCommitted","amount":"3"}',
    ]);
  });
});
