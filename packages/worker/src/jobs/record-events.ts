// ============================================
// Strategy Event Recorder
// ============================================

import { createLogger, toJson, type QueryFn, type StrategyEvent, type StrategyEventListener } from "@stakequeue/common";

const logger = createLogger("worker:events");

export const INSERT_EVENT_SQL =
  "INSERT INTO strategy_events (strategy, event_type, payload) VALUES ($1, $2, $3)";

/**
 * Collects events as the strategy emits them; `flush` writes them out in
 * emission order. Listeners are synchronous, the database is not.
 */
export class EventRecorder {
  private pending: StrategyEvent[] = [];

  constructor(
    private readonly query: QueryFn,
    private readonly strategy: string,
  ) {}

  readonly listener: StrategyEventListener = (event) => {
    this.pending.push(event);
  };

  get size(): number {
    return this.pending.length;
  }

  async flush(): Promise<number> {
    const batch = this.pending;
    this.pending = [];

    for (const [i, event] of batch.entries()) {
      try {
        await this.query(INSERT_EVENT_SQL, [this.strategy, event.type, toJson(event)]);
      } catch (err) {
        // Keep what was not written for the next flush
        this.pending = [...batch.slice(i), ...this.pending];
        throw err;
      }
    }

    if (batch.length > 0) logger.debug("Recorded strategy events", { count: batch.length });
    return batch.length;
  }
}
