// ============================================
// Call Guard
//
// One in-flight call per strategy. Guarded calls fail fast when another
// call is running and roll the chain back if they fail; serialized calls
// wait their turn and are never captured by someone else's rollback.
// ============================================

import { ReentrantCallError } from "@stakequeue/common";
import type { ISnapshotProvider } from "@stakequeue/adapters";

export interface CallGuardOptions {
  /** Chain-level rollback for guarded calls */
  snapshots?: ISnapshotProvider;
}

export class CallGuard {
  private inFlight: string | undefined;
  private settled: Promise<void> = Promise.resolve();

  constructor(private readonly options: CallGuardOptions = {}) {}

  get active(): string | undefined {
    return this.inFlight;
  }

  async run<T>(operation: string, body: () => Promise<T>): Promise<T> {
    if (this.inFlight !== undefined) {
      throw new ReentrantCallError(operation, this.inFlight);
    }
    return this.enter(operation, () => this.atomically(body));
  }

  /** Queue behind whatever is in flight, then run exclusively without a snapshot. */
  async serialize<T>(operation: string, body: () => Promise<T>): Promise<T> {
    while (this.inFlight !== undefined) {
      await this.settled;
    }
    return this.enter(operation, body);
  }

  private async enter<T>(operation: string, body: () => Promise<T>): Promise<T> {
    this.inFlight = operation;
    let release = (): void => {};
    this.settled = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    try {
      return await body();
    } finally {
      this.inFlight = undefined;
      release();
    }
  }

  private async atomically<T>(body: () => Promise<T>): Promise<T> {
    const snapshot = this.options.snapshots ? await this.options.snapshots.takeSnapshot() : undefined;
    try {
      return await body();
    } catch (err) {
      if (snapshot) await snapshot.restore();
      throw err;
    }
  }
}
