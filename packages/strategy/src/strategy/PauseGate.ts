// ============================================
// Pause Gate
// ============================================

import { blockedError, PauseDirection } from "@stakequeue/common";

export type PauseState = Record<PauseDirection, boolean>;

export interface GateClosure {
  previous: boolean;
  /** Puts back `previous` unless the gate was set again since */
  undo: () => void;
}

/** Two independent gates; closing one never touches the other. */
export class PauseGate {
  private readonly state: PauseState = {
    [PauseDirection.DEPOSIT]: false,
    [PauseDirection.WITHDRAW]: false,
  };
  private readonly revisions: Record<PauseDirection, number> = {
    [PauseDirection.DEPOSIT]: 0,
    [PauseDirection.WITHDRAW]: 0,
  };

  isPaused(direction: PauseDirection): boolean {
    return this.state[direction];
  }

  /** Returns the previous value */
  set(direction: PauseDirection, value: boolean): boolean {
    const previous = this.state[direction];
    this.state[direction] = value;
    this.revisions[direction] += 1;
    return previous;
  }

  /** Close a gate for the duration of a call that may still fail. */
  close(direction: PauseDirection): GateClosure {
    const previous = this.set(direction, true);
    const revision = this.revisions[direction];
    return {
      previous,
      undo: () => {
        if (this.revisions[direction] === revision) this.set(direction, previous);
      },
    };
  }

  assertOpen(direction: PauseDirection): void {
    if (this.state[direction]) throw blockedError(direction);
  }
}
