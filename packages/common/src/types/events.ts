// ============================================
// Strategy Events & Queue Job Types
// ============================================

import type { Address } from "./chain.js";
import type { CooldownKind, PauseDirection, StakingModeKind } from "./strategy.js";

// Queue names
export const QUEUES = {
  STRATEGY_OPS: "strategy-ops",
} as const;

// ---- Signals emitted by the strategy ----

export type StrategyEvent =
  | { type: "DepositThresholdUpdated"; previous: bigint; current: bigint }
  | { type: "DepositQueued"; amount: bigint }
  | { type: "DepositCommitted"; amount: bigint }
  | { type: "Withdrawn"; recipient: Address; amount: bigint }
  | { type: "ClusterUpdated"; previous: Address; current: Address }
  | { type: "PauseToggled"; direction: PauseDirection; previous: boolean; current: boolean }
  | { type: "CooldownRequested"; kind: CooldownKind; quantity: bigint }
  | { type: "EmergencyWithdrawn"; mode: StakingModeKind; realized: bigint }
  | { type: "EthRescued"; to: Address; amount: bigint }
  | { type: "OwnershipTransferred"; previous: Address; current: Address };

export type StrategyEventType = StrategyEvent["type"];

export type StrategyEventListener = (event: StrategyEvent) => void;

// ---- Jobs consumed by the worker ----
// Amounts travel as decimal strings: BullMQ stores job data as JSON.

export type StrategyJob =
  | { type: "deposit"; amount: string }
  | { type: "withdraw"; recipient: Address; amount: string }
  | { type: "pause"; caller: Address; direction: PauseDirection; value: boolean }
  | { type: "threshold"; caller: Address; amount: string }
  | { type: "cooldown"; caller: Address; kind: CooldownKind; quantity: string }
  | { type: "emergency"; caller: Address };

export type StrategyJobType = StrategyJob["type"];
