// ============================================
// Strategy Package Entry
// ============================================

export {
  CooldownStakingStrategy,
  type StrategyDependencies,
  type StrategyOptions,
} from "./strategy/CooldownStakingStrategy.js";
export {
  resolveStakingMode,
  ImmediateMode,
  CooldownMode,
  type StakingMode,
} from "./strategy/stakingMode.js";
export { assertNonNegative, planWithdrawal, shouldCommit, type WithdrawalPlan } from "./strategy/redemption.js";
export { PauseGate, type GateClosure, type PauseState } from "./strategy/PauseGate.js";
export { CallGuard, type CallGuardOptions } from "./strategy/CallGuard.js";
export { assertOwner, isOwnerOrRole } from "./strategy/access.js";
export {
  createSimulatedStrategy,
  SIMULATED_STRATEGY_ACCOUNT,
  SIMULATED_OWNER,
  type SimulatedStrategy,
} from "./factory/createSimulatedStrategy.js";
export { createEvmStrategy } from "./factory/createEvmStrategy.js";
