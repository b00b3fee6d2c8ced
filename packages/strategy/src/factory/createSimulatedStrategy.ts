// ============================================
// Simulated Strategy Factory (dry run / tests)
// ============================================

import type { Address } from "@stakequeue/common";
import { createSimulatedWorld, type SimulatedWorld, type SimulatedWorldOptions } from "@stakequeue/adapters";
import { CooldownStakingStrategy, type StrategyOptions } from "../strategy/CooldownStakingStrategy.js";

export const SIMULATED_STRATEGY_ACCOUNT: Address = "0x5000000000000000000000000000000000000010";
export const SIMULATED_OWNER: Address = "0x5000000000000000000000000000000000000020";

export interface SimulatedStrategy {
  strategy: CooldownStakingStrategy;
  world: SimulatedWorld;
}

export async function createSimulatedStrategy(
  options: Partial<StrategyOptions> = {},
  worldOptions: SimulatedWorldOptions = {},
): Promise<SimulatedStrategy> {
  const world = createSimulatedWorld(SIMULATED_STRATEGY_ACCOUNT, worldOptions);
  const strategy = await CooldownStakingStrategy.create(
    {
      account: SIMULATED_STRATEGY_ACCOUNT,
      wrappedAsset: world.wrapped,
      underlyingAsset: world.underlying,
      stakingVault: world.vault,
      wrapAdapter: world.wrapAdapter,
      cluster: world.cluster,
      native: world.native,
      snapshots: world.chain,
    },
    { ...options, owner: options.owner ?? SIMULATED_OWNER },
  );
  return { strategy, world };
}
