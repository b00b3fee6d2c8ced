// ============================================
// Simulated World
//
// One chain with every collaborator the strategy needs, each bound to the
// strategy account.
// ============================================

import type { Address } from "@stakequeue/common";
import { SimulatedChain } from "./SimulatedChain.js";
import { SimulatedRoleRegistry } from "./SimulatedRoleRegistry.js";
import { SimulatedStakingVault } from "./SimulatedStakingVault.js";
import { SimulatedNativeBalance, SimulatedToken } from "./SimulatedToken.js";
import { SimulatedWrapAdapter } from "./SimulatedWrapAdapter.js";

export const SIMULATED_ADDRESSES = {
  wrapped: "0x5000000000000000000000000000000000000001",
  underlying: "0x5000000000000000000000000000000000000002",
  vault: "0x5000000000000000000000000000000000000003",
  silo: "0x5000000000000000000000000000000000000004",
  wrapAdapter: "0x5000000000000000000000000000000000000005",
  cluster: "0x5000000000000000000000000000000000000006",
} as const satisfies Record<string, Address>;

export interface SimulatedWorld {
  chain: SimulatedChain;
  account: Address;
  wrapped: SimulatedToken;
  underlying: SimulatedToken;
  vault: SimulatedStakingVault;
  wrapAdapter: SimulatedWrapAdapter;
  cluster: SimulatedRoleRegistry;
  native: SimulatedNativeBalance;
}

export interface SimulatedWorldOptions {
  cooldownDuration?: bigint;
  startTimestamp?: bigint;
}

export function createSimulatedWorld(account: Address, options: SimulatedWorldOptions = {}): SimulatedWorld {
  const chain = new SimulatedChain(options.startTimestamp);
  const vault = new SimulatedStakingVault(
    chain,
    { address: SIMULATED_ADDRESSES.vault, asset: SIMULATED_ADDRESSES.underlying, silo: SIMULATED_ADDRESSES.silo },
    account,
  );
  vault.setCooldownDuration(options.cooldownDuration ?? 0n);

  return {
    chain,
    account,
    wrapped: new SimulatedToken(chain, SIMULATED_ADDRESSES.wrapped, account, "wrapped"),
    underlying: new SimulatedToken(chain, SIMULATED_ADDRESSES.underlying, account, "underlying"),
    vault,
    wrapAdapter: new SimulatedWrapAdapter(
      chain,
      {
        address: SIMULATED_ADDRESSES.wrapAdapter,
        wrapped: SIMULATED_ADDRESSES.wrapped,
        underlying: SIMULATED_ADDRESSES.underlying,
      },
      account,
    ),
    cluster: new SimulatedRoleRegistry(chain, SIMULATED_ADDRESSES.cluster),
    native: new SimulatedNativeBalance(chain, account),
  };
}
