// ============================================
// Access Checks
// ============================================

import { NotOwnerError, type Address } from "@stakequeue/common";
import { sameAddress, type IRoleRegistry } from "@stakequeue/adapters";
import type { Hex } from "viem";

export function assertOwner(caller: Address, owner: Address, operation: string): void {
  if (!sameAddress(caller, owner)) throw new NotOwnerError(caller, operation);
}

/** Owner always passes; anyone else needs `role` in the registry. */
export async function isOwnerOrRole(
  caller: Address,
  owner: Address,
  cluster: IRoleRegistry,
  role: Hex,
): Promise<boolean> {
  if (sameAddress(caller, owner)) return true;
  return cluster.hasRole(caller, role);
}
