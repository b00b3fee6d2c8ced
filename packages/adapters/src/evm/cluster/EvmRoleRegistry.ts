// ============================================
// Role Registry Adapter (viem)
// ============================================

import type { Hex } from "viem";
import type { Address } from "@stakequeue/common";
import type { IRoleRegistry } from "../../base/IRoleRegistry.js";
import { ROLE_REGISTRY_ABI } from "../abis.js";
import type { EvmClients } from "../clients.js";

export class EvmRoleRegistry implements IRoleRegistry {
  constructor(
    private readonly clients: EvmClients,
    readonly address: Address,
  ) {}

  async hasRole(account: Address, role: Hex): Promise<boolean> {
    return this.clients.publicClient.readContract({
      address: this.address,
      abi: ROLE_REGISTRY_ABI,
      functionName: "hasRole",
      args: [account, role],
    });
  }
}
