// ============================================
// Simulated Role Registry
// ============================================

import type { Hex } from "viem";
import type { Address } from "@stakequeue/common";
import type { IRoleRegistry } from "../base/IRoleRegistry.js";
import type { SimulatedChain } from "./SimulatedChain.js";

export class SimulatedRoleRegistry implements IRoleRegistry {
  constructor(
    private readonly chain: SimulatedChain,
    readonly address: Address,
  ) {}

  grantRole(role: Hex, account: Address): void {
    this.chain.writeSlot(this.address, `${role}:${account}`, 1n);
  }

  revokeRole(role: Hex, account: Address): void {
    this.chain.writeSlot(this.address, `${role}:${account}`, 0n);
  }

  async hasRole(account: Address, role: Hex): Promise<boolean> {
    return this.chain.readSlot(this.address, `${role}:${account}`) === 1n;
  }
}
