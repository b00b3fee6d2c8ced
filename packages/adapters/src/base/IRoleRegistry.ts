// ============================================
// Role Registry ("cluster") Interface
// ============================================

import { keccak256, toHex, type Hex } from "viem";
import type { Address } from "@stakequeue/common";

export const PAUSABLE_ROLE: Hex = keccak256(toHex("PAUSABLE_ROLE"));
export const COOLDOWN_ADMIN_ROLE: Hex = keccak256(toHex("COOLDOWN_ADMIN_ROLE"));

export interface IRoleRegistry {
  readonly address: Address;

  hasRole(account: Address, role: Hex): Promise<boolean>;
}
