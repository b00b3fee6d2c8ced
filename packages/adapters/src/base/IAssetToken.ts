// ============================================
// Token Ledger Interfaces
// ============================================

import type { Address } from "@stakequeue/common";

export interface IAssetToken {
  readonly address: Address;

  balanceOf(holder: Address): Promise<bigint>;

  /** Transfer from the bound account */
  transfer(to: Address, amount: bigint): Promise<void>;
}

export interface INativeBalance {
  balanceOf(holder: Address): Promise<bigint>;

  /** Send native currency from the bound account. Resolves false when the recipient rejects it. */
  send(to: Address, amount: bigint): Promise<boolean>;
}
