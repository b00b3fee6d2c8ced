// ============================================
// Wrap Adapter Interface
// ============================================

import type { Address } from "@stakequeue/common";

/**
 * Converts between the staking asset (underlying) and the wrapped form
 * the aggregator deposits. Write methods act as the bound account.
 */
export interface IWrapAdapter {
  readonly address: Address;

  /** Pull `amount` underlying from `from`, mint wrapped to `to` */
  wrap(from: Address, to: Address, amount: bigint): Promise<void>;

  /** Burn `amount` wrapped from the bound account, send underlying to `to` */
  unwrap(to: Address, amount: bigint): Promise<void>;

  underlyingAsset(): Promise<Address>;
}
