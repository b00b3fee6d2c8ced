// ============================================
// Simulated Wrap Adapter
// ============================================

import { SimulatedRevertError, type Address } from "@stakequeue/common";
import type { IWrapAdapter } from "../base/IWrapAdapter.js";
import { sameAddress, type SimulatedChain } from "./SimulatedChain.js";

export interface SimulatedWrapConfig {
  address: Address;
  wrapped: Address;
  underlying: Address;
}

/** 1:1 wrapper; the adapter contract holds the underlying backing every wrapped unit. */
export class SimulatedWrapAdapter implements IWrapAdapter {
  readonly address: Address;

  constructor(
    private readonly chain: SimulatedChain,
    private readonly config: SimulatedWrapConfig,
    private readonly account: Address,
  ) {
    this.address = config.address;
  }

  connect(account: Address): SimulatedWrapAdapter {
    return new SimulatedWrapAdapter(this.chain, this.config, account);
  }

  async underlyingAsset(): Promise<Address> {
    return this.config.underlying;
  }

  async wrap(from: Address, to: Address, amount: bigint): Promise<void> {
    if (!sameAddress(from, this.account)) {
      throw new SimulatedRevertError("WrapAdapter", "UnauthorizedFrom", { from, caller: this.account });
    }
    this.chain.move(this.config.underlying, from, this.address, amount, "underlying");
    this.chain.mint(this.config.wrapped, to, amount);
  }

  async unwrap(to: Address, amount: bigint): Promise<void> {
    this.chain.burn(this.config.wrapped, this.account, amount, "wrapped");
    this.chain.move(this.config.underlying, this.address, to, amount, "underlying");
  }

  /** Issue backed wrapped tokens to `to`, as if someone wrapped fresh underlying for them */
  fund(to: Address, amount: bigint): void {
    this.chain.mint(this.config.underlying, this.address, amount);
    this.chain.mint(this.config.wrapped, to, amount);
  }
}
