// ============================================
// Simulated ERC20 & Native Balance
// ============================================

import type { Address } from "@stakequeue/common";
import type { IAssetToken, INativeBalance } from "../base/IAssetToken.js";
import { NATIVE_ASSET, type SimulatedChain } from "./SimulatedChain.js";

export class SimulatedToken implements IAssetToken {
  constructor(
    private readonly chain: SimulatedChain,
    readonly address: Address,
    private readonly account: Address,
    readonly symbol: string = "TOKEN",
  ) {}

  /** Same token, acting as another account */
  connect(account: Address): SimulatedToken {
    return new SimulatedToken(this.chain, this.address, account, this.symbol);
  }

  async balanceOf(holder: Address): Promise<bigint> {
    return this.chain.balanceOf(this.address, holder);
  }

  async transfer(to: Address, amount: bigint): Promise<void> {
    this.chain.move(this.address, this.account, to, amount, this.symbol);
  }

  mint(to: Address, amount: bigint): void {
    this.chain.mint(this.address, to, amount);
  }
}

export class SimulatedNativeBalance implements INativeBalance {
  constructor(
    private readonly chain: SimulatedChain,
    private readonly account: Address,
  ) {}

  async balanceOf(holder: Address): Promise<bigint> {
    return this.chain.balanceOf(NATIVE_ASSET, holder);
  }

  async send(to: Address, amount: bigint): Promise<boolean> {
    // A failed low-level call, not a revert of the sender
    if (this.chain.rejectsNative(to)) return false;
    if (this.chain.balanceOf(NATIVE_ASSET, this.account) < amount) return false;
    this.chain.move(NATIVE_ASSET, this.account, to, amount, "native");
    return true;
  }
}
