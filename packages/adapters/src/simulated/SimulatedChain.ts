// ============================================
// In-Process Simulated Chain
//
// Plain balance and storage maps plus a clock. Backs the simulated
// contracts below, the strategy tests, and DRY_RUN mode.
// ============================================

import { SimulatedRevertError, type Address } from "@stakequeue/common";
import type { ISnapshotProvider, Snapshot } from "../base/ISnapshotProvider.js";

/** Pseudo-asset key for native currency balances */
export const NATIVE_ASSET: Address = "0xEeeeeEeeeEeEeeEeEeEeeEEEeeeeEeeeeeeeEEeE";

interface ChainState {
  timestamp: bigint;
  balances: Map<string, bigint>;   // `${asset}|${holder}`
  slots: Map<string, bigint>;      // `${contract}|${slot}`
}

export function sameAddress(a: Address, b: Address): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

function key(a: string, b: string): string {
  return `${a.toLowerCase()}|${b.toLowerCase()}`;
}

export class SimulatedChain implements ISnapshotProvider {
  private state: ChainState;

  constructor(startTimestamp: bigint = 1_700_000_000n) {
    this.state = { timestamp: startTimestamp, balances: new Map(), slots: new Map() };
  }

  // ---- Clock ----

  get timestamp(): bigint {
    return this.state.timestamp;
  }

  advanceTime(seconds: bigint): void {
    this.state.timestamp += seconds;
  }

  // ---- Balances ----

  balanceOf(asset: Address, holder: Address): bigint {
    return this.state.balances.get(key(asset, holder)) ?? 0n;
  }

  totalSupply(asset: Address): bigint {
    return this.readSlot(asset, "totalSupply");
  }

  mint(asset: Address, to: Address, amount: bigint): void {
    this.state.balances.set(key(asset, to), this.balanceOf(asset, to) + amount);
    this.writeSlot(asset, "totalSupply", this.totalSupply(asset) + amount);
  }

  burn(asset: Address, from: Address, amount: bigint, contract: string): void {
    this.debit(asset, from, amount, contract);
    this.writeSlot(asset, "totalSupply", this.totalSupply(asset) - amount);
  }

  move(asset: Address, from: Address, to: Address, amount: bigint, contract: string): void {
    this.debit(asset, from, amount, contract);
    this.state.balances.set(key(asset, to), this.balanceOf(asset, to) + amount);
  }

  private debit(asset: Address, from: Address, amount: bigint, contract: string): void {
    const balance = this.balanceOf(asset, from);
    if (balance < amount) {
      throw new SimulatedRevertError(contract, "ERC20InsufficientBalance", {
        holder: from,
        balance,
        needed: amount,
      });
    }
    this.state.balances.set(key(asset, from), balance - amount);
  }

  // ---- Contract storage ----

  readSlot(contract: Address, slot: string): bigint {
    return this.state.slots.get(key(contract, slot)) ?? 0n;
  }

  writeSlot(contract: Address, slot: string, value: bigint): void {
    this.state.slots.set(key(contract, slot), value);
  }

  // ---- Native currency ----

  /** Make `holder` revert on incoming native transfers */
  setRejectsNative(holder: Address, rejects: boolean): void {
    this.writeSlot(NATIVE_ASSET, `rejects:${holder}`, rejects ? 1n : 0n);
  }

  rejectsNative(holder: Address): boolean {
    return this.readSlot(NATIVE_ASSET, `rejects:${holder}`) === 1n;
  }

  // ---- Snapshots ----

  async takeSnapshot(): Promise<Snapshot> {
    const saved = structuredClone(this.state);
    return {
      restore: async () => {
        this.state = structuredClone(saved);
      },
    };
  }
}
