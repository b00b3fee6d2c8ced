// ============================================
// Wrap Adapter (viem)
// ============================================

import type { Address } from "@stakequeue/common";
import type { IWrapAdapter } from "../../base/IWrapAdapter.js";
import { WRAP_ADAPTER_ABI } from "../abis.js";
import { confirm, type EvmClients } from "../clients.js";
import { ensureAllowance } from "../erc20/EvmErc20Token.js";

export class EvmWrapAdapter implements IWrapAdapter {
  constructor(
    private readonly clients: EvmClients,
    readonly address: Address,
    /** Wrapped token burned by unwrap() */
    private readonly wrappedAsset: Address,
  ) {}

  async underlyingAsset(): Promise<Address> {
    return this.clients.publicClient.readContract({
      address: this.address,
      abi: WRAP_ADAPTER_ABI,
      functionName: "underlyingAsset",
    });
  }

  async wrap(from: Address, to: Address, amount: bigint): Promise<void> {
    await ensureAllowance(this.clients, await this.underlyingAsset(), this.address, amount);
    const { request } = await this.clients.publicClient.simulateContract({
      account: this.clients.walletClient.account,
      address: this.address,
      abi: WRAP_ADAPTER_ABI,
      functionName: "wrap",
      args: [from, to, amount],
    });
    await confirm(this.clients, await this.clients.walletClient.writeContract(request), "wrap");
  }

  async unwrap(to: Address, amount: bigint): Promise<void> {
    await ensureAllowance(this.clients, this.wrappedAsset, this.address, amount);
    const { request } = await this.clients.publicClient.simulateContract({
      account: this.clients.walletClient.account,
      address: this.address,
      abi: WRAP_ADAPTER_ABI,
      functionName: "unwrap",
      args: [to, amount],
    });
    await confirm(this.clients, await this.clients.walletClient.writeContract(request), "unwrap");
  }
}
