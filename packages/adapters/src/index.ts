// ============================================
// Adapters Package Entry
// ============================================

// Base interfaces
export type { IStakingVault, CooldownEntry } from "./base/IStakingVault.js";
export type { IWrapAdapter } from "./base/IWrapAdapter.js";
export type { IAssetToken, INativeBalance } from "./base/IAssetToken.js";
export type { IRoleRegistry } from "./base/IRoleRegistry.js";
export type { ISnapshotProvider, Snapshot } from "./base/ISnapshotProvider.js";
export { PAUSABLE_ROLE, COOLDOWN_ADMIN_ROLE } from "./base/IRoleRegistry.js";

// EVM adapters (viem)
export { createEvmClients, confirm, type EvmClients, type EvmClientOptions } from "./evm/clients.js";
export { EvmStakingVault } from "./evm/staking/EvmStakingVault.js";
export { EvmWrapAdapter } from "./evm/wrap/EvmWrapAdapter.js";
export { EvmErc20Token, EvmNativeBalance, ensureAllowance } from "./evm/erc20/EvmErc20Token.js";
export { EvmRoleRegistry } from "./evm/cluster/EvmRoleRegistry.js";

// Simulated contracts
export { SimulatedChain, NATIVE_ASSET, sameAddress } from "./simulated/SimulatedChain.js";
export { SimulatedToken, SimulatedNativeBalance } from "./simulated/SimulatedToken.js";
export {
  SimulatedStakingVault,
  MAX_COOLDOWN_DURATION,
  type SimulatedVaultConfig,
} from "./simulated/SimulatedStakingVault.js";
export { SimulatedWrapAdapter, type SimulatedWrapConfig } from "./simulated/SimulatedWrapAdapter.js";
export { SimulatedRoleRegistry } from "./simulated/SimulatedRoleRegistry.js";
export {
  createSimulatedWorld,
  SIMULATED_ADDRESSES,
  type SimulatedWorld,
  type SimulatedWorldOptions,
} from "./simulated/SimulatedWorld.js";
