// ============================================
// EVM Strategy Factory
//
// Binds the strategy to live contracts through viem. Each collaborator call
// is its own transaction, so there is no chain-level rollback here.
// ============================================

import { createLogger, requireSetting, type AppConfig } from "@stakequeue/common";
import {
  createEvmClients,
  EvmErc20Token,
  EvmNativeBalance,
  EvmRoleRegistry,
  EvmStakingVault,
  EvmWrapAdapter,
} from "@stakequeue/adapters";
import { CooldownStakingStrategy } from "../strategy/CooldownStakingStrategy.js";

const logger = createLogger("strategy:evm");

export async function createEvmStrategy(config: AppConfig): Promise<CooldownStakingStrategy> {
  const clients = createEvmClients({
    chain: config.chain,
    rpcUrl: config.rpcUrl,
    privateKey: requireSetting(config.privateKey, "STRATEGY_PRIVATE_KEY"),
  });

  const wrappedAsset = requireSetting(config.contracts.wrappedAsset, "WRAPPED_ASSET_ADDRESS");
  const stakingVault = new EvmStakingVault(
    clients,
    requireSetting(config.contracts.stakingVault, "STAKING_VAULT_ADDRESS"),
  );
  const wrapAdapter = new EvmWrapAdapter(
    clients,
    requireSetting(config.contracts.wrapAdapter, "WRAP_ADAPTER_ADDRESS"),
    wrappedAsset,
  );
  const cluster = new EvmRoleRegistry(clients, requireSetting(config.contracts.cluster, "CLUSTER_ADDRESS"));

  const stakingAsset = await stakingVault.asset();
  logger.info("Resolved staking asset", { vault: stakingVault.address, asset: stakingAsset });

  return CooldownStakingStrategy.create(
    {
      account: clients.account,
      wrappedAsset: new EvmErc20Token(clients, wrappedAsset),
      underlyingAsset: new EvmErc20Token(clients, stakingAsset),
      stakingVault,
      wrapAdapter,
      cluster,
      native: new EvmNativeBalance(clients),
    },
    {
      owner: config.strategy.owner ?? clients.account,
      name: config.strategy.name,
      description: config.strategy.description,
      depositThreshold: config.strategy.depositThreshold,
    },
  );
}
