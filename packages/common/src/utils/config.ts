// ============================================
// Centralized Configuration
// ============================================

import dotenv from "dotenv";
import { CHAIN_CONFIGS } from "../constants/chains.js";
import { ConfigurationError } from "../errors.js";
import { Chain, isChain, type Address } from "../types/chain.js";
import { QUEUES } from "../types/events.js";
import { parseAmount } from "./math.js";

dotenv.config();

export interface AppConfig {
  // Network
  chain: Chain;
  rpcUrl: string;
  // Strategy account key; unused in dry-run mode
  privateKey?: `0x${string}`;
  contracts: {
    wrappedAsset?: Address;
    stakingVault?: Address;
    wrapAdapter?: Address;
    cluster?: Address;
  };
  strategy: {
    owner?: Address;
    name: string;
    description: string;
    depositThreshold: bigint;
    dryRun: boolean;
  };
  // Database
  postgres: {
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
  };
  // Redis
  redis: {
    host: string;
    port: number;
    password?: string;
  };
  worker: {
    queueName: string;
    reportIntervalMs: number;
  };
}

const ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;
const PRIVATE_KEY_RE = /^0x[0-9a-fA-F]{64}$/;

function isAddress(value: string): value is Address {
  return ADDRESS_RE.test(value);
}

function isPrivateKey(value: string): value is `0x${string}` {
  return PRIVATE_KEY_RE.test(value);
}

function optionalAddress(env: NodeJS.ProcessEnv, key: string): Address | undefined {
  const raw = env[key];
  if (!raw) return undefined;
  if (!isAddress(raw)) {
    throw new ConfigurationError(`${key} is not a valid address`, { key, value: raw });
  }
  return raw;
}

function integer(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ConfigurationError(`${key} must be a non-negative integer`, { key, value: raw });
  }
  return value;
}

function amount(env: NodeJS.ProcessEnv, key: string): bigint {
  const raw = env[key];
  if (!raw) return 0n;
  const value = parseAmount(raw);
  if (value === null) {
    throw new ConfigurationError(`${key} must be an integer amount in base units`, { key, value: raw });
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const chainName = (env.CHAIN || Chain.ETHEREUM).toLowerCase();
  if (!isChain(chainName)) {
    throw new ConfigurationError(`Unsupported chain: ${chainName}`, { chain: chainName });
  }

  const rawKey = env.STRATEGY_PRIVATE_KEY;
  if (rawKey && !isPrivateKey(rawKey)) {
    throw new ConfigurationError("STRATEGY_PRIVATE_KEY must be a 0x-prefixed 32-byte hex string");
  }

  return {
    chain: chainName,
    rpcUrl: env[`${chainName.toUpperCase()}_RPC_URL`] || CHAIN_CONFIGS[chainName].rpcUrl,
    privateKey: rawKey || undefined,
    contracts: {
      wrappedAsset: optionalAddress(env, "WRAPPED_ASSET_ADDRESS"),
      stakingVault: optionalAddress(env, "STAKING_VAULT_ADDRESS"),
      wrapAdapter: optionalAddress(env, "WRAP_ADAPTER_ADDRESS"),
      cluster: optionalAddress(env, "CLUSTER_ADDRESS"),
    },
    strategy: {
      owner: optionalAddress(env, "STRATEGY_OWNER"),
      name: env.STRATEGY_NAME || "Cooldown Staking Strategy",
      description:
        env.STRATEGY_DESCRIPTION ||
        "Batches wrapped deposits into a cooldown-gated staking vault",
      depositThreshold: amount(env, "DEPOSIT_THRESHOLD"),
      dryRun: env.DRY_RUN === "true",
    },
    postgres: {
      host: env.POSTGRES_HOST || "localhost",
      port: integer(env, "POSTGRES_PORT", 5432),
      database: env.POSTGRES_DB || "stakequeue",
      user: env.POSTGRES_USER || "stakequeue",
      password: env.POSTGRES_PASSWORD || "change_me_in_production",
    },
    redis: {
      host: env.REDIS_HOST || "localhost",
      port: integer(env, "REDIS_PORT", 6379),
      password: env.REDIS_PASSWORD || undefined,
    },
    worker: {
      queueName: env.STRATEGY_QUEUE || QUEUES.STRATEGY_OPS,
      reportIntervalMs: integer(env, "REPORT_INTERVAL_MS", 300_000),
    },
  };
}

/** Narrow an optional config value, failing with the env key that was missing. */
export function requireSetting<T>(value: T | undefined, key: string): T {
  if (value === undefined) {
    throw new ConfigurationError(`Missing required setting: ${key}`, { key });
  }
  return value;
}
