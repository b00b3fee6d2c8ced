import { describe, it, expect } from "vitest";
import { CHAIN_CONFIGS } from "../constants/chains.js";
import { ConfigurationError } from "../errors.js";
import { Chain } from "../types/chain.js";
import { loadConfig, requireSetting } from "../utils/config.js";

const VAULT = "0x00000000000000000000000000000000000000a1";

describe("loadConfig", () => {
  it("falls back to defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config.chain).toBe(Chain.ETHEREUM);
    expect(config.rpcUrl).toBe(CHAIN_CONFIGS[Chain.ETHEREUM].rpcUrl);
    expect(config.strategy.depositThreshold).toBe(0n);
    expect(config.strategy.dryRun).toBe(false);
    expect(config.worker.queueName).toBe("strategy-ops");
    expect(config.worker.reportIntervalMs).toBe(300_000);
    expect(config.contracts.stakingVault).toBeUndefined();
  });

  it("reads chain, rpc override, threshold and addresses", () => {
    const config = loadConfig({
      CHAIN: "Base",
      BASE_RPC_URL: "http://rpc.test",
      DEPOSIT_THRESHOLD: "100",
      STAKING_VAULT_ADDRESS: VAULT,
      DRY_RUN: "true",
    });

    expect(config.chain).toBe(Chain.BASE);
    expect(config.rpcUrl).toBe("http://rpc.test");
    expect(config.strategy.depositThreshold).toBe(100n);
    expect(config.contracts.stakingVault).toBe(VAULT);
    expect(config.strategy.dryRun).toBe(true);
  });

  it("rejects an unsupported chain", () => {
    expect(() => loadConfig({ CHAIN: "solana" })).toThrow(ConfigurationError);
  });

  it("rejects a fractional threshold", () => {
    expect(() => loadConfig({ DEPOSIT_THRESHOLD: "1.5" })).toThrow(
      "DEPOSIT_THRESHOLD must be an integer amount in base units",
    );
  });

  it("rejects a malformed address", () => {
    expect(() => loadConfig({ CLUSTER_ADDRESS: "0x1234" })).toThrow("CLUSTER_ADDRESS is not a valid address");
  });

  it("rejects a malformed private key", () => {
    expect(() => loadConfig({ STRATEGY_PRIVATE_KEY: "test-secret" })).toThrow(ConfigurationError);
  });
});

describe("requireSetting", () => {
  it("returns present values and names the missing key otherwise", () => {
    expect(requireSetting(VAULT, "STAKING_VAULT_ADDRESS")).toBe(VAULT);
    expect(() => requireSetting(undefined, "STAKING_VAULT_ADDRESS")).toThrow(
      "Missing required setting: STAKING_VAULT_ADDRESS",
    );
  });
});
