// ============================================
// Cooldown Staking Strategy
//
// Custody/accounting adapter between a vault aggregator and a staking vault
// that may redeem through a cooldown. Deposits queue as wrapped balance and
// are committed in batches; withdrawals draw from held balance first, then
// from the pool.
// ============================================

import {
  ConfigurationError,
  CooldownKind,
  CooldownNotAuthorizedError,
  createLogger,
  errorMessage,
  PauseDirection,
  PauserNotAuthorizedError,
  TransferFailedError,
  ZERO_ADDRESS,
  type Address,
  type StrategyEvent,
  type StrategyEventListener,
  type StrategyStatus,
} from "@stakequeue/common";
import {
  COOLDOWN_ADMIN_ROLE,
  PAUSABLE_ROLE,
  sameAddress,
  type IAssetToken,
  type INativeBalance,
  type IRoleRegistry,
  type ISnapshotProvider,
  type IStakingVault,
  type IWrapAdapter,
} from "@stakequeue/adapters";
import { assertOwner, isOwnerOrRole } from "./access.js";
import { CallGuard } from "./CallGuard.js";
import { PauseGate } from "./PauseGate.js";
import { assertNonNegative, planWithdrawal, shouldCommit } from "./redemption.js";
import { resolveStakingMode } from "./stakingMode.js";

const logger = createLogger("strategy");

export interface StrategyDependencies {
  /** Address the strategy holds funds under */
  account: Address;
  wrappedAsset: IAssetToken;
  /** The staking vault's asset, as held by the strategy between unwrap and deposit */
  underlyingAsset: IAssetToken;
  stakingVault: IStakingVault;
  wrapAdapter: IWrapAdapter;
  cluster: IRoleRegistry;
  native: INativeBalance;
  snapshots?: ISnapshotProvider;
}

export interface StrategyOptions {
  owner: Address;
  name?: string;
  description?: string;
  depositThreshold?: bigint;
}

type Emit = (event: StrategyEvent) => void;

/**
 * `guarded`: fails fast while another call is in flight, rolls the chain back on failure.
 * `serialized`: waits for the call in flight; for single chain writes.
 * `open`: local state only, runs immediately.
 */
type CallMode = "guarded" | "serialized" | "open";

export class CooldownStakingStrategy {
  private readonly gate = new PauseGate();
  private readonly guard: CallGuard;
  private readonly listeners = new Set<StrategyEventListener>();
  private _owner: Address;
  private _cluster: IRoleRegistry;
  private _depositThreshold: bigint;
  private readonly _name: string;
  private readonly _description: string;

  private constructor(
    private readonly deps: StrategyDependencies,
    options: StrategyOptions,
  ) {
    this._owner = options.owner;
    this._cluster = deps.cluster;
    this._depositThreshold = options.depositThreshold ?? 0n;
    this._name = options.name ?? "Cooldown Staking Strategy";
    this._description = options.description ?? "Batches wrapped deposits into a cooldown-gated staking vault";
    this.guard = new CallGuard({ snapshots: deps.snapshots });
  }

  /**
   * Build a strategy after checking that its collaborators fit together:
   * the wrap adapter must unwrap into the vault's asset.
   */
  static async create(deps: StrategyDependencies, options: StrategyOptions): Promise<CooldownStakingStrategy> {
    if (sameAddress(options.owner, ZERO_ADDRESS)) {
      throw new ConfigurationError("Owner must not be the zero address");
    }
    if (sameAddress(deps.cluster.address, ZERO_ADDRESS)) {
      throw new ConfigurationError("Cluster must not be the zero address");
    }

    const [vaultAsset, unwrapsTo] = await Promise.all([
      deps.stakingVault.asset(),
      deps.wrapAdapter.underlyingAsset(),
    ]);
    if (!sameAddress(vaultAsset, unwrapsTo)) {
      throw new ConfigurationError("Wrap adapter underlying does not match the staking asset", {
        vaultAsset,
        underlying: unwrapsTo,
      });
    }
    if (!sameAddress(deps.underlyingAsset.address, vaultAsset)) {
      throw new ConfigurationError("Underlying token does not match the staking asset", {
        vaultAsset,
        token: deps.underlyingAsset.address,
      });
    }

    const strategy = new CooldownStakingStrategy(deps, options);
    logger.info("Strategy created", {
      account: deps.account,
      owner: options.owner,
      vault: deps.stakingVault.address,
      depositThreshold: strategy.depositThreshold,
    });
    return strategy;
  }

  // ---- Identity & accessors ----

  name(): string {
    return this._name;
  }

  description(): string {
    return this._description;
  }

  get account(): Address {
    return this.deps.account;
  }

  get owner(): Address {
    return this._owner;
  }

  get cluster(): IRoleRegistry {
    return this._cluster;
  }

  get depositThreshold(): bigint {
    return this._depositThreshold;
  }

  get depositPaused(): boolean {
    return this.gate.isPaused(PauseDirection.DEPOSIT);
  }

  get withdrawPaused(): boolean {
    return this.gate.isPaused(PauseDirection.WITHDRAW);
  }

  onEvent(listener: StrategyEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ---- Views (always live) ----

  /** Wrapped balance held by the strategy and not yet staked */
  queuedBalance(): Promise<bigint> {
    return this.deps.wrappedAsset.balanceOf(this.deps.account);
  }

  async currentBalance(): Promise<bigint> {
    const mode = await resolveStakingMode(this.deps.stakingVault);
    const [queued, pool] = await Promise.all([this.queuedBalance(), mode.available(this.deps.account)]);
    return queued + pool;
  }

  /** Readable pool amount for the current mode */
  async harvestable(): Promise<bigint> {
    const mode = await resolveStakingMode(this.deps.stakingVault);
    return mode.available(this.deps.account);
  }

  async pendingCooldownAmount(): Promise<bigint> {
    const entry = await this.deps.stakingVault.cooldowns(this.deps.account);
    return entry.underlyingAmount;
  }

  immediateWithdrawable(): Promise<bigint> {
    return this.deps.stakingVault.maxWithdraw(this.deps.account);
  }

  /** Timestamp the parked cooldown amount unlocks at; 0 when nothing is parked */
  async cooldownMaturity(): Promise<bigint> {
    const entry = await this.deps.stakingVault.cooldowns(this.deps.account);
    return entry.cooldownEnd;
  }

  async status(): Promise<StrategyStatus> {
    const mode = await resolveStakingMode(this.deps.stakingVault);
    const [queuedBalance, poolBalance] = await Promise.all([
      this.queuedBalance(),
      mode.available(this.deps.account),
    ]);
    return {
      name: this._name,
      owner: this._owner,
      depositThreshold: this._depositThreshold,
      depositPaused: this.depositPaused,
      withdrawPaused: this.withdrawPaused,
      mode: mode.kind,
      queuedBalance,
      poolBalance,
      currentBalance: queuedBalance + poolBalance,
    };
  }

  // ---- Aggregator entry points ----

  /**
   * Called after the aggregator moved `amount` of wrapped asset in. Commits
   * the whole queue once it is non-empty and at least the threshold, so a
   * zero threshold commits any non-empty queue. `amount` is only reported.
   */
  onDeposit(amount: bigint): Promise<void> {
    return this.perform("onDeposit", "guarded", async (emit) => {
      assertNonNegative("amount", amount);
      this.gate.assertOpen(PauseDirection.DEPOSIT);

      const queued = await this.queuedBalance();
      if (!shouldCommit(queued, this._depositThreshold)) {
        logger.info("Deposit queued", { amount, queued, threshold: this._depositThreshold });
        emit({ type: "DepositQueued", amount });
        return;
      }

      const realized = await this.measureUnderlying(() => this.deps.wrapAdapter.unwrap(this.deps.account, queued));
      await this.deps.stakingVault.deposit(realized, this.deps.account);

      logger.info("Deposit batch committed", { queued, staked: realized });
      emit({ type: "DepositCommitted", amount: queued });
    });
  }

  /** Deliver exactly `amount` of wrapped asset to `recipient`, or fail. */
  onWithdraw(recipient: Address, amount: bigint): Promise<void> {
    return this.perform("onWithdraw", "guarded", async (emit) => {
      assertNonNegative("amount", amount);
      this.gate.assertOpen(PauseDirection.WITHDRAW);

      const mode = await resolveStakingMode(this.deps.stakingVault);
      const available = await mode.available(this.deps.account);
      const held = await this.queuedBalance();
      const plan = planWithdrawal(amount, held, available);

      if (plan.poolDraw > 0n) {
        const realized = await this.measureUnderlying(() => mode.realize(this.deps.account, plan.poolDraw));
        await this.rewrap(realized);
        logger.info("Drew from staking pool", { mode: mode.kind, poolDraw: plan.poolDraw, realized });
      }

      await this.deps.wrappedAsset.transfer(recipient, amount);

      logger.info("Withdrawal delivered", { recipient, amount, fromHeld: amount - plan.poolDraw });
      emit({ type: "Withdrawn", recipient, amount });
    });
  }

  // ---- Administration ----

  setPause(caller: Address, direction: PauseDirection, value: boolean): Promise<void> {
    return this.perform("setPause", "open", async (emit) => {
      if (!(await isOwnerOrRole(caller, this._owner, this._cluster, PAUSABLE_ROLE))) {
        throw new PauserNotAuthorizedError(caller);
      }
      const previous = this.gate.set(direction, value);
      logger.info("Pause toggled", { caller, direction, previous, current: value });
      emit({ type: "PauseToggled", direction, previous, current: value });
    });
  }

  setDepositThreshold(caller: Address, amount: bigint): Promise<void> {
    return this.perform("setDepositThreshold", "open", async (emit) => {
      assertOwner(caller, this._owner, "setDepositThreshold");
      assertNonNegative("threshold", amount);
      const previous = this._depositThreshold;
      this._depositThreshold = amount;
      logger.info("Deposit threshold updated", { previous, current: amount });
      emit({ type: "DepositThresholdUpdated", previous, current: amount });
    });
  }

  setCluster(caller: Address, cluster: IRoleRegistry): Promise<void> {
    return this.perform("setCluster", "open", async (emit) => {
      assertOwner(caller, this._owner, "setCluster");
      if (sameAddress(cluster.address, ZERO_ADDRESS)) {
        throw new ConfigurationError("Cluster must not be the zero address");
      }
      const previous = this._cluster.address;
      this._cluster = cluster;
      logger.info("Cluster updated", { previous, current: cluster.address });
      emit({ type: "ClusterUpdated", previous, current: cluster.address });
    });
  }

  /**
   * Start (or top up) a cooldown on the vault. Returns shares burned for
   * `ASSETS`, assets parked for `SHARES`.
   */
  requestCooldown(caller: Address, kind: CooldownKind, quantity: bigint): Promise<bigint> {
    return this.perform("requestCooldown", "serialized", async (emit) => {
      if (!(await isOwnerOrRole(caller, this._owner, this._cluster, COOLDOWN_ADMIN_ROLE))) {
        throw new CooldownNotAuthorizedError(caller);
      }
      assertNonNegative("quantity", quantity);
      const result =
        kind === CooldownKind.ASSETS
          ? await this.deps.stakingVault.cooldownAssets(quantity)
          : await this.deps.stakingVault.cooldownShares(quantity);

      logger.info("Cooldown requested", { caller, kind, quantity, result });
      emit({ type: "CooldownRequested", kind, quantity });
      return result;
    });
  }

  cooldownAssets(caller: Address, assets: bigint): Promise<bigint> {
    return this.requestCooldown(caller, CooldownKind.ASSETS, assets);
  }

  cooldownShares(caller: Address, shares: bigint): Promise<bigint> {
    return this.requestCooldown(caller, CooldownKind.SHARES, shares);
  }

  /**
   * Close both gates and pull everything out of the pool into held wrapped
   * balance. Gates stay closed until reopened through `setPause`.
   */
  emergencyWithdraw(caller: Address): Promise<bigint> {
    return this.perform("emergencyWithdraw", "guarded", async (emit) => {
      assertOwner(caller, this._owner, "emergencyWithdraw");

      const closures = [PauseDirection.DEPOSIT, PauseDirection.WITHDRAW].map((direction) => {
        const closure = this.gate.close(direction);
        if (!closure.previous) emit({ type: "PauseToggled", direction, previous: false, current: true });
        return closure;
      });

      try {
        const mode = await resolveStakingMode(this.deps.stakingVault);
        const realized = await this.measureUnderlying(() => mode.exit(this.deps.account));
        await this.rewrap(realized);

        logger.warn("Emergency withdrawal executed", { mode: mode.kind, realized });
        emit({ type: "EmergencyWithdrawn", mode: mode.kind, realized });
        return realized;
      } catch (err) {
        // Only gates this call closed; a setPause since then stands
        for (const closure of closures) closure.undo();
        throw err;
      }
    });
  }

  /** Send native currency stuck on the strategy account; defaults to all of it. */
  rescueEth(caller: Address, to: Address, amount?: bigint): Promise<bigint> {
    return this.perform("rescueEth", "serialized", async (emit) => {
      assertOwner(caller, this._owner, "rescueEth");
      if (amount !== undefined) assertNonNegative("amount", amount);
      const value = amount ?? (await this.deps.native.balanceOf(this.deps.account));
      if (!(await this.deps.native.send(to, value))) {
        throw new TransferFailedError(to, value);
      }
      logger.info("Native balance rescued", { to, amount: value });
      emit({ type: "EthRescued", to, amount: value });
      return value;
    });
  }

  transferOwnership(caller: Address, newOwner: Address): Promise<void> {
    return this.perform("transferOwnership", "open", async (emit) => {
      assertOwner(caller, this._owner, "transferOwnership");
      if (sameAddress(newOwner, ZERO_ADDRESS)) {
        throw new ConfigurationError("Owner must not be the zero address");
      }
      const previous = this._owner;
      this._owner = newOwner;
      logger.info("Ownership transferred", { previous, current: newOwner });
      emit({ type: "OwnershipTransferred", previous, current: newOwner });
    });
  }

  // ---- Internals ----

  /** Run an operation with its events held back until it succeeds. */
  private async perform<T>(operation: string, mode: CallMode, body: (emit: Emit) => Promise<T>): Promise<T> {
    const events: StrategyEvent[] = [];
    const emit: Emit = (event) => {
      events.push(event);
    };
    const run = (): Promise<T> => body(emit);
    try {
      const result =
        mode === "guarded"
          ? await this.guard.run(operation, run)
          : mode === "serialized"
            ? await this.guard.serialize(operation, run)
            : await run();
      this.deliver(events);
      return result;
    } catch (err) {
      logger.warn("Strategy call rejected", { operation, error: errorMessage(err) });
      throw err;
    }
  }

  private deliver(events: StrategyEvent[]): void {
    for (const event of events) {
      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (err) {
          // The operation already took effect
          logger.error("Event listener failed", { event: event.type, error: errorMessage(err) });
        }
      }
    }
  }

  /** Underlying received by the strategy account while `action` runs */
  private async measureUnderlying(action: () => Promise<void>): Promise<bigint> {
    const before = await this.deps.underlyingAsset.balanceOf(this.deps.account);
    await action();
    const after = await this.deps.underlyingAsset.balanceOf(this.deps.account);
    return after - before;
  }

  private async rewrap(amount: bigint): Promise<void> {
    if (amount === 0n) return;
    await this.deps.wrapAdapter.wrap(this.deps.account, this.deps.account, amount);
  }
}
