import { EngineConfig, FEE_POLICY, ResolvedEngineConfig, resolveConfig } from "./config";
import { EngineContext } from "./context";
import { InvalidFeeError, mapError } from "./errors";
import { EventBus } from "./events";
import { AccessModule } from "./modules/access";
import { AnalyticsModule } from "./modules/analytics";
import { FeeModule } from "./modules/fees";
import { PositionModule } from "./modules/positions";
import { RebalanceModule, TargetRange } from "./modules/rebalance";
import { SignalsModule } from "./modules/signals";
import { PoolStore } from "./state/store";
import { SwapDirection } from "./types/common";
import { BalanceDelta, PoolEngine, SwapParams, TxContext } from "./types/engine";
import { LPPosition, PoolAnalytics, PoolKey, PoolMarketState } from "./types/pool";
import { KeyedSerializer } from "./utils/serial";
import { validatePoolId, validateTickSpacing } from "./utils/validation";

/**
 * Main entry point of the engine.
 *
 * Owns the per-pool store, wires the modules together and exposes the
 * hook callbacks the host pool engine drives, the position and access
 * operations, and read-only queries. Every mutation of a pool runs
 * through a per-pool queue, so operations on one pool never interleave
 * while different pools proceed independently. The modules stay private
 * so no mutation can bypass that queue.
 */
export class LiquidityManager {
  readonly config: ResolvedEngineConfig;
  readonly events: EventBus;

  private access: AccessModule;
  private analytics: AnalyticsModule;
  private signals: SignalsModule;
  private fees: FeeModule;
  private positions: PositionModule;
  private rebalancer: RebalanceModule;

  private store = new PoolStore();
  private queue = new KeyedSerializer();

  constructor(poolEngine: PoolEngine, config: EngineConfig) {
    this.config = resolveConfig(config);
    this.events = new EventBus(this.config.logger);

    const ctx: EngineContext = {
      config: this.config,
      store: this.store,
      events: this.events,
      poolEngine,
    };

    this.access = new AccessModule(
      this.config.owner,
      this.config.automationAccounts,
      this.config.logger,
    );
    this.analytics = new AnalyticsModule(ctx);
    this.signals = new SignalsModule(ctx, this.analytics);
    this.fees = new FeeModule(ctx);
    this.positions = new PositionModule(ctx, this.signals);
    this.rebalancer = new RebalanceModule(ctx, this.analytics);
  }

  // ---------------------------------------------------------------------------
  // Host hooks
  // ---------------------------------------------------------------------------

  /**
   * Seed a pool's market state when the host initializes the pool.
   *
   * @throws {InvalidFeeError} Configured fee outside [MIN_FEE, MAX_FEE]
   */
  async onPoolInitialized(key: PoolKey, tick: number): Promise<void> {
    validatePoolId(key.poolId);
    validateTickSpacing(key.tickSpacing);
    if (
      !Number.isInteger(key.fee) ||
      key.fee < FEE_POLICY.MIN_FEE ||
      key.fee > FEE_POLICY.MAX_FEE
    ) {
      throw new InvalidFeeError(key.fee, FEE_POLICY.MIN_FEE, FEE_POLICY.MAX_FEE);
    }

    await this.serialize(key.poolId, async () => {
      this.store.create(key, {
        tick,
        rangeWidth: this.config.defaultRangeWidth,
        liquidityDepth: this.config.initialLiquidityDepth,
        timestamp: this.config.clock.now(),
      });
      this.config.logger?.info("onPoolInitialized", { poolId: key.poolId, tick });
    });
  }

  /**
   * Fee for the swap about to execute. Stores it as the pool's current fee.
   */
  async beforeSwap(poolId: string): Promise<{ fee: number }> {
    return this.serialize(poolId, async () => ({ fee: this.fees.syncFee(poolId) }));
  }

  /**
   * Fold a completed swap into the market signals, then rebalance when due.
   */
  async afterSwap(
    poolId: string,
    swap: SwapParams,
    delta: BalanceDelta,
    tx: TxContext,
  ): Promise<{ rebalanced: boolean }> {
    return this.serialize(poolId, async () => {
      await this.signals.updateMarketConditions(poolId, swap.amountSpecified);
      this.signals.updateMovingAverageGasPrice(poolId, tx.gasPrice);
      this.signals.updatePriceImpact(poolId, swap.direction, swap.amountSpecified, delta);

      const { currentFee } = this.store.get(poolId).state;
      this.signals.updateFeeRevenue(poolId, swap.amountSpecified, currentFee);

      if (!(await this.rebalancer.checkRebalancingNeeded(poolId))) {
        return { rebalanced: false };
      }
      return { rebalanced: await this.rebalancer.rebalanceLiquidity(poolId) };
    });
  }

  /**
   * Liquidity added at the pool outside the managed positions.
   */
  async afterAddLiquidity(poolId: string, liquidityDelta: bigint): Promise<void> {
    await this.serialize(poolId, async () => {
      this.signals.updateLiquidityDepth(poolId, liquidityDelta);
      await this.signals.updateMarketConditions(poolId, 0n);
    });
  }

  /**
   * Liquidity removed at the pool outside the managed positions.
   *
   * @param liquidityDelta - Amount removed, as a positive number
   */
  async afterRemoveLiquidity(poolId: string, liquidityDelta: bigint): Promise<void> {
    await this.serialize(poolId, async () => {
      this.signals.updateLiquidityDepth(poolId, -liquidityDelta);
      await this.signals.updateMarketConditions(poolId, 0n);
    });
  }

  // ---------------------------------------------------------------------------
  // Market signals
  // ---------------------------------------------------------------------------

  async updateMarketConditions(poolId: string, signedSwapAmount: bigint): Promise<void> {
    await this.serialize(poolId, () =>
      this.signals.updateMarketConditions(poolId, signedSwapAmount),
    );
  }

  async updateMovingAverageGasPrice(poolId: string, gasPrice: bigint): Promise<void> {
    await this.serialize(poolId, async () =>
      this.signals.updateMovingAverageGasPrice(poolId, gasPrice),
    );
  }

  async updatePriceImpact(
    poolId: string,
    direction: SwapDirection,
    amountSpecified: bigint,
    delta: BalanceDelta,
  ): Promise<void> {
    await this.serialize(poolId, async () =>
      this.signals.updatePriceImpact(poolId, direction, amountSpecified, delta),
    );
  }

  /**
   * @returns The fee amount charged
   */
  async updateFeeRevenue(poolId: string, amountSpecified: bigint, currentFee: number): Promise<bigint> {
    return this.serialize(poolId, async () =>
      this.signals.updateFeeRevenue(poolId, amountSpecified, currentFee),
    );
  }

  /**
   * @returns The new liquidity depth
   */
  async updateLiquidityDepth(poolId: string, liquidityDelta: bigint): Promise<bigint> {
    return this.serialize(poolId, async () =>
      this.signals.updateLiquidityDepth(poolId, liquidityDelta),
    );
  }

  // ---------------------------------------------------------------------------
  // Positions
  // ---------------------------------------------------------------------------

  async createPosition(
    poolId: string,
    owner: string,
    tickLower: number,
    tickUpper: number,
    liquidityAmount: bigint,
  ): Promise<number> {
    return this.serialize(poolId, () =>
      this.positions.createPosition(poolId, owner, tickLower, tickUpper, liquidityAmount),
    );
  }

  async removePosition(poolId: string, owner: string, positionIndex: number): Promise<bigint> {
    return this.serialize(poolId, () =>
      this.positions.removePosition(poolId, owner, positionIndex),
    );
  }

  async collectFees(poolId: string, owner: string, positionIndex: number): Promise<bigint> {
    return this.serialize(poolId, async () =>
      this.positions.collectFees(poolId, owner, positionIndex),
    );
  }

  // ---------------------------------------------------------------------------
  // Rebalancing
  // ---------------------------------------------------------------------------

  /**
   * Rebalance on behalf of an authorized rebalancer. The cooldown applies.
   *
   * @throws {UnauthorizedError} Caller is not an authorized rebalancer
   */
  async manualRebalance(poolId: string, caller: string): Promise<boolean> {
    this.access.requireRebalancer(caller, "rebalance");
    return this.serialize(poolId, () => this.rebalancer.rebalanceLiquidity(poolId));
  }

  /**
   * Rebalance through the cooldown on behalf of the automation role.
   *
   * @throws {UnauthorizedError} Caller does not hold the automation role
   */
  async forceRebalance(poolId: string, caller: string): Promise<boolean> {
    this.access.requireAutomation(caller, "force a rebalance");
    return this.serialize(poolId, () =>
      this.rebalancer.rebalanceLiquidity(poolId, { force: true }),
    );
  }

  async checkRebalancingNeeded(poolId: string): Promise<boolean> {
    return this.serialize(poolId, () => this.rebalancer.checkRebalancingNeeded(poolId));
  }

  /**
   * @throws {RebalanceCooldownError} Cooldown has not elapsed
   * @throws {VolatilityTooHighError} Volatility above the fee ladder's top rung
   */
  assertRebalanceAllowed(poolId: string): void {
    this.rebalancer.assertRebalanceAllowed(poolId);
  }

  targetRange(tick: number, rangeWidth: number, tickSpacing: number): TargetRange {
    return this.rebalancer.targetRange(tick, rangeWidth, tickSpacing);
  }

  addAuthorizedRebalancer(caller: string, account: string): void {
    this.access.addAuthorizedRebalancer(caller, account);
  }

  removeAuthorizedRebalancer(caller: string, account: string): void {
    this.access.removeAuthorizedRebalancer(caller, account);
  }

  isAuthorizedRebalancer(account: string): boolean {
    return this.access.isAuthorizedRebalancer(account);
  }

  grantAutomation(caller: string, account: string): void {
    this.access.grantAutomation(caller, account);
  }

  revokeAutomation(caller: string, account: string): void {
    this.access.revokeAutomation(caller, account);
  }

  hasAutomationRole(account: string): boolean {
    return this.access.hasAutomationRole(account);
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  getPoolState(poolId: string): PoolMarketState {
    return { ...this.store.get(poolId).state };
  }

  getPoolKey(poolId: string): PoolKey {
    return { ...this.store.get(poolId).key };
  }

  getPositions(poolId: string): LPPosition[] {
    return this.positions.getPositions(poolId);
  }

  getPosition(poolId: string, positionIndex: number): LPPosition {
    return this.positions.getPosition(poolId, positionIndex);
  }

  getOwnerPositions(owner: string, poolId: string): number[] {
    return this.positions.getOwnerPositions(owner, poolId);
  }

  getPoolAnalytics(poolId: string): PoolAnalytics {
    return this.analytics.getPoolAnalytics(poolId);
  }

  getDynamicFee(poolId: string): number {
    return this.fees.getDynamicFee(poolId);
  }

  estimateSwapFee(poolId: string, amount: bigint): { fee: number; feeAmount: bigint } {
    return this.fees.estimateSwapFee(poolId, amount);
  }

  isPoolInitialized(poolId: string): boolean {
    return this.store.has(poolId);
  }

  private serialize<T>(poolId: string, task: () => Promise<T>): Promise<T> {
    return this.queue.run(poolId, async () => {
      try {
        return await task();
      } catch (err) {
        throw mapError(err, "pool operation");
      }
    });
  }
}
