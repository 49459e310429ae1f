import { DEFAULTS, FEE_POLICY, PRECISION } from "../config";
import { EngineContext } from "../context";
import {
  RebalanceCooldownError,
  RebalanceError,
  VolatilityTooHighError,
  mapError,
} from "../errors";
import { PoolRecord } from "../state/store";
import { PoolSlot } from "../types/engine";
import { floorToTickSpacing } from "../utils/math";
import { AnalyticsModule } from "./analytics";

export interface RebalanceOptions {
  /**
   * Skip the cooldown. Only the automation role may set this; the
   * manager enforces that before calling in.
   */
  force?: boolean;
}

/**
 * Target range of a rebalance.
 */
export interface TargetRange {
  tickLower: number;
  tickUpper: number;
}

/**
 * Rebalance module -- decides when a pool's liquidity should move and
 * moves every active position to the new range.
 */
export class RebalanceModule {
  private ctx: EngineContext;
  private analytics: AnalyticsModule;

  constructor(ctx: EngineContext, analytics: AnalyticsModule) {
    this.ctx = ctx;
    this.analytics = analytics;
  }

  /**
   * Whether the pool is due for a rebalance.
   *
   * Inside the cooldown the answer is always false. Otherwise a change in
   * the recommended width is enough; failing that, the tick drift since
   * the last observation relative to the current width must exceed the
   * rebalance threshold.
   */
  async checkRebalancingNeeded(poolId: string): Promise<boolean> {
    const { state } = this.ctx.store.get(poolId);
    if (this.inCooldown(state.lastRebalanceTimestamp)) return false;
    if (state.currentRangeWidth !== state.optimalRangeWidth) return true;

    const slot = await this.readSlot(poolId);
    const drift =
      (BigInt(Math.abs(slot.tick - state.lastTick)) * PRECISION.SCALE) /
      BigInt(state.currentRangeWidth);
    return drift > DEFAULTS.rebalanceThreshold;
  }

  /**
   * Throw instead of answering false when a rebalance is not allowed.
   *
   * @throws {RebalanceCooldownError} Cooldown has not elapsed
   * @throws {VolatilityTooHighError} Volatility is above the fee ladder's top rung
   */
  assertRebalanceAllowed(poolId: string): void {
    const { config, store } = this.ctx;
    const { state } = store.get(poolId);
    if (this.inCooldown(state.lastRebalanceTimestamp)) {
      throw new RebalanceCooldownError(
        poolId,
        state.lastRebalanceTimestamp + config.rebalanceCooldownSec,
      );
    }
    if (state.priceVolatilityEMA > FEE_POLICY.HIGH_VOLATILITY) {
      throw new VolatilityTooHighError(poolId, state.priceVolatilityEMA, FEE_POLICY.HIGH_VOLATILITY);
    }
  }

  /**
   * Range a rebalance would move positions to, centred on `tick`.
   *
   * @example
   * // tick 100, width 5, spacing 10 -> [90, 110)
   */
  targetRange(tick: number, rangeWidth: number, tickSpacing: number): TargetRange {
    const halfWidth = Math.trunc(rangeWidth / 2);
    return {
      tickLower: floorToTickSpacing(tick - halfWidth, tickSpacing),
      tickUpper: floorToTickSpacing(tick + halfWidth, tickSpacing) + tickSpacing,
    };
  }

  /**
   * Move every active position whose range differs from the target range.
   *
   * Each move withdraws from the old range and deposits into the new one;
   * the ledger changes only after both legs succeeded. Pool state is
   * updated once every move went through.
   *
   * @returns true when at least one position moved, or when forced;
   * false when the cooldown blocked the call
   */
  async rebalanceLiquidity(poolId: string, options: RebalanceOptions = {}): Promise<boolean> {
    const { config, store, events } = this.ctx;
    const record = store.get(poolId);
    const { state, key } = record;
    const force = options.force === true;

    if (!force && this.inCooldown(state.lastRebalanceTimestamp)) {
      config.logger?.debug("rebalanceLiquidity: cooldown active", {
        poolId,
        lastRebalanceTimestamp: state.lastRebalanceTimestamp,
      });
      return false;
    }

    const slot = await this.readSlot(poolId);
    const tick = slot.sqrtPriceX96 === 0n || slot.tick === 0 ? state.lastTick : slot.tick;
    const target = this.targetRange(tick, state.optimalRangeWidth, key.tickSpacing);
    const now = config.clock.now();

    let positionsMoved = 0;
    for (const [positionIndex, position] of record.positions.entries()) {
      if (!position.active) continue;
      if (position.tickLower === target.tickLower && position.tickUpper === target.tickUpper) {
        continue;
      }
      await this.reposition(record, positionIndex, target, now);
      positionsMoved++;
    }

    state.lastRebalanceTimestamp = now;
    state.currentRangeWidth = state.optimalRangeWidth;
    state.rebalanceCount += 1;
    this.analytics.recordRebalance(poolId);

    config.logger?.info("rebalanceLiquidity", {
      poolId,
      ...target,
      positionsMoved,
      force,
    });
    events.emit({
      type: "pool_rebalanced",
      poolId,
      timestamp: now,
      ...target,
      positionsMoved,
      rebalanceCount: state.rebalanceCount,
    });

    return positionsMoved > 0 || force;
  }

  private inCooldown(lastRebalanceTimestamp: number): boolean {
    const { config } = this.ctx;
    return config.clock.now() - lastRebalanceTimestamp < config.rebalanceCooldownSec;
  }

  private async readSlot(poolId: string): Promise<PoolSlot> {
    try {
      return await this.ctx.poolEngine.getCurrentTick(poolId);
    } catch (err) {
      this.ctx.config.logger?.error("rebalance: getCurrentTick failed", err);
      throw mapError(err, "getCurrentTick");
    }
  }

  private async reposition(
    record: PoolRecord,
    positionIndex: number,
    target: TargetRange,
    now: number,
  ): Promise<void> {
    const { config, events, poolEngine } = this.ctx;
    const poolId = record.key.poolId;
    const position = record.positions[positionIndex];
    const old = { tickLower: position.tickLower, tickUpper: position.tickUpper };
    const liquidity = position.liquidityProvided;

    try {
      await poolEngine.modifyLiquidity(poolId, { ...old, liquidityDelta: -liquidity });
    } catch (err) {
      config.logger?.error("reposition: withdraw failed", err);
      throw mapError(err, "modifyLiquidity");
    }

    try {
      await poolEngine.modifyLiquidity(poolId, { ...target, liquidityDelta: liquidity });
    } catch (depositErr) {
      config.logger?.error("reposition: deposit failed, restoring old range", depositErr);
      try {
        await poolEngine.modifyLiquidity(poolId, { ...old, liquidityDelta: liquidity });
      } catch (restoreErr) {
        config.logger?.error("reposition: restore failed", restoreErr);
        throw new RebalanceError(poolId, positionIndex, {
          ...old,
          liquidity: liquidity.toString(),
          depositError: depositErr,
          restoreError: restoreErr,
        });
      }
      throw mapError(depositErr, "modifyLiquidity");
    }

    position.tickLower = target.tickLower;
    position.tickUpper = target.tickUpper;
    position.lastRebalanceTimestamp = now;

    events.emit({
      type: "position_rebalanced",
      poolId,
      timestamp: now,
      positionIndex,
      oldTickLower: old.tickLower,
      oldTickUpper: old.tickUpper,
      newTickLower: target.tickLower,
      newTickUpper: target.tickUpper,
    });
  }
}
