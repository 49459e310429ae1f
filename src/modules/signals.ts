import { DEFAULTS, PRECISION } from "../config";
import { EngineContext } from "../context";
import { mapError } from "../errors";
import { SwapDirection } from "../types/common";
import { BalanceDelta } from "../types/engine";
import { abs, incrementUint32, incrementalMean, min } from "../utils/math";
import { AnalyticsModule } from "./analytics";
import { calculateRangeWidth } from "./range";

/**
 * Signals module -- market-condition tracking.
 *
 * Keeps the volatility EMA, the fixed-window trading volume, liquidity
 * depth and the running gas price and price impact means of each pool.
 * The gas price and price impact figures are plain incremental means and
 * the analytics average is a two-point mean; only priceVolatilityEMA is
 * an exponential moving average.
 */
export class SignalsModule {
  private ctx: EngineContext;
  private analytics: AnalyticsModule;

  constructor(ctx: EngineContext, analytics: AnalyticsModule) {
    this.ctx = ctx;
    this.analytics = analytics;
  }

  /**
   * Fold a liquidity-affecting event into the pool's market signals.
   *
   * Volume accumulates in a fixed window that restarts once it is at
   * least `volumeWindowSec` old when an update begins. Volatility is the
   * EMA of the absolute tick change since the previous update; the first
   * nonzero change seeds it directly. The impermanent loss estimate is
   * refreshed from the new volatility.
   *
   * @param signedSwapAmount - Swap amount as reported by the host, 0 for liquidity events
   */
  async updateMarketConditions(poolId: string, signedSwapAmount: bigint): Promise<void> {
    const { config, store, events, poolEngine } = this.ctx;
    const { state } = store.get(poolId);

    // Tick is read before any state changes.
    let currentTick: number;
    try {
      currentTick = (await poolEngine.getCurrentTick(poolId)).tick;
    } catch (err) {
      config.logger?.error("updateMarketConditions: getCurrentTick failed", err);
      throw mapError(err, "getCurrentTick");
    }

    const now = config.clock.now();

    if (now - state.lastVolumeUpdate >= config.volumeWindowSec) {
      state.tradingVolume = 0n;
      state.lastVolumeUpdate = now;
    }

    if (signedSwapAmount !== 0n) {
      const volume = abs(signedSwapAmount);
      state.tradingVolume += volume;
      this.analytics.recordVolume(poolId, volume);
    }

    const absoluteChange = BigInt(Math.abs(currentTick - state.lastTick));
    if (state.priceVolatilityEMA === 0n) {
      state.priceVolatilityEMA = absoluteChange;
    } else {
      const alpha = DEFAULTS.volatilityAlpha;
      state.priceVolatilityEMA =
        (alpha * absoluteChange + (PRECISION.SCALE - alpha) * state.priceVolatilityEMA) /
        PRECISION.SCALE;
    }

    this.analytics.recordVolatility(poolId, state.priceVolatilityEMA);
    this.analytics.refresh(poolId);

    state.lastVolatilityUpdate = now;
    state.lastTick = currentTick;
    state.optimalRangeWidth = calculateRangeWidth(state.priceVolatilityEMA, state.liquidityDepth);

    config.logger?.debug("updateMarketConditions", {
      poolId,
      tick: currentTick,
      volatility: state.priceVolatilityEMA,
      optimalRangeWidth: state.optimalRangeWidth,
    });

    events.emit({
      type: "market_metrics_updated",
      poolId,
      timestamp: now,
      volatility: state.priceVolatilityEMA,
      volume: state.tradingVolume,
      liquidityDepth: state.liquidityDepth,
    });
  }

  /**
   * Fold the calling transaction's gas price into the running mean.
   *
   * The sample counter is 32 bits wide and wraps to 0; the sample after a
   * wrap seeds the mean again.
   */
  updateMovingAverageGasPrice(poolId: string, gasPrice: bigint): void {
    const { state } = this.ctx.store.get(poolId);
    state.movingAverageGasPrice = incrementalMean(
      state.movingAverageGasPrice,
      state.movingAverageGasPriceCount,
      gasPrice,
    );
    state.movingAverageGasPriceCount = incrementUint32(state.movingAverageGasPriceCount);
  }

  /**
   * Fold the ratio of output delta to specified amount into the running
   * price impact mean. Each sample is capped at 100% (SCALE). Zero amounts
   * leave the mean untouched.
   */
  updatePriceImpact(
    poolId: string,
    direction: SwapDirection,
    amountSpecified: bigint,
    delta: BalanceDelta,
  ): void {
    const outputDelta = direction === SwapDirection.ZERO_FOR_ONE ? delta.amount1 : delta.amount0;
    if (amountSpecified === 0n || outputDelta === 0n) return;

    const impact = min((abs(outputDelta) * PRECISION.SCALE) / abs(amountSpecified), PRECISION.SCALE);

    const { state } = this.ctx.store.get(poolId);
    state.averagePriceImpact = incrementalMean(
      state.averagePriceImpact,
      state.priceImpactCount,
      impact,
    );
    state.priceImpactCount = incrementUint32(state.priceImpactCount);
  }

  /**
   * Charge the swap's fee to the pool's revenue totals.
   *
   * @param currentFee - Fee in parts-per-million of the notional
   * @returns The fee amount added
   */
  updateFeeRevenue(poolId: string, amountSpecified: bigint, currentFee: number): bigint {
    const feeAmount = (abs(amountSpecified) * BigInt(currentFee)) / PRECISION.FEE_DENOMINATOR;
    this.ctx.store.get(poolId).state.feeRevenueAccumulator += feeAmount;
    this.analytics.recordFeeRevenue(poolId, feeAmount);
    return feeAmount;
  }

  /**
   * Apply a signed liquidity change to the pool's depth, never below zero.
   */
  updateLiquidityDepth(poolId: string, liquidityDelta: bigint): bigint {
    const { state } = this.ctx.store.get(poolId);
    const next = state.liquidityDepth + liquidityDelta;
    state.liquidityDepth = next < 0n ? 0n : next;
    return state.liquidityDepth;
  }
}
