import { DEFAULTS, PRECISION } from "../config";
import { EngineContext } from "../context";
import { PoolAnalytics } from "../types/pool";
import { min } from "../utils/math";

/**
 * Analytics module -- derived pool statistics.
 */
export class AnalyticsModule {
  private ctx: EngineContext;

  constructor(ctx: EngineContext) {
    this.ctx = ctx;
  }

  recordVolume(poolId: string, amount: bigint): void {
    this.ctx.store.get(poolId).analytics.totalVolume += amount;
  }

  /**
   * Average the previous value with the new EMA. This is a two-point
   * mean, not a second EMA.
   */
  recordVolatility(poolId: string, volatility: bigint): void {
    const { analytics } = this.ctx.store.get(poolId);
    analytics.averageVolatility = (analytics.averageVolatility + volatility) / 2n;
  }

  recordFeeRevenue(poolId: string, amount: bigint): void {
    this.ctx.store.get(poolId).analytics.totalFeeRevenue += amount;
  }

  /**
   * Recompute fee revenue per rebalance.
   */
  recordRebalance(poolId: string): void {
    const { state, analytics } = this.ctx.store.get(poolId);
    analytics.rebalanceEfficiency =
      state.rebalanceCount === 0 ? 0n : state.feeRevenueAccumulator / BigInt(state.rebalanceCount);
  }

  /**
   * Refresh the impermanent loss estimate and the update timestamp.
   */
  refresh(poolId: string): void {
    const { state, analytics } = this.ctx.store.get(poolId);
    const volatility = state.priceVolatilityEMA;
    analytics.impermanentLoss = min(
      (volatility * volatility) / DEFAULTS.impermanentLossDivisor,
      PRECISION.SCALE,
    );
    analytics.lastUpdateTimestamp = this.ctx.config.clock.now();
  }

  getPoolAnalytics(poolId: string): PoolAnalytics {
    return { ...this.ctx.store.get(poolId).analytics };
  }
}
