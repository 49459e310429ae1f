import { FEE_POLICY, PRECISION } from "../config";
import { EngineContext } from "../context";
import { PoolMarketState } from "../types/pool";
import { abs } from "../utils/math";

/**
 * Market signals the fee ladder reads.
 */
export type FeeInputs = Pick<
  PoolMarketState,
  "priceVolatilityEMA" | "tradingVolume" | "liquidityDepth" | "averagePriceImpact"
>;

/**
 * Evaluate the fee ladder. The first matching rung wins; rungs are
 * never combined.
 *
 * MIN_FEE bounds the policy but no rung emits it.
 */
export function computeDynamicFee(inputs: FeeInputs): number {
  if (inputs.priceVolatilityEMA > FEE_POLICY.HIGH_VOLATILITY) {
    return FEE_POLICY.MAX_FEE;
  }
  if (inputs.tradingVolume > FEE_POLICY.HIGH_VOLUME) {
    if (inputs.liquidityDepth < FEE_POLICY.THIN_DEPTH) {
      return FEE_POLICY.BASE_FEE + FEE_POLICY.THIN_VOLUME_SURCHARGE;
    }
    return FEE_POLICY.BASE_FEE + FEE_POLICY.VOLUME_SURCHARGE;
  }
  if (inputs.averagePriceImpact > FEE_POLICY.PRICE_IMPACT_THRESHOLD) {
    return FEE_POLICY.BASE_FEE + FEE_POLICY.PRICE_IMPACT_SURCHARGE;
  }
  if (inputs.liquidityDepth < FEE_POLICY.SHALLOW_DEPTH) {
    return FEE_POLICY.BASE_FEE + FEE_POLICY.SHALLOW_DEPTH_SURCHARGE;
  }
  return FEE_POLICY.BASE_FEE;
}

/**
 * Fee module -- dynamic fee policy.
 *
 * Turns the tracked market signals of a pool into the fee charged on
 * its next swap.
 */
export class FeeModule {
  private ctx: EngineContext;

  constructor(ctx: EngineContext) {
    this.ctx = ctx;
  }

  /**
   * Fee the ladder yields for the pool right now. Read only.
   */
  getDynamicFee(poolId: string): number {
    return computeDynamicFee(this.ctx.store.get(poolId).state);
  }

  /**
   * Store the ladder result as the pool's current fee, announcing a change.
   */
  syncFee(poolId: string): number {
    const { state } = this.ctx.store.get(poolId);
    const fee = computeDynamicFee(state);

    if (fee !== state.currentFee) {
      const previousFee = state.currentFee;
      state.currentFee = fee;
      this.ctx.config.logger?.debug("syncFee: fee adjusted", { poolId, previousFee, fee });
      this.ctx.events.emit({
        type: "fee_adjusted",
        poolId,
        timestamp: this.ctx.config.clock.now(),
        previousFee,
        newFee: fee,
        volatility: state.priceVolatilityEMA,
      });
    }

    return fee;
  }

  /**
   * Estimate the fee charged on a swap of the given size at the current fee.
   *
   * @example
   * const { fee, feeAmount } = manager.estimateSwapFee('C...', 1_000_000n);
   */
  estimateSwapFee(poolId: string, amount: bigint): { fee: number; feeAmount: bigint } {
    const fee = this.ctx.store.get(poolId).state.currentFee;
    return { fee, feeAmount: (abs(amount) * BigInt(fee)) / PRECISION.FEE_DENOMINATOR };
  }
}
