import { RANGE_POLICY } from "../config";

/**
 * Recommend a range width in ticks from volatility and liquidity depth.
 *
 * High volatility or thin liquidity widens the range so positions stay
 * in range longer; calm, deep pools concentrate liquidity.
 */
export function calculateRangeWidth(volatility: bigint, liquidityDepth: bigint): number {
  if (volatility > RANGE_POLICY.HIGH_VOLATILITY || liquidityDepth < RANGE_POLICY.MIN_DEPTH) {
    return RANGE_POLICY.MAX_RANGE_WIDTH;
  }
  if (volatility > RANGE_POLICY.ELEVATED_VOLATILITY) return RANGE_POLICY.WIDE_RANGE_WIDTH;
  if (volatility > RANGE_POLICY.MODERATE_VOLATILITY) return RANGE_POLICY.MEDIUM_RANGE_WIDTH;
  return RANGE_POLICY.MIN_RANGE_WIDTH;
}
