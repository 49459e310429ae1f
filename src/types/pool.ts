/**
 * Static pool parameters supplied by the host at initialization.
 */
export interface PoolKey {
  /** Contract address identifying the pool (C...) */
  poolId: string;
  /** Tick spacing that every range boundary is aligned to */
  tickSpacing: number;
  /** Configured base fee in parts-per-million */
  fee: number;
}

/**
 * Market-condition record tracked per pool.
 *
 * Fixed-point fields use an 18-decimal scale. Volatility is measured
 * in ticks, so its EMA stays in tick units.
 */
export interface PoolMarketState {
  /** Last observed price tick */
  lastTick: number;
  /** Incremental mean of transaction gas price */
  movingAverageGasPrice: bigint;
  /** Samples folded into the gas price mean (wraps at 2^32) */
  movingAverageGasPriceCount: number;
  /** EMA of absolute per-event tick change; 0 until first nonzero sample */
  priceVolatilityEMA: bigint;
  /** Absolute swap volume inside the current fixed window */
  tradingVolume: bigint;
  /** Liquidity in the active range, never below zero */
  liquidityDepth: bigint;
  lastVolatilityUpdate: number;
  lastVolumeUpdate: number;
  lastRebalanceTimestamp: number;
  /** Width in ticks applied at the last rebalance */
  currentRangeWidth: number;
  /** Width in ticks recommended from current volatility and depth */
  optimalRangeWidth: number;
  rebalanceCount: number;
  /** Fee charged on the next swap, parts-per-million */
  currentFee: number;
  /** Total fee revenue ever charged, monotonically increasing */
  feeRevenueAccumulator: bigint;
  /** Incremental mean of output/input ratios, each capped at 100% */
  averagePriceImpact: bigint;
  /** Samples folded into the price impact mean (wraps at 2^32) */
  priceImpactCount: number;
}

/**
 * Derived pool statistics.
 */
export interface PoolAnalytics {
  totalVolume: bigint;
  totalFeeRevenue: bigint;
  /** Two-point running mean against the volatility EMA */
  averageVolatility: bigint;
  /** Fee revenue per rebalance; 0 before the first rebalance */
  rebalanceEfficiency: bigint;
  /** volatility^2 / 10000, capped at 1e18 */
  impermanentLoss: bigint;
  lastUpdateTimestamp: number;
}

/**
 * Liquidity position managed by the engine.
 *
 * Positions are never deleted; removal sets `active` to false for good.
 */
export interface LPPosition {
  /** Address of the liquidity provider */
  owner: string;
  liquidityProvided: bigint;
  tickLower: number;
  tickUpper: number;
  entryTimestamp: number;
  lastRebalanceTimestamp: number;
  /** Fee entitlement already paid out */
  feesClaimed: bigint;
  active: boolean;
}
