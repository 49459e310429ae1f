import { PoolNotFoundError, PositionNotFoundError, ValidationError } from "../errors";
import { LPPosition, PoolAnalytics, PoolKey, PoolMarketState } from "../types/pool";

/**
 * Everything the engine keeps for one pool.
 */
export interface PoolRecord {
  key: PoolKey;
  state: PoolMarketState;
  analytics: PoolAnalytics;
  /** Append-only; the array index is the position handle */
  positions: LPPosition[];
  /** owner -> position indexes in creation order, never compacted */
  ownerIndex: Map<string, number[]>;
}

/**
 * Initial values for a new pool record.
 */
export interface PoolSeed {
  tick: number;
  rangeWidth: number;
  liquidityDepth: bigint;
  timestamp: number;
}

/**
 * Pool-keyed store. Records are created once and live as long as the store.
 */
export class PoolStore {
  private pools = new Map<string, PoolRecord>();

  has(poolId: string): boolean {
    return this.pools.has(poolId);
  }

  create(key: PoolKey, seed: PoolSeed): PoolRecord {
    if (this.pools.has(key.poolId)) {
      throw new ValidationError(`Pool ${key.poolId} already initialized`, {
        poolId: key.poolId,
        reason: "POOL_ALREADY_INITIALIZED",
      });
    }

    const record: PoolRecord = {
      key: { ...key },
      state: {
        lastTick: seed.tick,
        movingAverageGasPrice: 0n,
        movingAverageGasPriceCount: 0,
        priceVolatilityEMA: 0n,
        tradingVolume: 0n,
        liquidityDepth: seed.liquidityDepth,
        lastVolatilityUpdate: seed.timestamp,
        lastVolumeUpdate: seed.timestamp,
        lastRebalanceTimestamp: seed.timestamp,
        currentRangeWidth: seed.rangeWidth,
        optimalRangeWidth: seed.rangeWidth,
        rebalanceCount: 0,
        currentFee: key.fee,
        feeRevenueAccumulator: 0n,
        averagePriceImpact: 0n,
        priceImpactCount: 0,
      },
      analytics: {
        totalVolume: 0n,
        totalFeeRevenue: 0n,
        averageVolatility: 0n,
        rebalanceEfficiency: 0n,
        impermanentLoss: 0n,
        lastUpdateTimestamp: seed.timestamp,
      },
      positions: [],
      ownerIndex: new Map(),
    };

    this.pools.set(key.poolId, record);
    return record;
  }

  /**
   * Get a pool record or fail with PoolNotFoundError.
   */
  get(poolId: string): PoolRecord {
    const record = this.pools.get(poolId);
    if (!record) throw new PoolNotFoundError(poolId);
    return record;
  }

  /**
   * Get a position by handle or fail with PositionNotFoundError.
   */
  position(poolId: string, positionIndex: number): LPPosition {
    const record = this.get(poolId);
    const position = Number.isInteger(positionIndex) ? record.positions[positionIndex] : undefined;
    if (!position) throw new PositionNotFoundError(poolId, positionIndex);
    return position;
  }
}
