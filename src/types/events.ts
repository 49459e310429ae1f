/**
 * Base engine event.
 */
export interface PoolEvent {
  /** Event type identifier string */
  type: string;
  /** Address of the pool the event belongs to */
  poolId: string;
  /** Unix timestamp in seconds when the event was emitted */
  timestamp: number;
}

/**
 * Emitted after every market-condition update.
 */
export interface MarketMetricsUpdatedEvent extends PoolEvent {
  type: "market_metrics_updated";
  /** Volatility EMA after the update */
  volatility: bigint;
  /** Volume inside the current window */
  volume: bigint;
  liquidityDepth: bigint;
}

export interface PositionCreatedEvent extends PoolEvent {
  type: "position_created";
  owner: string;
  positionIndex: number;
  tickLower: number;
  tickUpper: number;
  liquidity: bigint;
}

export interface PositionRemovedEvent extends PoolEvent {
  type: "position_removed";
  owner: string;
  positionIndex: number;
  /** Liquidity withdrawn from the pool engine */
  liquidity: bigint;
}

export interface FeesCollectedEvent extends PoolEvent {
  type: "fees_collected";
  owner: string;
  positionIndex: number;
  /** Newly paid fees since the previous claim */
  amount: bigint;
}

/**
 * Emitted once per rebalance of a pool.
 */
export interface PoolRebalancedEvent extends PoolEvent {
  type: "pool_rebalanced";
  tickLower: number;
  tickUpper: number;
  /** Number of positions whose range changed */
  positionsMoved: number;
  rebalanceCount: number;
}

/**
 * Emitted for every position moved by a rebalance.
 */
export interface PositionRebalancedEvent extends PoolEvent {
  type: "position_rebalanced";
  positionIndex: number;
  oldTickLower: number;
  oldTickUpper: number;
  newTickLower: number;
  newTickUpper: number;
}

/**
 * Fee update event from the dynamic fee policy.
 */
export interface FeeAdjustedEvent extends PoolEvent {
  type: "fee_adjusted";
  /** The previous fee in parts-per-million */
  previousFee: number;
  /** The new fee in parts-per-million */
  newFee: number;
  /** Volatility EMA that produced the new fee */
  volatility: bigint;
}

/**
 * Union of all engine events.
 */
export type EngineEvent =
  | MarketMetricsUpdatedEvent
  | PositionCreatedEvent
  | PositionRemovedEvent
  | FeesCollectedEvent
  | PoolRebalancedEvent
  | PositionRebalancedEvent
  | FeeAdjustedEvent;

export type EngineEventType = EngineEvent["type"];

export type EngineEventOf<T extends EngineEventType> = Extract<EngineEvent, { type: T }>;
