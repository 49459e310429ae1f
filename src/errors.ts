/**
 * Typed error hierarchy for the rangekeeper engine.
 *
 * All errors extend RangeKeeperError and carry a machine-readable
 * error code for programmatic handling plus human-readable messages.
 * Every error rejects the triggering call only; nothing is retried.
 */

/**
 * Base error class for all engine errors.
 */
export class RangeKeeperError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(
    code: string,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "RangeKeeperError";
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Configured fee outside the fee policy bounds.
 */
export class InvalidFeeError extends RangeKeeperError {
  constructor(fee: number, min: number, max: number) {
    super("INVALID_FEE", `Fee ${fee} outside allowed range [${min}, ${max}]`, {
      fee,
      min,
      max,
    });
    this.name = "InvalidFeeError";
  }
}

/**
 * Caller is not the position owner or lacks the required role.
 */
export class UnauthorizedError extends RangeKeeperError {
  constructor(caller: string, action: string) {
    super("UNAUTHORIZED", `${caller} is not authorized to ${action}`, {
      caller,
      action,
    });
    this.name = "UnauthorizedError";
  }
}

/**
 * Pool liquidity depth cannot support the operation.
 */
export class InsufficientLiquidityError extends RangeKeeperError {
  constructor(poolId: string, details?: Record<string, unknown>) {
    super("INSUFFICIENT_LIQUIDITY", `Insufficient liquidity depth for pool ${poolId}`, {
      poolId,
      ...details,
    });
    this.name = "InsufficientLiquidityError";
  }
}

/**
 * Volatility above the level at which a rebalance is refused.
 */
export class VolatilityTooHighError extends RangeKeeperError {
  constructor(poolId: string, volatility: bigint, limit: bigint) {
    super(
      "VOLATILITY_TOO_HIGH",
      `Volatility ${volatility} exceeds ${limit} for pool ${poolId}`,
      { poolId, volatility: volatility.toString(), limit: limit.toString() },
    );
    this.name = "VolatilityTooHighError";
  }
}

/**
 * Rebalance attempted before the cooldown elapsed.
 */
export class RebalanceCooldownError extends RangeKeeperError {
  constructor(poolId: string, availableAt: number) {
    super(
      "REBALANCE_COOLDOWN_NOT_ELAPSED",
      `Rebalance cooldown active for pool ${poolId} until ${availableAt}`,
      { poolId, availableAt },
    );
    this.name = "RebalanceCooldownError";
  }
}

/**
 * Pool already holds the all-time maximum number of positions.
 */
export class MaxPositionsReachedError extends RangeKeeperError {
  constructor(poolId: string, max: number) {
    super("MAX_POSITIONS_REACHED", `Pool ${poolId} reached ${max} positions`, {
      poolId,
      max,
    });
    this.name = "MaxPositionsReachedError";
  }
}

/**
 * Liquidity amount below the minimum for a new position.
 */
export class InsufficientLiquidityAmountError extends RangeKeeperError {
  constructor(amount: bigint, minimum: bigint) {
    super(
      "INSUFFICIENT_LIQUIDITY_AMOUNT",
      `Liquidity amount ${amount} below minimum ${minimum}`,
      { amount: amount.toString(), minimum: minimum.toString() },
    );
    this.name = "InsufficientLiquidityAmountError";
  }
}

export class PositionNotFoundError extends RangeKeeperError {
  constructor(poolId: string, positionIndex: number) {
    super("POSITION_NOT_FOUND", `Position ${positionIndex} not found in pool ${poolId}`, {
      poolId,
      positionIndex,
    });
    this.name = "PositionNotFoundError";
  }
}

export class PositionNotActiveError extends RangeKeeperError {
  constructor(poolId: string, positionIndex: number) {
    super("POSITION_NOT_ACTIVE", `Position ${positionIndex} in pool ${poolId} is not active`, {
      poolId,
      positionIndex,
    });
    this.name = "PositionNotActiveError";
  }
}

/**
 * Pool was never initialized with the engine.
 */
export class PoolNotFoundError extends RangeKeeperError {
  constructor(poolId: string) {
    super("POOL_NOT_FOUND", `Pool ${poolId} is not initialized`, { poolId });
    this.name = "PoolNotFoundError";
  }
}

/**
 * Invalid input parameters.
 */
export class ValidationError extends RangeKeeperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("VALIDATION_ERROR", message, details);
    this.name = "ValidationError";
  }
}

/**
 * Host pool engine rejected a call.
 */
export class PoolEngineError extends RangeKeeperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("POOL_ENGINE_ERROR", message, details);
    this.name = "PoolEngineError";
  }
}

/**
 * A reposition could neither complete nor be restored. The position's
 * liquidity is withdrawn from the pool engine while the ledger still
 * records the old range.
 */
export class RebalanceError extends RangeKeeperError {
  constructor(poolId: string, positionIndex: number, details?: Record<string, unknown>) {
    super(
      "REBALANCE_FAILED",
      `Position ${positionIndex} in pool ${poolId} is stranded after a failed reposition`,
      { poolId, positionIndex, ...details },
    );
    this.name = "RebalanceError";
  }
}

/**
 * Map a raw error to the appropriate typed error class.
 *
 * Engine errors pass through unchanged; anything else came from the
 * host pool engine and is wrapped with the operation that failed.
 */
export function mapError(err: unknown, operation: string): RangeKeeperError {
  if (err instanceof RangeKeeperError) return err;

  const message = err instanceof Error ? err.message : String(err);
  return new PoolEngineError(`${operation}: ${message}`, {
    operation,
    originalError: err,
  });
}
