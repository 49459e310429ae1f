import { ValidationError } from './errors';
import { Clock, Logger, systemClock } from './types/common';

/**
 * Fixed-point constants. Liquidity, volume and revenue use an 18-decimal
 * scale; fees are expressed in parts-per-million.
 */
export const PRECISION = {
  SCALE: 10n ** 18n,
  UNIT: 10n ** 18n,
  FEE_DENOMINATOR: 1_000_000n,
  MIN_LIQUIDITY: 1000n,
} as const;

/**
 * Fee ladder thresholds and outputs.
 */
export const FEE_POLICY = {
  BASE_FEE: 3000,
  MIN_FEE: 500,
  MAX_FEE: 10000,
  HIGH_VOLATILITY: 1000n,
  HIGH_VOLUME: 1000n * PRECISION.UNIT,
  THIN_DEPTH: 10n * PRECISION.UNIT,
  SHALLOW_DEPTH: 200n * PRECISION.UNIT,
  /** 2% of SCALE */
  PRICE_IMPACT_THRESHOLD: (PRECISION.SCALE * 2n) / 100n,
  THIN_VOLUME_SURCHARGE: 2000,
  VOLUME_SURCHARGE: 1000,
  PRICE_IMPACT_SURCHARGE: 1500,
  SHALLOW_DEPTH_SURCHARGE: 500,
} as const;

/**
 * Range width recommendations in ticks.
 */
export const RANGE_POLICY = {
  MIN_RANGE_WIDTH: 5,
  MAX_RANGE_WIDTH: 60,
  WIDE_RANGE_WIDTH: 30,
  MEDIUM_RANGE_WIDTH: 20,
  HIGH_VOLATILITY: 1000n,
  ELEVATED_VOLATILITY: 500n,
  MODERATE_VOLATILITY: 200n,
  MIN_DEPTH: PRECISION.UNIT,
} as const;

/**
 * Engine configuration.
 */
export interface EngineConfig {
  /** Address that bootstraps the authorized-rebalancer set and owns the automation role */
  owner: string;
  /** Accounts allowed to force a rebalance past the cooldown */
  automationAccounts?: string[];
  /** Minimum seconds between two rebalances of one pool */
  rebalanceCooldownSec?: number;
  /** Length of the fixed trading-volume window in seconds */
  volumeWindowSec?: number;
  /** All-time cap on positions per pool, removed ones included */
  maxPositionsPerPool?: number;
  /** Smallest liquidity amount accepted for a new position */
  minLiquidityAmount?: bigint;
  /** Range width a pool starts with */
  defaultRangeWidth?: number;
  /** Liquidity depth a pool starts with */
  initialLiquidityDepth?: bigint;
  /** Optional logger for hook and rebalance instrumentation. */
  logger?: Logger;
  /** Time source, defaults to the system clock */
  clock?: Clock;
}

/**
 * Default engine configuration values.
 */
export const DEFAULTS = {
  rebalanceCooldownSec: 30 * 60,
  volumeWindowSec: 60 * 60,
  maxPositionsPerPool: 10,
  minLiquidityAmount: PRECISION.MIN_LIQUIDITY,
  defaultRangeWidth: 20,
  initialLiquidityDepth: 1000n * PRECISION.UNIT,
  /** EMA weight of the newest sample, 0.2 * SCALE */
  volatilityAlpha: (PRECISION.SCALE * 2n) / 10n,
  /** Drift ratio above which a rebalance is due, 5% of SCALE */
  rebalanceThreshold: (PRECISION.SCALE * 5n) / 100n,
  /** Divisor turning squared volatility into the impermanent loss estimate */
  impermanentLossDivisor: 10_000n,
} as const;

/**
 * Configuration after defaults are applied.
 */
export type ResolvedEngineConfig = Required<Omit<EngineConfig, 'logger'>> &
  Pick<EngineConfig, 'logger'>;

/**
 * Merge user configuration over DEFAULTS.
 *
 * @throws {ValidationError} A tunable is out of range
 */
export function resolveConfig(config: EngineConfig): ResolvedEngineConfig {
  const resolved: ResolvedEngineConfig = {
    owner: config.owner,
    automationAccounts: config.automationAccounts ?? [],
    rebalanceCooldownSec: config.rebalanceCooldownSec ?? DEFAULTS.rebalanceCooldownSec,
    volumeWindowSec: config.volumeWindowSec ?? DEFAULTS.volumeWindowSec,
    maxPositionsPerPool: config.maxPositionsPerPool ?? DEFAULTS.maxPositionsPerPool,
    minLiquidityAmount: config.minLiquidityAmount ?? DEFAULTS.minLiquidityAmount,
    defaultRangeWidth: config.defaultRangeWidth ?? DEFAULTS.defaultRangeWidth,
    initialLiquidityDepth: config.initialLiquidityDepth ?? DEFAULTS.initialLiquidityDepth,
    logger: config.logger,
    clock: config.clock ?? systemClock,
  };

  requirePositiveInteger('defaultRangeWidth', resolved.defaultRangeWidth);
  requirePositiveInteger('maxPositionsPerPool', resolved.maxPositionsPerPool);
  requirePositiveInteger('volumeWindowSec', resolved.volumeWindowSec);
  if (!Number.isInteger(resolved.rebalanceCooldownSec) || resolved.rebalanceCooldownSec < 0) {
    throw new ValidationError('rebalanceCooldownSec must be a non-negative integer', {
      field: 'rebalanceCooldownSec',
      value: resolved.rebalanceCooldownSec,
    });
  }
  if (resolved.minLiquidityAmount <= 0n) {
    throw new ValidationError('minLiquidityAmount must be positive', {
      field: 'minLiquidityAmount',
      value: resolved.minLiquidityAmount.toString(),
    });
  }
  if (resolved.initialLiquidityDepth < 0n) {
    throw new ValidationError('initialLiquidityDepth must not be negative', {
      field: 'initialLiquidityDepth',
      value: resolved.initialLiquidityDepth.toString(),
    });
  }

  return resolved;
}

function requirePositiveInteger(field: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${field} must be a positive integer`, { field, value });
  }
}
