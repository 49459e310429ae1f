/**
 * MockPoolEngine -- an offline stand-in for the host pool engine.
 *
 * Usage
 * -----
 *   const engine = new MockPoolEngine();
 *
 *   engine.setTick(poolId, 120);
 *   engine.failNextModify('deposit rejected', (params) => params.liquidityDelta > 0n);
 *   engine.liquidityAt(poolId, 100, 140);
 *   engine.reset();
 *
 * Design notes
 * ------------
 *  - Liquidity is tracked per (pool, tickLower, tickUpper) so tests can
 *    check that the ledger and the engine agree after a rebalance.
 *  - Withdrawing more than a range holds rejects, as a real engine would.
 *  - Staged failures are consumed once, in FIFO order, by the first call
 *    they match.
 */

import { BalanceDelta, ModifyLiquidityParams, PoolEngine, PoolSlot } from '../../types/engine';

// ---------------------------------------------------------------------------
// Public configuration types
// ---------------------------------------------------------------------------

/** A modifyLiquidity call as received by the mock. */
export interface RecordedModify extends ModifyLiquidityParams {
  poolId: string;
}

type ModifyMatcher = (params: RecordedModify) => boolean;

interface StagedFailure {
  message: string;
  matches: ModifyMatcher;
}

/** Q64.96 encoding of price 1. */
const SQRT_PRICE_ONE = 2n ** 96n;

// ---------------------------------------------------------------------------
// MockPoolEngine
// ---------------------------------------------------------------------------

export class MockPoolEngine implements PoolEngine {
  /** Successful modifyLiquidity calls, in order. */
  readonly modifications: RecordedModify[] = [];

  /** Number of getCurrentTick() calls served. */
  tickReads = 0;

  private _slots = new Map<string, PoolSlot>();
  private _ranges = new Map<string, bigint>();
  private _modifyFailures: StagedFailure[] = [];
  private _tickFailures: string[] = [];

  // =========================================================================
  // Configuration API
  // =========================================================================

  /**
   * Report `tick` for the pool from now on.
   *
   * @param sqrtPriceX96 - Pass 0n to simulate an uninitialized pool.
   */
  setTick(poolId: string, tick: number, sqrtPriceX96: bigint = SQRT_PRICE_ONE): void {
    this._slots.set(poolId, { tick, sqrtPriceX96, observedAt: 0 });
  }

  /**
   * Make the next matching modifyLiquidity() call reject with `message`.
   */
  failNextModify(message: string, matches: ModifyMatcher = () => true): void {
    this._modifyFailures.push({ message, matches });
  }

  /**
   * Make the next getCurrentTick() call reject with `message`.
   */
  failNextTick(message: string): void {
    this._tickFailures.push(message);
  }

  /** Liquidity the engine holds in a range. */
  liquidityAt(poolId: string, tickLower: number, tickUpper: number): bigint {
    return this._ranges.get(rangeKey(poolId, tickLower, tickUpper)) ?? 0n;
  }

  reset(): void {
    this.modifications.length = 0;
    this.tickReads = 0;
    this._slots.clear();
    this._ranges.clear();
    this._modifyFailures = [];
    this._tickFailures = [];
  }

  // =========================================================================
  // PoolEngine
  // =========================================================================

  async getCurrentTick(poolId: string): Promise<PoolSlot> {
    const failure = this._tickFailures.shift();
    if (failure !== undefined) throw new Error(failure);

    const slot = this._slots.get(poolId);
    if (!slot) {
      throw new Error(
        `MockPoolEngine: no slot for pool "${poolId}". Call engine.setTick(poolId, tick) first.`,
      );
    }
    this.tickReads++;
    return { ...slot };
  }

  async modifyLiquidity(poolId: string, params: ModifyLiquidityParams): Promise<BalanceDelta> {
    const call: RecordedModify = { poolId, ...params };

    const failureAt = this._modifyFailures.findIndex((failure) => failure.matches(call));
    if (failureAt >= 0) {
      const [failure] = this._modifyFailures.splice(failureAt, 1);
      throw new Error(failure.message);
    }

    const key = rangeKey(poolId, params.tickLower, params.tickUpper);
    const next = (this._ranges.get(key) ?? 0n) + params.liquidityDelta;
    if (next < 0n) {
      throw new Error(
        `MockPoolEngine: cannot withdraw ${-params.liquidityDelta} from [${params.tickLower}, ${params.tickUpper})`,
      );
    }
    this._ranges.set(key, next);
    this.modifications.push(call);

    return { amount0: -params.liquidityDelta, amount1: 0n };
  }
}

function rangeKey(poolId: string, tickLower: number, tickUpper: number): string {
  return `${poolId}:${tickLower}:${tickUpper}`;
}
