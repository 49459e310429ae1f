import { SwapDirection } from './common';

/**
 * Slot data reported by the host pool engine.
 */
export interface PoolSlot {
  /** Current sqrt price as a Q64.96 value; 0 when the pool is uninitialized */
  sqrtPriceX96: bigint;
  tick: number;
  /** Unix seconds of the observation, as reported by the host */
  observedAt: number;
}

/**
 * Signed token deltas resulting from a swap or liquidity change.
 */
export interface BalanceDelta {
  amount0: bigint;
  amount1: bigint;
}

export interface ModifyLiquidityParams {
  tickLower: number;
  tickUpper: number;
  /** Positive to deposit, negative to withdraw */
  liquidityDelta: bigint;
}

/**
 * Host pool engine that executes swaps and liquidity changes.
 *
 * Calls either resolve or reject; a rejection means nothing was applied.
 */
export interface PoolEngine {
  getCurrentTick(poolId: string): Promise<PoolSlot>;
  modifyLiquidity(poolId: string, params: ModifyLiquidityParams): Promise<BalanceDelta>;
}

/**
 * Swap parameters forwarded by the after-swap hook.
 */
export interface SwapParams {
  direction: SwapDirection;
  /** Signed specified amount (negative for exact input, as the host reports it) */
  amountSpecified: bigint;
}

/**
 * Transaction context of a hook call.
 */
export interface TxContext {
  gasPrice: bigint;
}
