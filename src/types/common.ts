/**
 * Logger interface for engine instrumentation.
 *
 * Implement this interface to receive debug, info, and error
 * logs from hook handling, position bookkeeping and rebalancing.
 * Defaults to undefined (no logging).
 */
export interface Logger {
  /** Debug-level log for routine metric updates and skipped actions. */
  debug(msg: string, data?: unknown): void;
  /** Info-level log for state changes (positions, rebalances, access). */
  info(msg: string, data?: unknown): void;
  /** Error-level log for failed pool engine calls and listener failures. */
  error(msg: string, err?: unknown): void;
}

/**
 * Wall-clock source in Unix seconds.
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

/**
 * Swap direction. Zero-for-one sells token 0 for token 1.
 */
export enum SwapDirection {
  ZERO_FOR_ONE = 'zero_for_one',
  ONE_FOR_ZERO = 'one_for_zero',
}
