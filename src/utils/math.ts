/**
 * Integer helpers for 18-decimal fixed-point and tick arithmetic.
 */

const UINT32_MODULUS = 2 ** 32;

export function abs(value: bigint): bigint {
  return value < 0n ? -value : value;
}

export function min(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

/**
 * Align a tick to the spacing grid, rounding toward negative infinity.
 *
 * @example
 * floorToTickSpacing(-25, 10); // -30
 * floorToTickSpacing(25, 10); // 20
 */
export function floorToTickSpacing(tick: number, tickSpacing: number): number {
  let compressed = Math.trunc(tick / tickSpacing);
  if (tick < 0 && tick % tickSpacing !== 0) compressed--;
  return compressed * tickSpacing;
}

/**
 * Fold a sample into an incremental mean.
 *
 * The first sample (count 0) becomes the mean directly. The divisor is
 * computed at full width, so a counter about to wrap still divides by
 * 2^32.
 */
export function incrementalMean(mean: bigint, count: number, sample: bigint): bigint {
  if (count === 0) return sample;
  const n = BigInt(count);
  return (mean * n + sample) / (n + 1n);
}

/**
 * Increment a 32-bit unsigned counter, wrapping to 0 past 2^32 - 1.
 */
export function incrementUint32(count: number): number {
  return (count + 1) % UINT32_MODULUS;
}
