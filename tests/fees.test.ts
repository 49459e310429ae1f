import { computeDynamicFee, FeeInputs } from '../src/modules/fees';
import { FEE_POLICY } from '../src/config';
import { InvalidFeeError } from '../src/errors';
import { LiquidityManager } from '../src/manager';
import { MockPoolEngine } from '../src/test/mocks/MockPoolEngine';
import { createHarness, eventsOfType, OWNER, POOL, UNIT } from './fixtures';

/**
 * Fee ladder: first matching rung wins, in fixed priority order.
 */
describe('computeDynamicFee', () => {
  const nominal: FeeInputs = {
    priceVolatilityEMA: 0n,
    tradingVolume: 0n,
    liquidityDepth: 1000n * UNIT,
    averagePriceImpact: 0n,
  };

  it('charges the base fee in nominal conditions', () => {
    expect(computeDynamicFee(nominal)).toBe(3000);
  });

  it('charges the maximum fee above 1000 volatility regardless of other inputs', () => {
    expect(computeDynamicFee({ ...nominal, priceVolatilityEMA: 1500n })).toBe(10000);
    expect(
      computeDynamicFee({
        priceVolatilityEMA: 1500n,
        tradingVolume: 5000n * UNIT,
        liquidityDepth: 1n,
        averagePriceImpact: UNIT,
      }),
    ).toBe(10000);
  });

  it('treats volatility of exactly 1000 as below the top rung', () => {
    expect(computeDynamicFee({ ...nominal, priceVolatilityEMA: 1000n })).toBe(3000);
  });

  it('adds 2000 for high volume on thin liquidity', () => {
    expect(
      computeDynamicFee({ ...nominal, tradingVolume: 2000n * UNIT, liquidityDepth: 5n * UNIT }),
    ).toBe(5000);
  });

  it('adds 1000 for high volume', () => {
    expect(computeDynamicFee({ ...nominal, tradingVolume: 2000n * UNIT })).toBe(4000);
  });

  it('requires volume strictly above 1000 units', () => {
    expect(computeDynamicFee({ ...nominal, tradingVolume: 1000n * UNIT })).toBe(3000);
  });

  it('prefers the volume rung over the price impact rung', () => {
    expect(
      computeDynamicFee({ ...nominal, tradingVolume: 2000n * UNIT, averagePriceImpact: UNIT }),
    ).toBe(4000);
  });

  it('adds 1500 for price impact above 2%', () => {
    expect(computeDynamicFee({ ...nominal, averagePriceImpact: 2n * 10n ** 16n + 1n })).toBe(4500);
    expect(computeDynamicFee({ ...nominal, averagePriceImpact: 2n * 10n ** 16n })).toBe(3000);
  });

  it('adds 500 below 200 units of depth', () => {
    expect(computeDynamicFee({ ...nominal, liquidityDepth: 100n * UNIT })).toBe(3500);
  });

  it('never emits the minimum fee', () => {
    const volatilities = [0n, 1000n, 1001n];
    const volumes = [0n, 2000n * UNIT];
    const depths = [0n, 5n * UNIT, 100n * UNIT, 1000n * UNIT];
    const impacts = [0n, UNIT];

    for (const priceVolatilityEMA of volatilities) {
      for (const tradingVolume of volumes) {
        for (const liquidityDepth of depths) {
          for (const averagePriceImpact of impacts) {
            const fee = computeDynamicFee({
              priceVolatilityEMA,
              tradingVolume,
              liquidityDepth,
              averagePriceImpact,
            });
            expect(fee).not.toBe(FEE_POLICY.MIN_FEE);
            expect(fee).toBeGreaterThanOrEqual(FEE_POLICY.BASE_FEE);
            expect(fee).toBeLessThanOrEqual(FEE_POLICY.MAX_FEE);
          }
        }
      }
    }
  });
});

describe('FeeModule', () => {
  it('reads the ladder for a pool', async () => {
    const { manager } = await createHarness();
    expect(manager.getDynamicFee(POOL)).toBe(3000);
  });

  it('seeds the current fee from the configured base fee', async () => {
    const { manager } = await createHarness({ fee: 500 });
    expect(manager.getPoolState(POOL).currentFee).toBe(500);
  });

  it('adjusts the current fee before a swap and announces the change once', async () => {
    const { manager, events, clock } = await createHarness({ fee: 500 });

    await expect(manager.beforeSwap(POOL)).resolves.toEqual({ fee: 3000 });
    await expect(manager.beforeSwap(POOL)).resolves.toEqual({ fee: 3000 });

    expect(manager.getPoolState(POOL).currentFee).toBe(3000);
    expect(eventsOfType(events, 'fee_adjusted')).toEqual([
      {
        type: 'fee_adjusted',
        poolId: POOL,
        timestamp: clock.now(),
        previousFee: 500,
        newFee: 3000,
        volatility: 0n,
      },
    ]);
  });

  it('estimates the fee of a swap at the current fee', async () => {
    const { manager } = await createHarness();
    expect(manager.estimateSwapFee(POOL, -1_000_000n)).toEqual({ fee: 3000, feeAmount: 3000n });
  });

  it('rejects pools configured with a fee outside the policy bounds', async () => {
    const manager = new LiquidityManager(new MockPoolEngine(), { owner: OWNER });

    await expect(
      manager.onPoolInitialized({ poolId: POOL, tickSpacing: 10, fee: 499 }, 0),
    ).rejects.toThrow(InvalidFeeError);
    await expect(
      manager.onPoolInitialized({ poolId: POOL, tickSpacing: 10, fee: 10001 }, 0),
    ).rejects.toThrow(InvalidFeeError);
    expect(manager.isPoolInitialized(POOL)).toBe(false);
  });
});
