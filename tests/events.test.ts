import { EventBus, isEventType } from '../src/events';
import { EngineEvent } from '../src/types/events';
import { createMockLogger, POOL, T0 } from './fixtures';

const FEE_EVENT: EngineEvent = {
  type: 'fee_adjusted',
  poolId: POOL,
  timestamp: T0,
  previousFee: 3000,
  newFee: 4000,
  volatility: 0n,
};

const METRICS_EVENT: EngineEvent = {
  type: 'market_metrics_updated',
  poolId: POOL,
  timestamp: T0,
  volatility: 5n,
  volume: 0n,
  liquidityDepth: 0n,
};

describe('EventBus', () => {
  it('delivers every event to subscribers until they unsubscribe', () => {
    const bus = new EventBus();
    const received: string[] = [];
    const unsubscribe = bus.subscribe((event) => received.push(event.type));

    bus.emit(FEE_EVENT);
    unsubscribe();
    bus.emit(METRICS_EVENT);

    expect(received).toEqual(['fee_adjusted']);
  });

  it('filters by event type with on()', () => {
    const bus = new EventBus();
    const fees: number[] = [];
    bus.on('fee_adjusted', (event) => fees.push(event.newFee));

    bus.emit(METRICS_EVENT);
    bus.emit(FEE_EVENT);

    expect(fees).toEqual([4000]);
  });

  it('keeps notifying after a listener throws', () => {
    const logger = createMockLogger();
    const bus = new EventBus(logger);
    const received: EngineEvent[] = [];
    const failure = new Error('listener broke');

    bus.subscribe(() => {
      throw failure;
    });
    bus.subscribe((event) => received.push(event));

    expect(() => bus.emit(FEE_EVENT)).not.toThrow();
    expect(received).toEqual([FEE_EVENT]);
    expect(logger.error).toHaveBeenCalledWith('event listener failed for fee_adjusted', failure);
  });

  it('narrows events with isEventType', () => {
    expect(isEventType(FEE_EVENT, 'fee_adjusted')).toBe(true);
    expect(isEventType(FEE_EVENT, 'pool_rebalanced')).toBe(false);
  });
});
