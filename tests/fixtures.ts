import { StrKey } from '@stellar/stellar-sdk';
import { LiquidityManager } from '../src/manager';
import { EngineConfig } from '../src/config';
import { Clock, Logger } from '../src/types/common';
import { EngineEvent, EngineEventOf, EngineEventType } from '../src/types/events';
import { isEventType } from '../src/events';
import { MockPoolEngine } from '../src/test/mocks/MockPoolEngine';

/**
 * Shared fixtures for engine tests.
 *
 * Addresses are derived from fixed byte patterns so every strkey is
 * valid without hard-coding checksums.
 */

export function account(seed: number): string {
  return StrKey.encodeEd25519PublicKey(Buffer.alloc(32, seed));
}

export function contract(seed: number): string {
  return StrKey.encodeContract(Buffer.alloc(32, seed));
}

export const OWNER = account(1);
export const ALICE = account(2);
export const BOB = account(3);
export const BOT = account(4);
export const POOL = contract(1);
export const OTHER_POOL = contract(2);

export const T0 = 1_700_000_000;
export const UNIT = 10n ** 18n;

/**
 * Clock under test control.
 */
export class ManualClock implements Clock {
  constructor(public current: number = T0) {}

  now(): number {
    return this.current;
  }

  advance(seconds: number): void {
    this.current += seconds;
  }
}

export function createMockLogger(): Logger & {
  debug: jest.Mock;
  info: jest.Mock;
  error: jest.Mock;
} {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    error: jest.fn(),
  };
}

export interface Harness {
  manager: LiquidityManager;
  engine: MockPoolEngine;
  clock: ManualClock;
  events: EngineEvent[];
}

/**
 * A manager over a mock pool engine with POOL initialized at `tick`
 * (tick spacing 10, fee 3000) at time T0.
 */
export async function createHarness(
  options: { tick?: number; fee?: number; config?: Partial<EngineConfig> } = {},
): Promise<Harness> {
  const tick = options.tick ?? 100;
  const clock = new ManualClock();
  const engine = new MockPoolEngine();
  const manager = new LiquidityManager(engine, {
    owner: OWNER,
    automationAccounts: [BOT],
    clock,
    ...options.config,
  });
  const events: EngineEvent[] = [];
  manager.events.subscribe((event) => events.push(event));

  engine.setTick(POOL, tick);
  await manager.onPoolInitialized({ poolId: POOL, tickSpacing: 10, fee: options.fee ?? 3000 }, tick);

  return { manager, engine, clock, events };
}

export function eventsOfType<T extends EngineEventType>(
  events: EngineEvent[],
  type: T,
): EngineEventOf<T>[] {
  return events.filter((event): event is EngineEventOf<T> => isEventType(event, type));
}
