import { PRECISION } from "../config";
import { EngineContext } from "../context";
import {
  InsufficientLiquidityAmountError,
  InsufficientLiquidityError,
  MaxPositionsReachedError,
  PositionNotActiveError,
  UnauthorizedError,
  mapError,
} from "../errors";
import { PoolRecord } from "../state/store";
import { LPPosition } from "../types/pool";
import { validateAddress, validateTickRange } from "../utils/validation";
import { SignalsModule } from "./signals";

/**
 * Position module -- the per-pool position ledger.
 *
 * Positions sit in an append-only arena whose indexes are their stable
 * handles. Removal tombstones a position; the owner index keeps every
 * handle ever created, so readers must check `active`.
 */
export class PositionModule {
  private ctx: EngineContext;
  private signals: SignalsModule;

  constructor(ctx: EngineContext, signals: SignalsModule) {
    this.ctx = ctx;
    this.signals = signals;
  }

  /**
   * Open a position and deposit its liquidity with the pool engine.
   *
   * The all-time cap counts removed positions too.
   *
   * @returns The new position's index
   * @throws {InsufficientLiquidityAmountError} Below the minimum amount
   * @throws {MaxPositionsReachedError} Pool arena is full
   */
  async createPosition(
    poolId: string,
    owner: string,
    tickLower: number,
    tickUpper: number,
    liquidityAmount: bigint,
  ): Promise<number> {
    const { config, store, events, poolEngine } = this.ctx;
    validateAddress(owner, "owner");
    validateTickRange(tickLower, tickUpper);

    const record = store.get(poolId);
    if (liquidityAmount < config.minLiquidityAmount) {
      throw new InsufficientLiquidityAmountError(liquidityAmount, config.minLiquidityAmount);
    }
    if (record.positions.length >= config.maxPositionsPerPool) {
      throw new MaxPositionsReachedError(poolId, config.maxPositionsPerPool);
    }

    try {
      await poolEngine.modifyLiquidity(poolId, {
        tickLower,
        tickUpper,
        liquidityDelta: liquidityAmount,
      });
    } catch (err) {
      config.logger?.error("createPosition: modifyLiquidity failed", err);
      throw mapError(err, "modifyLiquidity");
    }

    const now = config.clock.now();
    const positionIndex = record.positions.length;
    record.positions.push({
      owner,
      liquidityProvided: liquidityAmount,
      tickLower,
      tickUpper,
      entryTimestamp: now,
      lastRebalanceTimestamp: now,
      feesClaimed: 0n,
      active: true,
    });

    const owned = record.ownerIndex.get(owner);
    if (owned) {
      owned.push(positionIndex);
    } else {
      record.ownerIndex.set(owner, [positionIndex]);
    }

    this.signals.updateLiquidityDepth(poolId, liquidityAmount);

    config.logger?.info("createPosition", { poolId, owner, positionIndex, tickLower, tickUpper });
    events.emit({
      type: "position_created",
      poolId,
      timestamp: now,
      owner,
      positionIndex,
      tickLower,
      tickUpper,
      liquidity: liquidityAmount,
    });

    return positionIndex;
  }

  /**
   * Withdraw the liquidity, pay out outstanding fees and tombstone the
   * position. A pool with zero liquidity depth has no fees to pay.
   *
   * @returns Liquidity withdrawn
   * @throws {PositionNotActiveError} Position was already removed
   */
  async removePosition(poolId: string, owner: string, positionIndex: number): Promise<bigint> {
    const { config, store, events, poolEngine } = this.ctx;
    const position = this.ownedPosition(poolId, owner, positionIndex);
    if (!position.active) throw new PositionNotActiveError(poolId, positionIndex);

    const record = store.get(poolId);
    const liquidity = position.liquidityProvided;
    try {
      await poolEngine.modifyLiquidity(poolId, {
        tickLower: position.tickLower,
        tickUpper: position.tickUpper,
        liquidityDelta: -liquidity,
      });
    } catch (err) {
      config.logger?.error("removePosition: modifyLiquidity failed", err);
      throw mapError(err, "modifyLiquidity");
    }

    // Fees are settled against the depth that still includes this position.
    if (record.state.liquidityDepth > 0n) {
      this.settleFees(record, position, positionIndex);
    }

    position.active = false;
    this.signals.updateLiquidityDepth(poolId, -liquidity);

    config.logger?.info("removePosition", { poolId, owner, positionIndex });
    events.emit({
      type: "position_removed",
      poolId,
      timestamp: config.clock.now(),
      owner,
      positionIndex,
      liquidity,
    });

    return liquidity;
  }

  /**
   * Pay out the fees a position earned since its last claim.
   *
   * Entitlement is the position's share of liquidity depth applied to the
   * pool's total fee revenue. When the share shrinks below what was
   * already claimed the payout is 0 and the claimed total stays put.
   *
   * @throws {InsufficientLiquidityError} Pool liquidity depth is zero
   * @throws {PositionNotActiveError} Position was removed
   */
  collectFees(poolId: string, owner: string, positionIndex: number): bigint {
    const position = this.ownedPosition(poolId, owner, positionIndex);
    if (!position.active) throw new PositionNotActiveError(poolId, positionIndex);

    return this.settleFees(this.ctx.store.get(poolId), position, positionIndex);
  }

  getPosition(poolId: string, positionIndex: number): LPPosition {
    return { ...this.ctx.store.position(poolId, positionIndex) };
  }

  getPositions(poolId: string): LPPosition[] {
    return this.ctx.store.get(poolId).positions.map((position) => ({ ...position }));
  }

  /**
   * Every handle the owner ever created in the pool, removed ones included.
   */
  getOwnerPositions(owner: string, poolId: string): number[] {
    return [...(this.ctx.store.get(poolId).ownerIndex.get(owner) ?? [])];
  }

  private ownedPosition(poolId: string, owner: string, positionIndex: number): LPPosition {
    const position = this.ctx.store.position(poolId, positionIndex);
    if (position.owner !== owner) {
      throw new UnauthorizedError(owner, `manage position ${positionIndex}`);
    }
    return position;
  }

  private settleFees(record: PoolRecord, position: LPPosition, positionIndex: number): bigint {
    const { state, key } = record;
    if (state.liquidityDepth === 0n) {
      throw new InsufficientLiquidityError(key.poolId, { positionIndex });
    }

    const share = (position.liquidityProvided * PRECISION.SCALE) / state.liquidityDepth;
    const entitlement = (state.feeRevenueAccumulator * share) / PRECISION.SCALE;
    if (entitlement <= position.feesClaimed) return 0n;

    const collected = entitlement - position.feesClaimed;
    position.feesClaimed = entitlement;

    this.ctx.config.logger?.debug("collectFees", { poolId: key.poolId, positionIndex, collected });
    this.ctx.events.emit({
      type: "fees_collected",
      poolId: key.poolId,
      timestamp: this.ctx.config.clock.now(),
      owner: position.owner,
      positionIndex,
      amount: collected,
    });

    return collected;
  }
}
