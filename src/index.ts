export { LiquidityManager } from "./manager";
export {
  DEFAULTS,
  FEE_POLICY,
  PRECISION,
  RANGE_POLICY,
  resolveConfig,
} from "./config";
export type { EngineConfig, ResolvedEngineConfig } from "./config";
export { EventBus, isEventType } from "./events";
export type { EventListener } from "./events";
export * from "./errors";
export { computeDynamicFee } from "./modules/fees";
export type { FeeInputs } from "./modules/fees";
export { calculateRangeWidth } from "./modules/range";
export type { RebalanceOptions, TargetRange } from "./modules/rebalance";
export { systemClock, SwapDirection } from "./types/common";
export type { Clock, Logger } from "./types/common";
export type * from "./types/engine";
export type * from "./types/events";
export type * from "./types/pool";
export { floorToTickSpacing } from "./utils/math";
export { isValidAddress, isValidContractId, isValidPublicKey } from "./utils/addresses";
