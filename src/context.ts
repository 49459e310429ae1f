import { ResolvedEngineConfig } from "./config";
import { EventBus } from "./events";
import { PoolStore } from "./state/store";
import { PoolEngine } from "./types/engine";

/**
 * Shared collaborators handed to every module.
 */
export interface EngineContext {
  config: ResolvedEngineConfig;
  store: PoolStore;
  events: EventBus;
  poolEngine: PoolEngine;
}
