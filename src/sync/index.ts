export type {
  ConfigSyncStats,
  TeamsConfig,
} from "./config-reconciler.js";
export {
  ConfigReconciler,
  EMPTY_TEAMS_CONFIG,
  loadTeamsConfig,
  parseTeamsConfig,
  projectKeysOf,
  teamsConfigSchema,
} from "./config-reconciler.js";
export type {
  ReconciliationEngineOptions,
  SyncRunOptions,
  SyncStats,
} from "./engine.js";
export { ReconciliationEngine } from "./engine.js";
export type {
  SyncRunRequest,
  SyncRunResult,
  SyncServiceOptions,
} from "./service.js";
export { SyncService } from "./service.js";
