export * from './types/index.js';
export { loadConfig, loadConfigSafe } from './config/index.js';
export { AppConfigSchema } from './config/schema.js';
export { PersistedState } from './core/persisted-state.js';
export { normalizeTimeLabel, formatStateKey, parseStateKey, sameTimeSlot, compareSlotKeys } from './core/slot-key.js';
export { SnapshotSchema, ScrapeResultSchema } from './core/snapshot.js';
export { JsonStateStore, createStateStore, pruneExpired, type StateStore } from './core/state-store.js';
export {
  JsonDateRegistry,
  createDateRegistry,
  groupByMonth,
  type DateRegistry,
  type RegisterOutcome,
} from './core/date-registry.js';
export {
  AvailabilityTracker,
  createTracker,
  emptyReport,
  hasChanges,
  type TrackerOptions,
  type PruneOutcome,
} from './core/tracker.js';
export { runCycle, type SiteAdapter, type ReportNotifier, type CycleDeps } from './core/cycle.js';
export { Logger, createLogger, type AppLogger, type LogLevel } from './utils/logger.js';
