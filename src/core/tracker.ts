/**
 * Availability Tracker: compares each snapshot with the stored history,
 * reports freed slots and new dates, and updates both stores
 *
 * Per slot: Unknown -> Free/Occupied sets a baseline, Occupied -> Free is
 * reported, Free -> Occupied only updates the baseline.
 */

import { join } from 'path';
import { compareSlotKeys, formatStateKey, normalizeTimeLabel } from './slot-key.js';
import { SnapshotSchema, formatIssues } from './snapshot.js';
import { createStateStore, pruneExpired, type StateStore } from './state-store.js';
import { createDateRegistry, type DateRegistry } from './date-registry.js';
import { addDays, isValidTimeZone, todayIn } from '../utils/date.js';
import { scopedLogger, type AppLogger } from '../utils/logger.js';
import type {
  AppConfig,
  ChangeReport,
  NewDateEvent,
  Snapshot,
  SnapshotRow,
  SlotFreedEvent,
} from '../types/index.js';

export const DEFAULT_TIME_ZONE = 'Europe/Paris';

/**
 * Tracker options
 */
export interface TrackerOptions {
  stateStore: StateStore;
  dateRegistry: DateRegistry;
  logger: AppLogger;
  targetTimes?: string[]; // empty: report every time label
  retentionDays?: number;
  timeZone?: string;
  now?: () => Date;
}

export interface PruneOutcome {
  removed: number;
  persisted: boolean;
}

export function emptyReport(persisted = false): ChangeReport {
  return { freedSlots: [], newDates: [], persisted };
}

export function hasChanges(report: ChangeReport): boolean {
  return report.freedSlots.length > 0 || report.newDates.length > 0;
}

export class AvailabilityTracker {
  readonly stateStore: StateStore;
  readonly dateRegistry: DateRegistry;
  private logger: AppLogger;
  private targetTimes: Set<string>;
  private retentionDays: number;
  private timeZone: string;
  private now: () => Date;

  constructor(options: TrackerOptions) {
    this.stateStore = options.stateStore;
    this.dateRegistry = options.dateRegistry;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());

    const retentionDays = options.retentionDays ?? 0;
    if (Number.isFinite(retentionDays)) {
      this.retentionDays = Math.max(0, Math.floor(retentionDays));
    } else {
      this.logger.warn(`Ignoring retention of ${retentionDays} day(s), keeping dates from today`);
      this.retentionDays = 0;
    }

    const timeZone = options.timeZone ?? DEFAULT_TIME_ZONE;
    if (isValidTimeZone(timeZone)) {
      this.timeZone = timeZone;
    } else {
      this.logger.warn(`Unknown time zone "${timeZone}", using ${DEFAULT_TIME_ZONE}`);
      this.timeZone = DEFAULT_TIME_ZONE;
    }

    this.targetTimes = new Set();
    for (const raw of options.targetTimes ?? []) {
      const label = normalizeTimeLabel(raw);
      if (label) {
        this.targetTimes.add(label);
      } else {
        this.logger.warn(`Ignoring invalid target time "${raw}"`);
      }
    }
  }

  /**
   * Oldest date kept in the slot history
   */
  horizonDate(): string {
    return addDays(todayIn(this.timeZone, this.now()), -this.retentionDays);
  }

  /**
   * Process one scrape. `bookableDates` is the site's list of bookable dates,
   * merged with the snapshot's own dates for new-date detection.
   */
  process(snapshot: Snapshot, bookableDates: Iterable<string> = []): ChangeReport {
    const parsed = SnapshotSchema.safeParse(snapshot);
    if (!parsed.success) {
      this.logger.error(`Rejected malformed snapshot:\n${formatIssues(parsed.error)}`);
      return emptyReport();
    }

    // Last row wins for a repeated time row
    const rows = new Map<string, SnapshotRow>();
    for (const row of parsed.data) {
      rows.set(formatStateKey(row), row);
    }

    const previous = this.stateStore.load();
    const next = previous.clone();
    const freedSlots: SlotFreedEvent[] = [];

    for (const row of rows.values()) {
      const before = previous.get(row) ?? {};

      for (const [courtId, status] of Object.entries(row.courts)) {
        if (status === 'FREE' && before[courtId] === 'OCCUPIED' && this.isTargetTime(row.timeLabel)) {
          freedSlots.push({ type: 'SLOT_FREED', timeLabel: row.timeLabel, courtId, date: row.date });
        }
      }

      next.set(row, row.courts);
    }

    const removed = pruneExpired(next, this.horizonDate());
    if (removed > 0) {
      this.logger.debug(`Pruned ${removed} expired slot row(s)`);
    }
    const stateSaved = this.stateStore.save(next);

    const seenDates = new Set<string>(Array.from(rows.values(), (row) => row.date));
    for (const date of bookableDates) {
      seenDates.add(date);
    }
    const { added, persisted: datesSaved } = this.dateRegistry.register(seenDates);

    const report: ChangeReport = {
      freedSlots: freedSlots.sort(compareSlotKeys),
      newDates: Array.from(added)
        .sort()
        .map((date): NewDateEvent => ({ type: 'NEW_DATE', date })),
      persisted: stateSaved && datesSaved,
    };

    this.logger.info(
      `Processed ${rows.size} row(s): ${report.freedSlots.length} freed slot(s), ${report.newDates.length} new date(s)`
    );
    if (!report.persisted) {
      this.logger.warn('Stores were not fully saved this cycle; changes may be reported again');
    }

    return report;
  }

  /**
   * Apply the retention policy without a snapshot
   */
  prune(): PruneOutcome {
    const state = this.stateStore.load();
    const removed = pruneExpired(state, this.horizonDate());
    if (removed === 0) {
      return { removed, persisted: true };
    }
    return { removed, persisted: this.stateStore.save(state) };
  }

  private isTargetTime(timeLabel: string): boolean {
    return this.targetTimes.size === 0 || this.targetTimes.has(timeLabel);
  }
}

/**
 * Create a tracker with JSON file stores from the application config
 */
export function createTracker(
  config: AppConfig,
  logger: AppLogger,
  now?: () => Date
): AvailabilityTracker {
  const { storage, tracking } = config;

  return new AvailabilityTracker({
    stateStore: createStateStore(join(storage.dataDir, storage.stateFile), scopedLogger(logger, 'StateStore')),
    dateRegistry: createDateRegistry(join(storage.dataDir, storage.datesFile), scopedLogger(logger, 'DateRegistry')),
    logger: scopedLogger(logger, 'Tracker'),
    targetTimes: tracking.targetTimes,
    retentionDays: tracking.retentionDays,
    timeZone: tracking.timeZone,
    now,
  });
}
