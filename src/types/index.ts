/**
 * Core type definitions for the court slot tracker
 */

/**
 * Observed status of a single court at a given time
 */
export type SlotStatus = 'FREE' | 'OCCUPIED';

/**
 * Time row of the schedule grid on a given date (serialized as "timeLabel|date")
 */
export interface TimeSlotKey {
  timeLabel: string; // canonical, e.g. "11H00"
  date: string; // YYYY-MM-DD
}

/**
 * A single court at a time row on a date
 */
export interface SlotKey extends TimeSlotKey {
  courtId: string; // e.g. "Padel 1"
}

/**
 * Court statuses for one time row
 */
export type CourtStatuses = Record<string, SlotStatus>;

/**
 * One time row as seen by a scrape
 */
export interface SnapshotRow extends TimeSlotKey {
  courts: CourtStatuses;
}

/**
 * Full view of one scrape cycle
 */
export type Snapshot = SnapshotRow[];

/**
 * What a site adapter hands over for one cycle
 */
export interface ScrapeResult {
  snapshot: Snapshot;
  bookableDates: string[];
}

/**
 * Occupied -> Free transition of a slot
 */
export interface SlotFreedEvent extends SlotKey {
  type: 'SLOT_FREED';
}

/**
 * Date that was never seen before
 */
export interface NewDateEvent {
  type: 'NEW_DATE';
  date: string;
}

/**
 * Result of processing one snapshot
 */
export interface ChangeReport {
  freedSlots: SlotFreedEvent[];
  newDates: NewDateEvent[];
  persisted: boolean; // both stores written for this cycle
}

/**
 * Storage configuration
 */
export interface StorageConfig {
  dataDir: string;
  stateFile: string;
  datesFile: string;
}

/**
 * Tracking configuration
 */
export interface TrackingConfig {
  targetTimes: string[];
  retentionDays: number;
  timeZone: string;
}

/**
 * Logging configuration
 */
export interface LoggingConfig {
  level: 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';
  file?: string;
}

/**
 * Complete application configuration
 */
export interface AppConfig {
  storage: StorageConfig;
  tracking: TrackingConfig;
  logging: LoggingConfig;
}
