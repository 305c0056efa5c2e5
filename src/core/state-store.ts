/**
 * State Store: last known court statuses per time row, kept in a JSON file
 *
 * File format (stable across releases):
 *   { "11H00|2025-01-06": { "Padel 1": "occupé", "Padel 2": "libre" } }
 */

import { z } from 'zod';
import { PersistedState } from './persisted-state.js';
import { formatStateKey, parseStateKey } from './slot-key.js';
import { loadJsonFile, writeJsonFileDurably } from '../infrastructure/fs/json-file.js';
import type { AppLogger } from '../utils/logger.js';
import type { CourtStatuses, SlotStatus, TimeSlotKey } from '../types/index.js';

const StoredStatusSchema = z.enum(['libre', 'occupé']);
type StoredStatus = z.infer<typeof StoredStatusSchema>;

const STATUS_TO_STORED: Record<SlotStatus, StoredStatus> = {
  FREE: 'libre',
  OCCUPIED: 'occupé',
};

const STORED_TO_STATUS: Record<StoredStatus, SlotStatus> = {
  libre: 'FREE',
  occupé: 'OCCUPIED',
};

/**
 * Stored file schema, decoded into a PersistedState
 */
const StoredStateSchema = z
  .record(z.string(), z.record(z.string().min(1), StoredStatusSchema))
  .transform((raw, ctx) => {
    const entries: [TimeSlotKey, CourtStatuses][] = [];

    for (const [rawKey, storedCourts] of Object.entries(raw)) {
      const key = parseStateKey(rawKey);
      if (!key) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `invalid state key "${rawKey}"`,
          path: [rawKey],
        });
        return z.NEVER;
      }

      const courts: CourtStatuses = {};
      for (const [courtId, stored] of Object.entries(storedCourts)) {
        courts[courtId] = STORED_TO_STATUS[stored];
      }
      entries.push([key, courts]);
    }

    return new PersistedState(entries);
  });

/**
 * State Store interface
 */
export interface StateStore {
  readonly path: string;
  load(): PersistedState;
  save(state: PersistedState): boolean;
}

/**
 * JSON file implementation of StateStore
 */
export class JsonStateStore implements StateStore {
  constructor(
    readonly path: string,
    private logger: AppLogger
  ) {}

  /**
   * Read the stored history. A missing file is created empty; a corrupted
   * one yields an empty state and is left for the next save to replace.
   */
  load(): PersistedState {
    const result = loadJsonFile(this.path, StoredStateSchema, this.logger);

    switch (result.kind) {
      case 'ok':
        return result.value;
      case 'missing':
      case 'empty':
        this.logger.info(`No slot history at ${this.path}, starting empty`);
        writeJsonFileDurably(this.path, {}, this.logger);
        return new PersistedState();
      case 'corrupt':
        this.logger.warn(`Slot history at ${this.path} is corrupted (${result.reason}), starting empty`);
        return new PersistedState();
    }
  }

  /**
   * Write the full history; false when the write failed and the previous
   * file was restored
   */
  save(state: PersistedState): boolean {
    const stored: Record<string, Record<string, StoredStatus>> = {};

    for (const [key, courts] of state.entries()) {
      const storedCourts: Record<string, StoredStatus> = {};
      for (const [courtId, status] of Object.entries(courts)) {
        storedCourts[courtId] = STATUS_TO_STORED[status];
      }
      stored[formatStateKey(key)] = storedCourts;
    }

    const ok = writeJsonFileDurably(this.path, stored, this.logger);
    if (ok) {
      this.logger.debug(`Saved ${state.size} slot row(s) to ${this.path}`);
    }
    return ok;
  }
}

/**
 * Drop rows dated before `horizonDate`; returns how many were removed
 */
export function pruneExpired(state: PersistedState, horizonDate: string): number {
  let removed = 0;
  for (const [key] of state.entries()) {
    if (key.date < horizonDate) {
      state.delete(key);
      removed++;
    }
  }
  return removed;
}

/**
 * Create a new state store
 */
export function createStateStore(path: string, logger: AppLogger): StateStore {
  return new JsonStateStore(path, logger);
}
