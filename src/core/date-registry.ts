/**
 * Date Registry: every calendar date ever seen on the booking site
 *
 * Stored grouped by month, sorted within each month:
 *   { "2025-01": ["2025-01-06", "2025-01-13"], "2025-02": ["2025-02-10"] }
 */

import { z } from 'zod';
import { isIsoDate, monthOf } from '../utils/date.js';
import { loadJsonFile, writeJsonFileDurably } from '../infrastructure/fs/json-file.js';
import type { AppLogger } from '../utils/logger.js';

const StoredDatesSchema = z
  .record(z.string().regex(/^\d{4}-\d{2}$/, 'expected YYYY-MM'), z.array(z.string().refine(isIsoDate, 'expected YYYY-MM-DD')))
  .transform((grouped) => new Set(Object.values(grouped).flat()));

/**
 * Outcome of a register call
 */
export interface RegisterOutcome {
  added: Set<string>;
  persisted: boolean;
}

/**
 * Date Registry interface
 */
export interface DateRegistry {
  readonly path: string;
  load(): Set<string>;
  list(): string[];
  register(dates: Iterable<string>): RegisterOutcome;
}

/**
 * Group dates by month, both levels sorted ascending
 */
export function groupByMonth(dates: Iterable<string>): Record<string, string[]> {
  const grouped: Record<string, string[]> = {};
  const sorted = Array.from(new Set(dates)).sort();

  for (const date of sorted) {
    const month = monthOf(date);
    (grouped[month] ??= []).push(date);
  }
  return grouped;
}

/**
 * JSON file implementation of DateRegistry
 */
export class JsonDateRegistry implements DateRegistry {
  constructor(
    readonly path: string,
    private logger: AppLogger
  ) {}

  load(): Set<string> {
    const result = loadJsonFile(this.path, StoredDatesSchema, this.logger);

    switch (result.kind) {
      case 'ok':
        return result.value;
      case 'missing':
      case 'empty':
        this.logger.info(`No known dates at ${this.path}, starting empty`);
        writeJsonFileDurably(this.path, {}, this.logger);
        return new Set();
      case 'corrupt':
        this.logger.warn(`Known dates at ${this.path} are corrupted (${result.reason}), starting empty`);
        return new Set();
    }
  }

  list(): string[] {
    return Array.from(this.load()).sort();
  }

  /**
   * Merge `dates` into the known set and return the ones not seen before
   */
  register(dates: Iterable<string>): RegisterOutcome {
    const known = this.load();
    const added = new Set<string>();

    for (const date of dates) {
      if (!isIsoDate(date)) {
        this.logger.warn(`Ignoring invalid date "${date}"`);
        continue;
      }
      if (!known.has(date)) {
        added.add(date);
        known.add(date);
      }
    }

    if (added.size === 0) {
      return { added, persisted: true };
    }

    const persisted = writeJsonFileDurably(this.path, groupByMonth(known), this.logger);
    if (persisted) {
      this.logger.info(`Registered ${added.size} new date(s): ${Array.from(added).sort().join(', ')}`);
    }
    return { added, persisted };
  }
}

/**
 * Create a new date registry
 */
export function createDateRegistry(path: string, logger: AppLogger): DateRegistry {
  return new JsonDateRegistry(path, logger);
}
