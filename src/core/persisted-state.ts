/**
 * In-memory slot history: last observed court statuses per time row
 */

import { formatStateKey } from './slot-key.js';
import type { CourtStatuses, TimeSlotKey } from '../types/index.js';

interface Entry {
  key: TimeSlotKey;
  courts: CourtStatuses;
}

export class PersistedState {
  private entriesByKey = new Map<string, Entry>();

  constructor(entries: Iterable<[TimeSlotKey, CourtStatuses]> = []) {
    for (const [key, courts] of entries) {
      this.set(key, courts);
    }
  }

  get size(): number {
    return this.entriesByKey.size;
  }

  get(key: TimeSlotKey): CourtStatuses | undefined {
    const entry = this.entriesByKey.get(formatStateKey(key));
    return entry ? { ...entry.courts } : undefined;
  }

  /**
   * Replace the whole row (never merged with the previous one)
   */
  set(key: TimeSlotKey, courts: CourtStatuses): void {
    this.entriesByKey.set(formatStateKey(key), {
      key: { timeLabel: key.timeLabel, date: key.date },
      courts: { ...courts },
    });
  }

  delete(key: TimeSlotKey): boolean {
    return this.entriesByKey.delete(formatStateKey(key));
  }

  /**
   * Entries sorted by date, then time label
   */
  entries(): [TimeSlotKey, CourtStatuses][] {
    return Array.from(this.entriesByKey.values())
      .sort((a, b) => {
        if (a.key.date !== b.key.date) return a.key.date < b.key.date ? -1 : 1;
        if (a.key.timeLabel !== b.key.timeLabel) return a.key.timeLabel < b.key.timeLabel ? -1 : 1;
        return 0;
      })
      .map((entry) => [{ ...entry.key }, { ...entry.courts }]);
  }

  clone(): PersistedState {
    return new PersistedState(this.entries());
  }
}
