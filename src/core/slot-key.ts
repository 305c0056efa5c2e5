/**
 * Time labels and state keys
 */

import { isIsoDate } from '../utils/date.js';
import type { SlotKey, TimeSlotKey } from '../types/index.js';

const TIME_LABEL_PATTERN = /^(\d{1,2})\s*[Hh:]\s*(\d{2})$/;
const KEY_SEPARATOR = '|';

/**
 * Canonical time label ("11:00", "11h00", "9H30" -> "11H00", "11H00", "09H30")
 */
export function normalizeTimeLabel(raw: string): string | null {
  const match = TIME_LABEL_PATTERN.exec(raw.trim());
  if (!match) return null;

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) return null;

  return `${String(hours).padStart(2, '0')}H${match[2]}`;
}

export function formatStateKey(key: TimeSlotKey): string {
  return `${key.timeLabel}${KEY_SEPARATOR}${key.date}`;
}

/**
 * Parse "11H00|2025-01-06"; null when either half is malformed
 */
export function parseStateKey(raw: string): TimeSlotKey | null {
  const parts = raw.split(KEY_SEPARATOR);
  if (parts.length !== 2) return null;

  const [rawTime, date] = parts;
  const timeLabel = normalizeTimeLabel(rawTime);
  if (!timeLabel || !isIsoDate(date)) return null;

  return { timeLabel, date };
}

export function sameTimeSlot(a: TimeSlotKey, b: TimeSlotKey): boolean {
  return a.timeLabel === b.timeLabel && a.date === b.date;
}

const naturalCollator = new Intl.Collator('en', { numeric: true });

/**
 * Order by date, then time label, then court ("Padel 2" before "Padel 10")
 */
export function compareSlotKeys(a: SlotKey, b: SlotKey): number {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  if (a.timeLabel !== b.timeLabel) return a.timeLabel < b.timeLabel ? -1 : 1;
  return naturalCollator.compare(a.courtId, b.courtId);
}
