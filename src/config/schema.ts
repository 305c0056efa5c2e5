/**
 * Configuration schema validation using Zod
 */

import { z } from 'zod';
import { TimeLabelSchema } from '../core/snapshot.js';
import { isValidTimeZone } from '../utils/date.js';

/**
 * Storage configuration schema
 */
export const StorageConfigSchema = z.object({
  dataDir: z.string().min(1).default('./data'),
  stateFile: z.string().min(1).default('court_states.json'),
  datesFile: z.string().min(1).default('known_dates.json'),
});

/**
 * Tracking configuration schema
 */
export const TrackingConfigSchema = z.object({
  targetTimes: z.array(TimeLabelSchema).default([]),
  retentionDays: z.number().int().min(0).default(0),
  timeZone: z.string().refine(isValidTimeZone, 'unknown time zone').default('Europe/Paris'),
});

/**
 * Logging configuration schema
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR']).default('INFO'),
  file: z.string().min(1).optional(),
});

/**
 * Complete application configuration schema
 */
export const AppConfigSchema = z.object({
  storage: StorageConfigSchema.default({}),
  tracking: TrackingConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type AppConfigInput = z.input<typeof AppConfigSchema>;
