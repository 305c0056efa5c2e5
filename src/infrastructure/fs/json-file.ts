/**
 * JSON file storage with backup-before-write
 *
 * A save moves the current file to `<path>.bak`, writes the new content, then
 * drops the backup. If the write fails the backup is moved back, so the file
 * always holds either the old or the new content. A backup still present at
 * load time means the process died mid-save.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, unlinkSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import type { z } from 'zod';
import type { AppLogger } from '../../utils/logger.js';

export type JsonReadResult<T> =
  | { kind: 'missing' }
  | { kind: 'empty' }
  | { kind: 'corrupt'; reason: string }
  | { kind: 'ok'; value: T };

export function backupPathFor(path: string): string {
  return `${path}.bak`;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Read and validate a JSON file; never throws
 */
export function readJsonFile<T>(
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): JsonReadResult<T> {
  if (!existsSync(path)) {
    return { kind: 'missing' };
  }

  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    return { kind: 'corrupt', reason: `unreadable: ${describeError(error)}` };
  }

  if (content.trim() === '') {
    return { kind: 'empty' };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    return { kind: 'corrupt', reason: `invalid JSON: ${describeError(error)}` };
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return { kind: 'corrupt', reason: `unexpected content: ${issues}` };
  }

  return { kind: 'ok', value: parsed.data };
}

/**
 * Resolve a backup left behind by an interrupted save, then read the file
 */
export function loadJsonFile<T>(
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  logger: AppLogger
): JsonReadResult<T> {
  const backupPath = backupPathFor(path);

  if (existsSync(backupPath)) {
    const primary = readJsonFile(path, schema);
    try {
      if (primary.kind === 'ok') {
        logger.warn(`Removing stale backup ${backupPath}`);
        unlinkSync(backupPath);
      } else {
        logger.warn(`Interrupted save detected, restoring ${path} from ${backupPath}`);
        renameSync(backupPath, path);
      }
    } catch (error) {
      logger.error(`Failed to resolve backup ${backupPath}`, error);
    }
  }

  return readJsonFile(path, schema);
}

/**
 * Write `data` as pretty-printed JSON; false when the write failed and the
 * previous content was put back
 */
export function writeJsonFileDurably(path: string, data: unknown, logger: AppLogger): boolean {
  const backupPath = backupPathFor(path);
  let hasBackup = false;
  let wroteNew = false;

  try {
    const content = JSON.stringify(data, null, 2) + '\n';

    mkdirSync(dirname(path), { recursive: true });
    if (existsSync(path)) {
      renameSync(path, backupPath);
      hasBackup = true;
    }

    wroteNew = true;
    writeFileSync(path, content, 'utf-8');
  } catch (error) {
    logger.error(`Failed to write ${path}`, error);
    restoreBackup(path, backupPath, { hasBackup, wroteNew }, logger);
    return false;
  }

  if (hasBackup) {
    try {
      unlinkSync(backupPath);
    } catch (error) {
      // Picked up as a stale backup on the next load
      logger.warn(`Could not remove backup ${backupPath}: ${describeError(error)}`);
    }
  }

  return true;
}

/**
 * Undo a failed save. The primary file is only touched when this save
 * moved it away or started writing it.
 */
function restoreBackup(
  path: string,
  backupPath: string,
  progress: { hasBackup: boolean; wroteNew: boolean },
  logger: AppLogger
): void {
  try {
    if (progress.hasBackup) {
      renameSync(backupPath, path);
      logger.warn(`Restored ${path} from backup`);
    } else if (progress.wroteNew && existsSync(path)) {
      // No previous file: drop the partial one
      unlinkSync(path);
    }
  } catch (error) {
    logger.error(`Failed to restore ${path} from backup`, error);
  }
}
