/**
 * Configuration loader: YAML file validated against AppConfigSchema
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { resolve } from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { formatIssues } from '../core/snapshot.js';
import type { AppConfig } from '../types/index.js';
import { AppConfigSchema } from './schema.js';

/**
 * Looked up in order when no path is given
 */
const CONFIG_CANDIDATES = ['config/config.yaml', 'config/config.yml', 'config.yaml', 'config.yml'];

/**
 * First existing candidate under `baseDir`
 */
export function findConfigPath(baseDir: string = process.cwd()): string | null {
  return CONFIG_CANDIDATES.map((candidate) => resolve(baseDir, candidate)).find((path) => existsSync(path)) ?? null;
}

export async function loadConfig(configPath?: string): Promise<AppConfig> {
  const path = configPath ?? findConfigPath();
  if (!path) {
    throw new Error('Configuration file not found. Create config/config.yaml from config/config.example.yaml');
  }

  // An empty file means "all defaults"
  const raw: unknown = yaml.load(await readFile(path, 'utf-8')) ?? {};
  return AppConfigSchema.parse(raw);
}

/**
 * loadConfig for the CLI: failures become a printable message
 */
export async function loadConfigSafe(
  configPath?: string
): Promise<{ config: AppConfig; error: null } | { config: null; error: string }> {
  try {
    return { config: await loadConfig(configPath), error: null };
  } catch (err) {
    const error =
      err instanceof z.ZodError
        ? `Configuration validation failed:\n${formatIssues(err)}`
        : err instanceof Error
          ? err.message
          : String(err);
    return { config: null, error };
  }
}
