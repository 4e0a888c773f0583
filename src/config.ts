/**
 * Configuration
 *
 * Process settings come from the environment once at start-up; editor settings
 * arrive through the `marc` section of the workspace configuration.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { LogLevel } from './logger';

/**
 * The directory holding package.json. Works from both `src/` and the compiled
 * `dist/src/` layout.
 */
export function findPackageRoot(start: string = __dirname): string {
  let current = start;
  while (true) {
    if (fs.existsSync(path.join(current, 'package.json'))) {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return start;
    }
    current = parent;
  }
}

export const DEFAULT_DATA_DIR = path.join(findPackageRoot(), 'data');

const envSchema = z.object({
  MARC_LSP_DATA_DIR: z
    .string()
    .optional()
    .transform(val => (val && val.trim() !== '' ? path.resolve(val) : DEFAULT_DATA_DIR)),
  MARC_LSP_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  NODE_ENV: z.string().optional(),
});

export interface MarcConfig {
  dataDir: string;
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): MarcConfig {
  const parsed = envSchema.parse(env);
  // Keep test output quiet unless a level is asked for
  const fallbackLevel: LogLevel = parsed.NODE_ENV === 'test' ? 'error' : 'info';
  return {
    dataDir: parsed.MARC_LSP_DATA_DIR,
    logLevel: parsed.MARC_LSP_LOG_LEVEL ?? fallbackLevel,
  };
}

export const settingsSchema = z.object({
  maxNumberOfProblems: z.number().int().positive().default(1000),
  documentationLinks: z.boolean().default(true),
});

export type MarcSettings = z.infer<typeof settingsSchema>;

export const DEFAULT_SETTINGS: MarcSettings = settingsSchema.parse({});

/**
 * Editor settings are user-supplied; anything that does not validate falls
 * back to the defaults.
 */
export function parseSettings(raw: unknown): MarcSettings {
  const result = settingsSchema.safeParse(raw ?? {});
  return result.success ? result.data : DEFAULT_SETTINGS;
}
