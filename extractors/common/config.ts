import path from 'node:path';

import { z } from 'zod';

import { logLevelSchema, type LogLevel } from '../../shared/logger.js';

export const isoDateSchema = z
  .string()
  .trim()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

export const extractorEnvSchema = z.object({
  OUTPUT_DIRECTORY: z.string().trim().min(1).default(path.resolve('output')),
  SYNC_DATABASE_DIRECTORY: z.string().trim().min(1).default(path.resolve('data')),
  LOG_LEVEL: logLevelSchema,
});

export const SHARED_FLAGS = {
  'output-directory': 'OUTPUT_DIRECTORY',
  'sync-database-directory': 'SYNC_DATABASE_DIRECTORY',
  'log-level': 'LOG_LEVEL',
} as const;

export const SHARED_USAGE = `  --output-directory <path>         UDM CSV output root (OUTPUT_DIRECTORY, default ./output).
  --sync-database-directory <path>  Sync store directory (SYNC_DATABASE_DIRECTORY, default ./data).
  --log-level <level>               fatal | error | warn | info | debug | trace (LOG_LEVEL).
  --help                            Show this message.`;

export interface ExtractorSettings {
  outputDirectory: string;
  syncDatabaseDirectory: string;
  logLevel: LogLevel;
}

export function toExtractorSettings(parsed: z.output<typeof extractorEnvSchema>): ExtractorSettings {
  return {
    outputDirectory: parsed.OUTPUT_DIRECTORY,
    syncDatabaseDirectory: parsed.SYNC_DATABASE_DIRECTORY,
    logLevel: parsed.LOG_LEVEL,
  };
}

/** Flags win over the environment; blank environment values count as unset. */
export function layerInputs(env: NodeJS.ProcessEnv, flags: Record<string, string>): Record<string, string> {
  const merged: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      merged[key] = value;
    }
  }
  return { ...merged, ...flags };
}
