import path from 'node:path';

import { z } from 'zod';

import { parseConfig } from '../../shared/cli.js';
import { logLevelSchema, type LogLevel } from '../../shared/logger.js';
import { layerInputs } from '../../extractors/common/config.js';
import { ENGINES } from './dialect.js';

const loaderEnvSchema = z
  .object({
    CSV_PATH: z.string().trim().min(1),
    DB_ENGINE: z.string().trim().toLowerCase().pipe(z.enum(ENGINES)).default('postgresql'),
    DB_CONNECTION_STRING: z.string().trim().min(1).optional(),
    DB_SERVER: z.string().trim().min(1).default('localhost'),
    DB_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
    DB_NAME: z.string().trim().min(1).optional(),
    DB_USERNAME: z.string().trim().min(1).optional(),
    DB_PASSWORD: z.string().optional(),
    DATABASE_FILE: z.string().trim().min(1).optional(),
    LOG_LEVEL: logLevelSchema,
  })
  .superRefine((env, ctx) => {
    if (env.DB_ENGINE === 'postgresql' && !env.DB_CONNECTION_STRING && !env.DB_NAME) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DB_NAME'],
        message: 'postgresql needs DB_CONNECTION_STRING or DB_NAME',
      });
    }
    if (env.DB_ENGINE === 'sqlite' && !env.DATABASE_FILE) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['DATABASE_FILE'], message: 'sqlite needs DATABASE_FILE' });
    }
  });

export const LOADER_FLAGS = {
  csvpath: 'CSV_PATH',
  engine: 'DB_ENGINE',
  'connection-string': 'DB_CONNECTION_STRING',
  server: 'DB_SERVER',
  port: 'DB_PORT',
  dbname: 'DB_NAME',
  username: 'DB_USERNAME',
  password: 'DB_PASSWORD',
  'database-file': 'DATABASE_FILE',
  'log-level': 'LOG_LEVEL',
} as const;

export type DatabaseTarget =
  | { engine: 'postgresql'; connectionString: string }
  | { engine: 'sqlite'; databaseFile: string };

export interface LoaderConfig {
  csvPath: string;
  database: DatabaseTarget;
  logLevel: LogLevel;
}

function connectionString(env: z.output<typeof loaderEnvSchema>): string {
  if (env.DB_CONNECTION_STRING) {
    return env.DB_CONNECTION_STRING;
  }
  const credentials = env.DB_USERNAME
    ? `${encodeURIComponent(env.DB_USERNAME)}${env.DB_PASSWORD ? `:${encodeURIComponent(env.DB_PASSWORD)}` : ''}@`
    : '';
  return `postgresql://${credentials}${env.DB_SERVER}:${env.DB_PORT}/${encodeURIComponent(env.DB_NAME ?? '')}`;
}

export function loadLoaderConfig(flags: Record<string, string>, env: NodeJS.ProcessEnv = process.env): LoaderConfig {
  const parsed = parseConfig(loaderEnvSchema, layerInputs(env, flags));
  const database: DatabaseTarget =
    parsed.DB_ENGINE === 'sqlite'
      ? { engine: 'sqlite', databaseFile: path.resolve(parsed.DATABASE_FILE ?? '') }
      : { engine: 'postgresql', connectionString: connectionString(parsed) };
  return { csvPath: path.resolve(parsed.CSV_PATH), database, logLevel: parsed.LOG_LEVEL };
}
