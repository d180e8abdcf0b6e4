import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { Logger } from '../../shared/logger.js';
import type { SqlAdapter } from './sql_adapter.js';

export const MIGRATIONS_DIRECTORY = fileURLToPath(new URL('../migrations/', import.meta.url));

export class MigrationError extends Error {
  constructor(
    public readonly script: string,
    cause: unknown,
  ) {
    super(`Migration ${script} failed`, { cause });
    this.name = 'MigrationError';
  }
}

export function listMigrationScripts(directory: string): string[] {
  return fs
    .readdirSync(directory)
    .filter((file) => file.endsWith('.sql'))
    .sort();
}

/**
 * An absent journal means a fresh database where nothing has run. Any other failure is
 * rethrown.
 */
async function hasRun(adapter: SqlAdapter, script: string): Promise<boolean> {
  try {
    const rows = await adapter.query(
      `SELECT 1 AS applied FROM lms.MigrationJournal WHERE Script = ${adapter.dialect.placeholder(1)}`,
      [script],
    );
    return rows.length > 0;
  } catch (error) {
    if (adapter.dialect.isUndefinedTable(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * Applies `<directory>/<engine>/*.sql` in name order, each script at most once. A script and
 * its journal entry commit together. Resolves to the scripts applied by this call.
 */
export async function migrate(
  adapter: SqlAdapter,
  logger: Logger,
  directory: string = MIGRATIONS_DIRECTORY,
): Promise<string[]> {
  const scriptsDirectory = path.join(directory, adapter.dialect.engine);
  const applied: string[] = [];

  for (const script of listMigrationScripts(scriptsDirectory)) {
    if (await hasRun(adapter, script)) {
      logger.debug({ script }, 'migration already applied');
      continue;
    }

    const sql = fs.readFileSync(path.join(scriptsDirectory, script), 'utf8');
    try {
      await adapter.transaction(async (tx) => {
        await tx.executeScript(sql);
        await tx.execute(`INSERT INTO lms.MigrationJournal (Script) VALUES (${tx.dialect.placeholder(1)})`, [script]);
      });
    } catch (error) {
      throw new MigrationError(script, error);
    }
    logger.info({ script }, 'migration applied');
    applied.push(script);
  }

  return applied;
}
