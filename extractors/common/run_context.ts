import path from 'node:path';
import { performance } from 'node:perf_hooks';

import type { ErrorTracker } from '../../shared/error_tracker.js';
import type { Logger } from '../../shared/logger.js';
import type { ResourcePartition, UdmResource, UdmRowMap } from '../../udm/schema.js';
import { writeUdmCsv } from './csv_writer.js';
import type { Clock, RawRecord } from './records.js';
import {
  StorageUnavailableError,
  closeSyncStore,
  openSyncStore,
  syncRecords,
  type SyncStore,
  type SyncedRecord,
} from './sync_store.js';

/** Everything one extractor run shares. Built once and passed to each stage. */
export interface RunContext<TClient> {
  client: TClient;
  store: SyncStore;
  logger: Logger;
  tracker: ErrorTracker;
  outputDirectory: string;
  now: Clock;
}

export interface RunContextOptions<TClient> {
  connector: string;
  client: TClient;
  logger: Logger;
  tracker: ErrorTracker;
  outputDirectory: string;
  syncDatabaseDirectory: string;
  now: Clock;
}

export function createRunContext<TClient>(options: RunContextOptions<TClient>): RunContext<TClient> {
  const store = openSyncStore(path.join(options.syncDatabaseDirectory, `${options.connector}-sync.sqlite`));
  return {
    client: options.client,
    store,
    logger: options.logger,
    tracker: options.tracker,
    outputDirectory: options.outputDirectory,
    now: options.now,
  };
}

export function closeRunContext<TClient>(ctx: RunContext<TClient>): number {
  closeSyncStore(ctx.store);
  const summary = ctx.tracker.snapshot();
  ctx.logger.info({ errors: summary.errors, warnings: summary.warnings }, 'run finished');
  return ctx.tracker.exitCode();
}

/**
 * Runs one entity's extraction. Storage failures abort the run; anything else is logged
 * (which marks the run as failed) and the caller moves on to the next entity.
 */
export async function runEntity<TClient>(
  ctx: RunContext<TClient>,
  entity: string,
  task: () => Promise<number>,
): Promise<boolean> {
  const log = ctx.logger.child({ entity });
  const started = performance.now();
  try {
    const rows = await task();
    log.info({ rows, durationMs: Math.round(performance.now() - started) }, 'entity extracted');
    return true;
  } catch (error) {
    if (error instanceof StorageUnavailableError) {
      throw error;
    }
    log.error({ err: error }, `failed to extract ${entity}`);
    return false;
  }
}

export function syncResource<TClient>(
  ctx: RunContext<TClient>,
  table: string,
  records: readonly RawRecord[],
  identifierColumn = 'id',
): SyncedRecord[] {
  return syncRecords(ctx.store, table, records, { identifierColumn, now: ctx.now });
}

export function writeResource<TClient, R extends UdmResource>(
  ctx: RunContext<TClient>,
  resource: R,
  rows: ReadonlyArray<UdmRowMap[R]>,
  partition: ResourcePartition = {},
): string {
  const file = writeUdmCsv(ctx.outputDirectory, resource, rows, { ...partition, now: ctx.now });
  ctx.logger.debug({ resource, rows: rows.length, file }, 'csv written');
  return file;
}

/** Groups rows by a key, keeping first-seen key order. */
export function groupBy<T>(rows: readonly T[], key: (row: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const row of rows) {
    const value = key(row);
    const bucket = groups.get(value);
    if (bucket) {
      bucket.push(row);
    } else {
      groups.set(value, [row]);
    }
  }
  return groups;
}
