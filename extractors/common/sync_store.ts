import fs from 'node:fs';
import path from 'node:path';

import Database from 'better-sqlite3';

import { MissingColumnError } from './mapping.js';
import { formatTimestamp, systemClock, type Clock, type RawRecord, type RawValue } from './records.js';

type DB = Database.Database;

export class StorageUnavailableError extends Error {
  constructor(
    message: string,
    public readonly resource: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'StorageUnavailableError';
  }
}

export interface SyncStore {
  readonly file: string;
  readonly db: DB;
}

export type SyncedRecord = RawRecord & {
  CreateDate: string;
  LastModifiedDate: string;
};

export interface SyncOptions {
  identifierColumn?: string;
  now?: Clock;
}

const CREATE_DATE = 'CreateDate';
const LAST_MODIFIED_DATE = 'LastModifiedDate';

export function openSyncStore(file: string): SyncStore {
  try {
    if (file !== ':memory:') {
      fs.mkdirSync(path.dirname(file), { recursive: true });
    }
    const db = new Database(file);
    db.pragma('journal_mode = WAL');
    return { file, db };
  } catch (error) {
    throw new StorageUnavailableError(`Unable to open sync store at ${file}`, 'sync-store', error);
  }
}

export function closeSyncStore(store: SyncStore): void {
  if (store.db.open) {
    store.db.close();
  }
}

/**
 * Merges one pull of `resource` into the store and returns the batch stamped with
 * CreateDate and LastModifiedDate.
 *
 * CreateDate is kept from the stored row when the identifier was seen before and set to
 * now otherwise. LastModifiedDate is now for every row of the pull. Rows are appended and
 * then pruned to the most recently written row per identifier; both steps share one
 * transaction, so a failure leaves the previous state untouched.
 */
export function syncRecords(
  store: SyncStore,
  resource: string,
  records: readonly RawRecord[],
  options: SyncOptions = {},
): SyncedRecord[] {
  const identifierColumn = options.identifierColumn ?? 'id';
  if (records.some((record) => isBlank(record[identifierColumn]))) {
    throw new MissingColumnError(resource, [identifierColumn]);
  }
  if (records.length === 0) {
    return [];
  }

  const timestamp = formatTimestamp((options.now ?? systemClock)());

  try {
    const apply = store.db.transaction((): SyncedRecord[] => {
      const tableExists = ensureTable(store.db, resource, identifierColumn, records);
      const lookup = tableExists
        ? store.db
            .prepare(
              `SELECT ${quoteIdentifier(CREATE_DATE)} FROM ${quoteIdentifier(resource)} ` +
                `WHERE ${quoteIdentifier(identifierColumn)} = ? ORDER BY rowid DESC LIMIT 1`,
            )
            .pluck()
        : undefined;

      const reconciled = records.map((record): SyncedRecord => {
        const existing: unknown = lookup?.get(toSqlValue(record[identifierColumn] ?? null));
        return {
          ...record,
          [CREATE_DATE]: typeof existing === 'string' ? existing : timestamp,
          [LAST_MODIFIED_DATE]: timestamp,
        };
      });

      const inserts = new Map<string, Database.Statement>();
      for (const record of reconciled) {
        const columns = Object.keys(record);
        const cacheKey = columns.join('\u0000');
        let insert = inserts.get(cacheKey);
        if (!insert) {
          insert = store.db.prepare(
            `INSERT INTO ${quoteIdentifier(resource)} (${columns.map(quoteIdentifier).join(', ')}) ` +
              `VALUES (${columns.map(() => '?').join(', ')})`,
          );
          inserts.set(cacheKey, insert);
        }
        insert.run(columns.map((column) => toSqlValue(record[column] ?? null)));
      }

      store.db
        .prepare(
          `DELETE FROM ${quoteIdentifier(resource)} WHERE rowid NOT IN ` +
            `(SELECT MAX(rowid) FROM ${quoteIdentifier(resource)} GROUP BY ${quoteIdentifier(identifierColumn)})`,
        )
        .run();

      return latestPerIdentifier(reconciled, identifierColumn);
    });
    return apply();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new StorageUnavailableError(`Unable to sync ${resource}: ${reason}`, resource, error);
  }
}

export function countRows(store: SyncStore, resource: string): number {
  if (listColumns(store.db, resource).length === 0) {
    return 0;
  }
  const count: unknown = store.db.prepare(`SELECT COUNT(*) FROM ${quoteIdentifier(resource)}`).pluck().get();
  return typeof count === 'number' ? count : 0;
}

export function readRecords(store: SyncStore, resource: string): RawRecord[] {
  if (listColumns(store.db, resource).length === 0) {
    return [];
  }
  const rows: unknown[] = store.db.prepare(`SELECT * FROM ${quoteIdentifier(resource)} ORDER BY rowid`).all();
  return rows.map(toRawRecord);
}

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function ensureTable(db: DB, resource: string, identifierColumn: string, records: readonly RawRecord[]): boolean {
  const existing = new Set(listColumns(db, resource));
  const wanted = [...collectColumns(records), CREATE_DATE, LAST_MODIFIED_DATE];

  if (existing.size === 0) {
    // identifier gets TEXT affinity so numeric and string ids compare equal
    const definitions = wanted.map((column) =>
      column === identifierColumn ? `${quoteIdentifier(column)} TEXT` : quoteIdentifier(column),
    );
    db.exec(`CREATE TABLE ${quoteIdentifier(resource)} (${definitions.join(', ')})`);
    return false;
  }

  for (const column of wanted) {
    if (!existing.has(column)) {
      db.exec(`ALTER TABLE ${quoteIdentifier(resource)} ADD COLUMN ${quoteIdentifier(column)}`);
    }
  }
  return true;
}

function listColumns(db: DB, resource: string): string[] {
  const names: unknown[] = db.prepare('SELECT name FROM pragma_table_info(?)').pluck().all(resource);
  return names.filter((name): name is string => typeof name === 'string');
}

function collectColumns(records: readonly RawRecord[]): string[] {
  const columns = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (key !== CREATE_DATE && key !== LAST_MODIFIED_DATE) {
        columns.add(key);
      }
    }
  }
  return [...columns];
}

function latestPerIdentifier(records: SyncedRecord[], identifierColumn: string): SyncedRecord[] {
  const latest = new Map<string, SyncedRecord>();
  for (const record of records) {
    latest.set(String(record[identifierColumn]), record);
  }
  return [...latest.values()];
}

function toSqlValue(value: RawValue): string | number | null {
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  return value;
}

function toRawRecord(row: unknown): RawRecord {
  const record: RawRecord = {};
  if (typeof row !== 'object' || row === null) {
    return record;
  }
  for (const [key, value] of Object.entries(row)) {
    if (typeof value === 'string' || typeof value === 'number' || value === null) {
      record[key] = value;
    } else if (typeof value === 'bigint') {
      record[key] = Number(value);
    } else {
      record[key] = String(value);
    }
  }
  return record;
}

function isBlank(value: RawValue | undefined): boolean {
  return value === undefined || value === null || value === '';
}
