import { UDM_COLUMNS } from '../../udm/schema.js';
import type { Logger } from '../../shared/logger.js';
import { readUdmCsv, type CsvRow, type ResourceFile } from './file_reader.js';
import type { SqlAdapter, SqlExecutor, SqlValue } from './sql_adapter.js';
import {
  STAGING_INDEX_COLUMNS,
  SUBMISSION_TYPE_COLUMNS,
  insertNew,
  insertNewSubmissionTypes,
  insertProcessedFile,
  insertStaging,
  selectProcessedFiles,
  softDelete,
  softDeleteSubmissionTypes,
  stagingIndexName,
  undelete,
  undeleteSubmissionTypes,
  unresolvedRows,
  updateChanged,
} from './statements.js';
import {
  ASSIGNMENTS,
  SUBMISSION_TYPE_LENGTH,
  SUBMISSION_TYPE_STAGING_TABLE,
  stagingColumns,
  type TableDefinition,
} from './tables.js';

export interface LoaderContext {
  adapter: SqlAdapter;
  logger: Logger;
}

export interface MergeStats {
  rows: number;
  inserted: number;
  updated: number;
  undeleted: number;
  softDeleted: number;
  /** Staging identifiers left out because a parent row was missing. */
  skipped: string[];
}

export async function processedFiles(adapter: SqlAdapter, resource: string): Promise<Set<string>> {
  const rows = await adapter.query(selectProcessedFiles(adapter.dialect), [resource]);
  return new Set(rows.map((row) => String(row.fullpath)));
}

/**
 * Converts CSV rows to staging parameter lists: '' becomes NULL and text longer than its
 * column is cut to that many characters, with one warning per cut value.
 */
export function toStagingRows(table: TableDefinition, rows: readonly CsvRow[], logger: Logger): SqlValue[][] {
  const columns = stagingColumns(table);
  const limits = new Map(table.columns.map((column) => [column.name, column.maxLength]));

  return rows.map((row) =>
    columns.map((column) => {
      const value = row[column] ?? '';
      if (value === '') {
        return null;
      }
      const limit = limits.get(column);
      if (limit === undefined) {
        return value;
      }
      const characters = Array.from(value);
      if (characters.length > limit) {
        logger.warn(
          { table: table.table, column, identifier: row.SourceSystemIdentifier, length: characters.length, limit },
          'value truncated to column length',
        );
        return characters.slice(0, limit).join('');
      }
      return value;
    }),
  );
}

/**
 * Keeps the last row of every (SourceSystem, SourceSystemIdentifier) pair, in the order the
 * pairs first appear. Each dropped earlier row is logged.
 */
export function latestRowPerKey(rows: readonly CsvRow[], logger: Logger): CsvRow[] {
  const latest = new Map<string, CsvRow>();
  for (const row of rows) {
    const key = JSON.stringify([row.SourceSystem, row.SourceSystemIdentifier]);
    if (latest.has(key)) {
      logger.warn(
        { sourceSystem: row.SourceSystem, identifier: row.SourceSystemIdentifier },
        'duplicate row in file, keeping the last one',
      );
    }
    latest.set(key, row);
  }
  return [...latest.values()];
}

/** `["online_upload","online_text_entry"]` to one staging row per type. */
export function toSubmissionTypeRows(rows: readonly CsvRow[], logger: Logger): SqlValue[][] {
  const staged: SqlValue[][] = [];
  for (const row of rows) {
    const raw = row.SubmissionType ?? '';
    if (raw === '') {
      continue;
    }
    let types: unknown;
    try {
      types = JSON.parse(raw);
    } catch (error) {
      logger.warn({ identifier: row.SourceSystemIdentifier, err: error }, 'unreadable submission type list');
      continue;
    }
    if (!Array.isArray(types)) {
      logger.warn({ identifier: row.SourceSystemIdentifier }, 'submission type is not a list');
      continue;
    }
    for (const type of new Set(types.filter((item): item is string => typeof item === 'string' && item !== ''))) {
      staged.push([row.SourceSystemIdentifier, row.SourceSystem, type.slice(0, SUBMISSION_TYPE_LENGTH)]);
    }
  }
  return staged;
}

async function stage(tx: SqlExecutor, table: TableDefinition, rows: SqlValue[][]): Promise<void> {
  const index = stagingIndexName(table);
  await tx.execute(tx.dialect.dropIndex(index));
  await tx.execute(tx.dialect.truncate(table.stagingTable));
  for (const statement of insertStaging(table.stagingTable, stagingColumns(table), rows, tx.dialect)) {
    await tx.execute(statement.sql, statement.params);
  }
  await tx.execute(tx.dialect.createIndex(index, table.stagingTable, STAGING_INDEX_COLUMNS));
}

async function mergeSubmissionTypes(tx: SqlExecutor, rows: SqlValue[][]): Promise<void> {
  await tx.execute(tx.dialect.truncate(SUBMISSION_TYPE_STAGING_TABLE));
  for (const statement of insertStaging(SUBMISSION_TYPE_STAGING_TABLE, SUBMISSION_TYPE_COLUMNS, rows, tx.dialect)) {
    await tx.execute(statement.sql, statement.params);
  }
  await tx.execute(insertNewSubmissionTypes());
  await tx.execute(softDeleteSubmissionTypes(tx.dialect));
  await tx.execute(undeleteSubmissionTypes());
}

/**
 * Loads one CSV into staging and reconciles production with it: insert new, update
 * changed, clear stale deletes, soft-delete missing. The file is recorded in ProcessedFiles
 * in the same transaction, so a failure leaves neither the data nor the ledger changed.
 */
export async function mergeFile(ctx: LoaderContext, table: TableDefinition, file: ResourceFile): Promise<MergeStats> {
  const log = ctx.logger.child({ resource: table.resource, file: file.path });
  const rows = latestRowPerKey(readUdmCsv(file.path, UDM_COLUMNS[table.resource]), log);
  const stats: MergeStats = { rows: rows.length, inserted: 0, updated: 0, undeleted: 0, softDeleted: 0, skipped: [] };

  await ctx.adapter.transaction(async (tx) => {
    if (rows.length > 0) {
      await stage(tx, table, toStagingRows(table, rows, log));

      const unresolved = unresolvedRows(table);
      if (unresolved) {
        for (const row of await tx.query(unresolved)) {
          const identifier = String(row.sourcesystemidentifier);
          log.warn({ identifier }, 'skipping row with an unresolved reference');
          stats.skipped.push(identifier);
        }
      }

      stats.inserted = await tx.execute(insertNew(table));
      stats.updated = await tx.execute(updateChanged(table));
      stats.undeleted = await tx.execute(undelete(table));
      for (const sourceSystem of new Set(rows.map((row) => row.SourceSystem).filter((value) => value !== ''))) {
        const statement = softDelete(table, tx.dialect, sourceSystem);
        stats.softDeleted += await tx.execute(statement.sql, statement.params);
      }

      if (table === ASSIGNMENTS) {
        await mergeSubmissionTypes(tx, toSubmissionTypeRows(rows, log));
      }
    } else {
      log.info('empty file, nothing to merge');
    }

    await tx.execute(insertProcessedFile(tx.dialect), [file.path, table.resource, rows.length]);
  });

  return stats;
}
