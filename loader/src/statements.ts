import type { Dialect } from './dialect.js';
import {
  SUBMISSION_TYPE_STAGING_TABLE,
  SUBMISSION_TYPE_TABLE,
  stagingColumns,
  type TableDefinition,
  type TableReference,
} from './tables.js';

const SCHEMA = 'lms';

export interface Statement {
  sql: string;
  params: (string | number | null)[];
}

const matchesNaturalKey = (left: string, right: string) =>
  `${left}.SourceSystemIdentifier = ${right}.SourceSystemIdentifier AND ${left}.SourceSystem = ${right}.SourceSystem`;

const resolvesReference = (reference: TableReference, alias: string) =>
  `${alias}.SourceSystemIdentifier = stg.${reference.column} AND ${alias}.SourceSystem = stg.SourceSystem`;

export function stagingIndexName(table: TableDefinition): string {
  return `ix_${table.stagingTable.toLowerCase()}_natural_key`;
}

export const STAGING_INDEX_COLUMNS = ['SourceSystemIdentifier', 'SourceSystem', 'LastModifiedDate'] as const;

/**
 * Copies staging rows with no production counterpart. Each reference is an inner join, so a
 * row whose parent is not loaded yet is left out; `unresolvedRows` reports those.
 */
export function insertNew(table: TableDefinition): string {
  const aliases = table.references.map((_, index) => `r${index}`);
  const valueColumns = stagingColumns(table).filter(
    (column) => !table.references.some((reference) => reference.column === column),
  );
  const insertColumns = [...table.references.map((reference) => reference.key), ...valueColumns];
  const selectColumns = [
    ...table.references.map((reference, index) => `${aliases[index]}.${reference.key}`),
    ...valueColumns.map((column) => `stg.${column}`),
  ];
  const joins = table.references.map(
    (reference, index) =>
      `INNER JOIN ${SCHEMA}.${reference.table} AS ${aliases[index]} ON ${resolvesReference(reference, aliases[index])}`,
  );

  return [
    `INSERT INTO ${SCHEMA}.${table.table} (${insertColumns.join(', ')})`,
    `SELECT ${selectColumns.join(', ')}`,
    `FROM ${SCHEMA}.${table.stagingTable} AS stg`,
    ...joins,
    `WHERE NOT EXISTS (SELECT 1 FROM ${SCHEMA}.${table.table} AS p WHERE ${matchesNaturalKey('p', 'stg')})`,
  ].join('\n');
}

/** New staging rows with at least one reference that has no parent row. */
export function unresolvedRows(table: TableDefinition): string | undefined {
  if (table.references.length === 0) {
    return undefined;
  }
  const missing = table.references.map(
    (reference, index) =>
      `NOT EXISTS (SELECT 1 FROM ${SCHEMA}.${reference.table} AS r${index} WHERE ${resolvesReference(reference, `r${index}`)})`,
  );
  return [
    'SELECT stg.SourceSystemIdentifier AS sourcesystemidentifier',
    `FROM ${SCHEMA}.${table.stagingTable} AS stg`,
    `WHERE NOT EXISTS (SELECT 1 FROM ${SCHEMA}.${table.table} AS p WHERE ${matchesNaturalKey('p', 'stg')})`,
    `AND (${missing.join(' OR ')})`,
    'ORDER BY stg.SourceSystemIdentifier',
  ].join('\n');
}

/**
 * Overwrites mutable columns wherever the source modification time moved. CreateDate and the
 * resolved references are never touched; a reappearing row loses its DeletedAt.
 */
export function updateChanged(table: TableDefinition): string {
  const assignments = [...table.columns.map((column) => column.name), 'LastModifiedDate'].map(
    (column) => `${column} = stg.${column}`,
  );
  return [
    `UPDATE ${SCHEMA}.${table.table} AS t`,
    `SET ${[...assignments, 'DeletedAt = NULL'].join(', ')}`,
    `FROM ${SCHEMA}.${table.stagingTable} AS stg`,
    `WHERE ${matchesNaturalKey('t', 'stg')}`,
    'AND t.LastModifiedDate <> stg.LastModifiedDate',
  ].join('\n');
}

export function undelete(table: TableDefinition): string {
  return [
    `UPDATE ${SCHEMA}.${table.table} AS t`,
    'SET DeletedAt = NULL',
    'WHERE t.DeletedAt IS NOT NULL',
    `AND EXISTS (SELECT 1 FROM ${SCHEMA}.${table.stagingTable} AS stg WHERE ${matchesNaturalKey('t', 'stg')})`,
  ].join('\n');
}

/**
 * Marks production rows of one source system that are missing from staging. Tables with a
 * scope only consider rows whose parent appears in the staged file.
 */
export function softDelete(table: TableDefinition, dialect: Dialect, sourceSystem: string): Statement {
  const lines = [
    `UPDATE ${SCHEMA}.${table.table} AS t`,
    `SET DeletedAt = ${dialect.now()}`,
    'WHERE t.DeletedAt IS NULL',
    `AND t.SourceSystem = ${dialect.placeholder(1)}`,
    `AND NOT EXISTS (SELECT 1 FROM ${SCHEMA}.${table.stagingTable} AS stg WHERE ${matchesNaturalKey('t', 'stg')})`,
  ];
  const scope = table.references.find((reference) => reference.column === table.scope);
  if (scope) {
    lines.push(
      `AND t.${scope.key} IN (`,
      `  SELECT parent.${scope.key} FROM ${SCHEMA}.${scope.table} AS parent`,
      `  INNER JOIN ${SCHEMA}.${table.stagingTable} AS stg ON ${resolvesReference(scope, 'parent')}`,
      ')',
    );
  }
  return { sql: lines.join('\n'), params: [sourceSystem] };
}

/**
 * Multi-row INSERT into a staging table, split so that no statement binds more than
 * `maxParameters` values.
 */
export function insertStaging(
  stagingTable: string,
  columns: readonly string[],
  rows: readonly (string | number | null)[][],
  dialect: Dialect,
  maxParameters = 999,
): Statement[] {
  const rowsPerStatement = Math.max(1, Math.floor(maxParameters / columns.length));
  const statements: Statement[] = [];
  for (let start = 0; start < rows.length; start += rowsPerStatement) {
    const chunk = rows.slice(start, start + rowsPerStatement);
    let position = 0;
    const tuples = chunk.map(
      () => `(${columns.map(() => dialect.placeholder(++position)).join(', ')})`,
    );
    statements.push({
      sql: `INSERT INTO ${SCHEMA}.${stagingTable} (${columns.join(', ')}) VALUES ${tuples.join(', ')}`,
      params: chunk.flat(),
    });
  }
  return statements;
}

export const SUBMISSION_TYPE_COLUMNS = ['SourceSystemIdentifier', 'SourceSystem', 'SubmissionType'] as const;

export function insertNewSubmissionTypes(): string {
  return [
    `INSERT INTO ${SCHEMA}.${SUBMISSION_TYPE_TABLE} (AssignmentIdentifier, SubmissionType)`,
    'SELECT a.AssignmentIdentifier, st.SubmissionType',
    `FROM ${SCHEMA}.${SUBMISSION_TYPE_STAGING_TABLE} AS st`,
    `INNER JOIN ${SCHEMA}.Assignment AS a ON ${matchesNaturalKey('a', 'st')}`,
    `WHERE NOT EXISTS (SELECT 1 FROM ${SCHEMA}.${SUBMISSION_TYPE_TABLE} AS p`,
    '  WHERE p.AssignmentIdentifier = a.AssignmentIdentifier AND p.SubmissionType = st.SubmissionType)',
  ].join('\n');
}

/** Submission types dropped from an assignment that is still present in the staged file. */
export function softDeleteSubmissionTypes(dialect: Dialect): string {
  return [
    `UPDATE ${SCHEMA}.${SUBMISSION_TYPE_TABLE} AS ast`,
    `SET DeletedAt = ${dialect.now()}`,
    'WHERE ast.DeletedAt IS NULL',
    'AND ast.AssignmentIdentifier IN (',
    `  SELECT a.AssignmentIdentifier FROM ${SCHEMA}.Assignment AS a`,
    `  INNER JOIN ${SCHEMA}.stg_Assignment AS stg ON ${matchesNaturalKey('a', 'stg')}`,
    ')',
    'AND NOT EXISTS (',
    `  SELECT 1 FROM ${SCHEMA}.${SUBMISSION_TYPE_STAGING_TABLE} AS st`,
    `  INNER JOIN ${SCHEMA}.Assignment AS a ON ${matchesNaturalKey('a', 'st')}`,
    '  WHERE a.AssignmentIdentifier = ast.AssignmentIdentifier AND st.SubmissionType = ast.SubmissionType',
    ')',
  ].join('\n');
}

export function undeleteSubmissionTypes(): string {
  return [
    `UPDATE ${SCHEMA}.${SUBMISSION_TYPE_TABLE} AS ast`,
    'SET DeletedAt = NULL',
    'WHERE ast.DeletedAt IS NOT NULL',
    'AND EXISTS (',
    `  SELECT 1 FROM ${SCHEMA}.${SUBMISSION_TYPE_STAGING_TABLE} AS st`,
    `  INNER JOIN ${SCHEMA}.Assignment AS a ON ${matchesNaturalKey('a', 'st')}`,
    '  WHERE a.AssignmentIdentifier = ast.AssignmentIdentifier AND st.SubmissionType = ast.SubmissionType',
    ')',
  ].join('\n');
}

export function selectProcessedFiles(dialect: Dialect): string {
  return `SELECT FullPath AS fullpath FROM ${SCHEMA}.ProcessedFiles WHERE ResourceName = ${dialect.placeholder(1)}`;
}

export function insertProcessedFile(dialect: Dialect): string {
  const values = [1, 2, 3].map((position) => dialect.placeholder(position));
  return `INSERT INTO ${SCHEMA}.ProcessedFiles (FullPath, ResourceName, NumberOfRows) VALUES (${values.join(', ')})`;
}
