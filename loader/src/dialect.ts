export const ENGINES = ['postgresql', 'sqlite'] as const;

export type Engine = (typeof ENGINES)[number];

/**
 * The few places where the two engines disagree. Statement bodies are shared; identifiers
 * are written unquoted so PostgreSQL folds them to lower case and SQLite matches them
 * case-insensitively.
 */
export interface Dialect {
  readonly engine: Engine;
  placeholder(position: number): string;
  now(): string;
  truncate(table: string): string;
  createIndex(name: string, table: string, columns: readonly string[]): string;
  dropIndex(name: string): string;
  isUndefinedTable(error: unknown): boolean;
}

const SCHEMA = 'lms';

export const postgresDialect: Dialect = {
  engine: 'postgresql',
  placeholder: (position) => `$${position}`,
  now: () => 'now()',
  truncate: (table) => `TRUNCATE TABLE ${SCHEMA}.${table} RESTART IDENTITY`,
  createIndex: (name, table, columns) => `CREATE INDEX IF NOT EXISTS ${name} ON ${SCHEMA}.${table} (${columns.join(', ')})`,
  dropIndex: (name) => `DROP INDEX IF EXISTS ${SCHEMA}.${name}`,
  // 42P01: undefined_table
  isUndefinedTable: (error) => hasCode(error, '42P01'),
};

export const sqliteDialect: Dialect = {
  engine: 'sqlite',
  placeholder: () => '?',
  now: () => `strftime('%Y-%m-%d %H:%M:%f', 'now')`,
  truncate: (table) => `DELETE FROM ${SCHEMA}.${table}`,
  createIndex: (name, table, columns) => `CREATE INDEX IF NOT EXISTS ${SCHEMA}.${name} ON ${table} (${columns.join(', ')})`,
  dropIndex: (name) => `DROP INDEX IF EXISTS ${SCHEMA}.${name}`,
  isUndefinedTable: (error) => error instanceof Error && /no such table/i.test(error.message),
};

export function dialectFor(engine: Engine): Dialect {
  return engine === 'postgresql' ? postgresDialect : sqliteDialect;
}

function hasCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}
