import Database from 'better-sqlite3';
import pg, { type QueryResult } from 'pg';

import { postgresDialect, sqliteDialect, type Dialect } from './dialect.js';

export type SqlValue = string | number | null;
export type SqlRow = Record<string, unknown>;

export interface SqlExecutor {
  readonly dialect: Dialect;
  query(sql: string, params?: readonly SqlValue[]): Promise<SqlRow[]>;
  /** Runs one statement and resolves to the number of rows it touched. */
  execute(sql: string, params?: readonly SqlValue[]): Promise<number>;
  /** Runs several `;`-separated statements without parameters. */
  executeScript(sql: string): Promise<void>;
}

export interface SqlAdapter extends SqlExecutor {
  /** Runs `work` inside BEGIN/COMMIT; any rejection rolls the whole unit back. */
  transaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

type PgRunner = (sql: string, params?: SqlValue[]) => Promise<QueryResult<SqlRow>>;

function pgExecutor(run: PgRunner): SqlExecutor {
  return {
    dialect: postgresDialect,
    async query(sql, params = []) {
      return (await run(sql, [...params])).rows;
    },
    async execute(sql, params = []) {
      return (await run(sql, [...params])).rowCount ?? 0;
    },
    async executeScript(sql) {
      await run(sql);
    },
  };
}

export function createPostgresAdapter(connectionString: string): SqlAdapter {
  const pool = new pg.Pool({ connectionString, max: 1 });
  const executor = pgExecutor((sql, params) => pool.query<SqlRow>(sql, params));

  return {
    ...executor,
    async transaction(work) {
      const client = await pool.connect();
      try {
        await client.query('BEGIN');
        const result = await work(pgExecutor((sql, params) => client.query<SqlRow>(sql, params)));
        await client.query('COMMIT');
        return result;
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      } finally {
        client.release();
      }
    },
    async close() {
      await pool.end();
    },
  };
}

function isRow(value: unknown): value is SqlRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * SQLite engine: the production database file is attached as schema `lms` so statements can
 * be shared with PostgreSQL. `:memory:` keeps everything in process.
 */
export function createSqliteAdapter(file: string): SqlAdapter {
  const db = new Database(':memory:');
  db.prepare('ATTACH DATABASE ? AS lms').run(file);

  const executor: SqlExecutor = {
    dialect: sqliteDialect,
    async query(sql, params = []) {
      return db
        .prepare(sql)
        .all(...params)
        .filter(isRow);
    },
    async execute(sql, params = []) {
      return db.prepare(sql).run(...params).changes;
    },
    async executeScript(sql) {
      db.exec(sql);
    },
  };

  return {
    ...executor,
    async transaction(work) {
      db.exec('BEGIN');
      try {
        const result = await work(executor);
        db.exec('COMMIT');
        return result;
      } catch (error) {
        if (db.inTransaction) {
          db.exec('ROLLBACK');
        }
        throw error;
      }
    },
    async close() {
      db.close();
    },
  };
}
