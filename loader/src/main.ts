import { ErrorTracker } from '../../shared/error_tracker.js';
import { loadEnvironment, parseFlags, runMain } from '../../shared/cli.js';
import { createLogger } from '../../shared/logger.js';
import { LOADER_FLAGS, loadLoaderConfig, type DatabaseTarget } from './config.js';
import { runLoader } from './loader.js';
import { createPostgresAdapter, createSqliteAdapter, type SqlAdapter } from './sql_adapter.js';

function showUsage(): void {
  console.log(`UDM loader

Usage:
  npm run load -- --csvpath <dir> [options]

Options:
  --csvpath <dir>                   Root of the extractor CSV output (CSV_PATH).
  --engine <engine>                 postgresql | sqlite (DB_ENGINE, default postgresql).
  --connection-string <url>         PostgreSQL connection string (DB_CONNECTION_STRING).
  --server <host>                   PostgreSQL host (DB_SERVER, default localhost).
  --port <port>                     PostgreSQL port (DB_PORT, default 5432).
  --dbname <name>                   PostgreSQL database (DB_NAME).
  --username <user>                 PostgreSQL user (DB_USERNAME).
  --password <password>             PostgreSQL password (DB_PASSWORD).
  --database-file <path>            SQLite database file (DATABASE_FILE).
  --log-level <level>               fatal | error | warn | info | debug | trace (LOG_LEVEL).
  --help                            Show this message.
`);
}

function openAdapter(target: DatabaseTarget): SqlAdapter {
  return target.engine === 'sqlite' ? createSqliteAdapter(target.databaseFile) : createPostgresAdapter(target.connectionString);
}

async function main(): Promise<number> {
  loadEnvironment();
  const flags = parseFlags(process.argv.slice(2), LOADER_FLAGS);
  if (flags.showHelp) {
    showUsage();
    return 0;
  }
  const config = loadLoaderConfig(flags.values);
  const tracker = new ErrorTracker();
  const logger = createLogger({ name: 'lms-loader', level: config.logLevel, tracker });

  const adapter = openAdapter(config.database);
  try {
    await runLoader({ adapter, logger }, { csvPath: config.csvPath });
  } catch (error) {
    logger.fatal({ err: error }, 'load aborted');
  } finally {
    await adapter.close();
  }

  const { errors, warnings } = tracker.snapshot();
  logger.info({ errors, warnings, engine: config.database.engine }, 'loader finished');
  return tracker.exitCode();
}

runMain(main);
