import { ErrorTracker } from '../../shared/error_tracker.js';
import { loadEnvironment, parseFlags, runMain } from '../../shared/cli.js';
import { createLogger } from '../../shared/logger.js';
import { SHARED_USAGE } from '../common/config.js';
import { systemClock } from '../common/records.js';
import { closeRunContext, createRunContext } from '../common/run_context.js';
import { SCHOOLOGY_FLAGS, loadSchoologyConfig } from './config.js';
import { SchoologyClient } from './schoology_api_client.js';
import { runSchoologyExtract } from './schoology_extractor.js';

function showUsage(): void {
  console.log(`Schoology extractor

Usage:
  npm run extract:schoology -- [options]

Options:
  --client-key <key>                API consumer key (SCHOOLOGY_KEY).
  --client-secret <secret>          API consumer secret (SCHOOLOGY_SECRET).
  --page-size <n>                   Records per page, at most 200 (SCHOOLOGY_PAGE_SIZE).
${SHARED_USAGE}
`);
}

async function main(): Promise<number> {
  loadEnvironment();
  const flags = parseFlags(process.argv.slice(2), SCHOOLOGY_FLAGS);
  if (flags.showHelp) {
    showUsage();
    return 0;
  }
  const config = loadSchoologyConfig(flags.values);
  const tracker = new ErrorTracker();
  const logger = createLogger({ name: 'schoology-extractor', level: config.logLevel, tracker });

  const client = new SchoologyClient({
    credentials: { consumerKey: config.clientKey, consumerSecret: config.clientSecret },
    pageSize: config.pageSize,
    logger: logger.child({ component: 'schoology-api' }),
  });
  const ctx = createRunContext({
    connector: 'schoology',
    client,
    logger,
    tracker,
    outputDirectory: config.outputDirectory,
    syncDatabaseDirectory: config.syncDatabaseDirectory,
    now: systemClock,
  });

  try {
    await runSchoologyExtract(ctx);
  } catch (error) {
    logger.fatal({ err: error }, 'schoology extraction aborted');
  }
  return closeRunContext(ctx);
}

runMain(main);
