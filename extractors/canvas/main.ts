import { ErrorTracker } from '../../shared/error_tracker.js';
import { loadEnvironment, parseFlags, runMain } from '../../shared/cli.js';
import { createLogger } from '../../shared/logger.js';
import { SHARED_USAGE } from '../common/config.js';
import { systemClock } from '../common/records.js';
import { closeRunContext, createRunContext } from '../common/run_context.js';
import { CanvasClient } from './canvas_api_client.js';
import { runCanvasExtract } from './canvas_extractor.js';
import { CANVAS_FLAGS, loadCanvasConfig } from './config.js';

function showUsage(): void {
  console.log(`Canvas extractor

Usage:
  npm run extract:canvas -- [options]

Options:
  --base-url <url>                  Canvas instance URL (CANVAS_BASE_URL).
  --access-token <token>            API access token (CANVAS_ACCESS_TOKEN).
  --account-id <id>                 Account whose courses are pulled (CANVAS_ACCOUNT_ID, default self).
  --start-date <YYYY-MM-DD>         Skip courses ending before this date (START_DATE).
  --end-date <YYYY-MM-DD>           Skip courses starting after this date (END_DATE).
${SHARED_USAGE}
`);
}

async function main(): Promise<number> {
  loadEnvironment();
  const flags = parseFlags(process.argv.slice(2), CANVAS_FLAGS);
  if (flags.showHelp) {
    showUsage();
    return 0;
  }
  const config = loadCanvasConfig(flags.values);
  const tracker = new ErrorTracker();
  const logger = createLogger({ name: 'canvas-extractor', level: config.logLevel, tracker });

  const client = new CanvasClient({
    baseUrl: config.baseUrl,
    accessToken: config.accessToken,
    logger: logger.child({ component: 'canvas-api' }),
  });
  const ctx = createRunContext({
    connector: 'canvas',
    client,
    logger,
    tracker,
    outputDirectory: config.outputDirectory,
    syncDatabaseDirectory: config.syncDatabaseDirectory,
    now: systemClock,
  });

  try {
    await runCanvasExtract(ctx, {
      accountId: config.accountId,
      startDate: config.startDate,
      endDate: config.endDate,
    });
  } catch (error) {
    logger.fatal({ err: error }, 'canvas extraction aborted');
  }
  return closeRunContext(ctx);
}

runMain(main);
