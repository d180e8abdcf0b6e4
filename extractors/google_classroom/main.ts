import { ErrorTracker } from '../../shared/error_tracker.js';
import { loadEnvironment, parseFlags, runMain } from '../../shared/cli.js';
import { createLogger } from '../../shared/logger.js';
import { SHARED_USAGE } from '../common/config.js';
import { systemClock } from '../common/records.js';
import { closeRunContext, createRunContext } from '../common/run_context.js';
import { ClassroomClient } from './classroom_api_client.js';
import { runGoogleClassroomExtract } from './classroom_extractor.js';
import { CLASSROOM_FLAGS, loadClassroomConfig } from './config.js';
import { ServiceAccountAuth, loadServiceAccount } from './google_auth.js';

function showUsage(): void {
  console.log(`Google Classroom extractor

Usage:
  npm run extract:google-classroom -- [options]

Options:
  --classroom-account <email>       Admin account the service account acts for (CLASSROOM_ACCOUNT).
  --service-account-file <path>     Service account JSON key (GOOGLE_SERVICE_ACCOUNT_FILE).
  --usage-start-date <YYYY-MM-DD>   First day of sign-in usage to pull (USAGE_START_DATE).
  --usage-end-date <YYYY-MM-DD>     Last day of sign-in usage to pull (USAGE_END_DATE).
${SHARED_USAGE}
`);
}

async function main(): Promise<number> {
  loadEnvironment();
  const flags = parseFlags(process.argv.slice(2), CLASSROOM_FLAGS);
  if (flags.showHelp) {
    showUsage();
    return 0;
  }
  const config = loadClassroomConfig(flags.values);
  const tracker = new ErrorTracker();
  const logger = createLogger({ name: 'google-classroom-extractor', level: config.logLevel, tracker });

  const auth = new ServiceAccountAuth({
    credentials: loadServiceAccount(config.serviceAccountFile),
    subject: config.classroomAccount,
  });
  const client = new ClassroomClient({ auth, logger: logger.child({ component: 'classroom-api' }) });
  const ctx = createRunContext({
    connector: 'google-classroom',
    client,
    logger,
    tracker,
    outputDirectory: config.outputDirectory,
    syncDatabaseDirectory: config.syncDatabaseDirectory,
    now: systemClock,
  });

  try {
    await runGoogleClassroomExtract(ctx, {
      usageStartDate: config.usageStartDate,
      usageEndDate: config.usageEndDate,
    });
  } catch (error) {
    logger.fatal({ err: error }, 'google classroom extraction aborted');
  }
  return closeRunContext(ctx);
}

runMain(main);
