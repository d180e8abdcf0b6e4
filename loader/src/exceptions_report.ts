import type { Logger } from '../../shared/logger.js';
import type { SqlExecutor } from './sql_adapter.js';

export interface ExceptionsSummary {
  unmatchedUsers: number;
  unmatchedSections: number;
}

// Active rows without a SIS identifier cannot be matched to student information system records.
const UNMATCHED_USERS = 'SELECT COUNT(*) AS count FROM lms.LMSUser WHERE DeletedAt IS NULL AND SISUserIdentifier IS NULL';
const UNMATCHED_SECTIONS =
  'SELECT COUNT(*) AS count FROM lms.LMSSection WHERE DeletedAt IS NULL AND SISSectionIdentifier IS NULL';

async function count(executor: SqlExecutor, sql: string): Promise<number> {
  const [row] = await executor.query(sql);
  // pg returns COUNT(*) as a bigint string
  return Number(row?.count ?? 0);
}

export async function summarizeExceptions(executor: SqlExecutor, logger: Logger): Promise<ExceptionsSummary> {
  const summary: ExceptionsSummary = {
    unmatchedUsers: await count(executor, UNMATCHED_USERS),
    unmatchedSections: await count(executor, UNMATCHED_SECTIONS),
  };
  if (summary.unmatchedUsers === 0 && summary.unmatchedSections === 0) {
    logger.debug('there are no unmatched sections or users');
  } else {
    logger.warn(
      summary,
      `there are ${summary.unmatchedSections} unmatched sections and ${summary.unmatchedUsers} unmatched users`,
    );
  }
  return summary;
}
