import { summarizeExceptions, type ExceptionsSummary } from './exceptions_report.js';
import { listResourceFiles } from './file_reader.js';
import { mergeFile, processedFiles, type LoaderContext, type MergeStats } from './merge.js';
import { migrate } from './migrator.js';
import { LOAD_ORDER, type TableDefinition } from './tables.js';

export interface LoaderOptions {
  csvPath: string;
  migrationsDirectory?: string;
  tables?: readonly TableDefinition[];
}

export interface LoadSummary {
  merged: number;
  alreadyProcessed: number;
  totals: Omit<MergeStats, 'skipped'> & { skipped: number };
  exceptions: ExceptionsSummary;
}

/**
 * Migrates the schema, then merges the newest file of every resource partition in load
 * order. Files already in ProcessedFiles are left alone. Database errors propagate.
 * Ends with a count of the active users and sections that carry no SIS identifier.
 */
export async function runLoader(ctx: LoaderContext, options: LoaderOptions): Promise<LoadSummary> {
  await migrate(ctx.adapter, ctx.logger, options.migrationsDirectory);

  const summary: LoadSummary = {
    merged: 0,
    alreadyProcessed: 0,
    totals: { rows: 0, inserted: 0, updated: 0, undeleted: 0, softDeleted: 0, skipped: 0 },
    exceptions: { unmatchedUsers: 0, unmatchedSections: 0 },
  };

  for (const table of options.tables ?? LOAD_ORDER) {
    const log = ctx.logger.child({ resource: table.resource });
    const seen = await processedFiles(ctx.adapter, table.resource);
    const files = listResourceFiles(options.csvPath, table.resource);
    log.debug({ files: files.length }, 'resource files found');

    for (const file of files) {
      if (seen.has(file.path)) {
        log.debug({ file: file.path }, 'file already processed');
        summary.alreadyProcessed += 1;
        continue;
      }
      const stats = await mergeFile(ctx, table, file);
      log.info({ file: file.path, ...stats, skipped: stats.skipped.length }, 'file merged');
      summary.merged += 1;
      summary.totals.rows += stats.rows;
      summary.totals.inserted += stats.inserted;
      summary.totals.updated += stats.updated;
      summary.totals.undeleted += stats.undeleted;
      summary.totals.softDeleted += stats.softDeleted;
      summary.totals.skipped += stats.skipped.length;
    }
  }

  summary.exceptions = await summarizeExceptions(ctx.adapter, ctx.logger);
  ctx.logger.info(summary, 'load finished');
  return summary;
}
