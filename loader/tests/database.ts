import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { TestContext } from 'node:test';

import { formatCsv, type CsvValue } from '../../shared/csv.js';
import { captureLogs, type CapturedLogger } from '../../shared/tests/log_capture.js';
import { UDM_COLUMNS, resourceDirectory, type ResourcePartition, type UdmResource } from '../../udm/schema.js';
import type { LoaderContext } from '../src/merge.js';
import { migrate } from '../src/migrator.js';
import { createSqliteAdapter, type SqlAdapter } from '../src/sql_adapter.js';

export interface TestDatabase extends CapturedLogger {
  adapter: SqlAdapter;
  ctx: LoaderContext;
  csvPath: string;
}

export type CsvRecord = Record<string, CsvValue>;

/** A migrated in-memory SQLite target and an empty CSV root. */
export async function openTestDatabase(t: TestContext): Promise<TestDatabase> {
  const captured = captureLogs();
  const adapter = createSqliteAdapter(':memory:');
  await migrate(adapter, captured.logger);
  const csvPath = fs.mkdtempSync(path.join(os.tmpdir(), 'lms-loader-'));
  t.after(async () => {
    await adapter.close();
    fs.rmSync(csvPath, { recursive: true, force: true });
  });
  return { ...captured, adapter, ctx: { adapter, logger: captured.logger }, csvPath };
}

/** Writes `<csvPath>/<resource dir>/<stamp>.csv` with the resource's UDM header. */
export function writeResourceCsv(
  csvPath: string,
  resource: UdmResource,
  rows: readonly CsvRecord[],
  partition: ResourcePartition = {},
  stamp = '2024-05-06-07-08-09',
): string {
  const directory = path.join(csvPath, resourceDirectory(resource, partition));
  fs.mkdirSync(directory, { recursive: true });
  const file = path.join(directory, `${stamp}.csv`);
  fs.writeFileSync(file, formatCsv(UDM_COLUMNS[resource], rows));
  return file;
}

const STAMPS = { SourceSystem: 'Canvas', EntityStatus: 'active', CreateDate: '2024-05-01 00:00:00', LastModifiedDate: '2024-05-01 00:00:00' };

export const userRow = (id: string, overrides: CsvRecord = {}): CsvRecord => ({
  ...STAMPS,
  SourceSystemIdentifier: id,
  UserRole: 'Student',
  Name: `User ${id}`,
  ...overrides,
});

export const sectionRow = (id: string, overrides: CsvRecord = {}): CsvRecord => ({
  ...STAMPS,
  SourceSystemIdentifier: id,
  Title: `Section ${id}`,
  LMSSectionStatus: 'available',
  ...overrides,
});

export const assignmentRow = (id: string, sectionId: string, overrides: CsvRecord = {}): CsvRecord => ({
  ...STAMPS,
  SourceSystemIdentifier: id,
  LMSSectionSourceSystemIdentifier: sectionId,
  Title: `Assignment ${id}`,
  MaxPoints: 10,
  ...overrides,
});

export const associationRow = (id: string, sectionId: string, userId: string, overrides: CsvRecord = {}): CsvRecord => ({
  ...STAMPS,
  SourceSystemIdentifier: id,
  LMSSectionSourceSystemIdentifier: sectionId,
  LMSUserSourceSystemIdentifier: userId,
  EnrollmentStatus: 'Active',
  ...overrides,
});

export const submissionRow = (id: string, assignmentId: string, userId: string, overrides: CsvRecord = {}): CsvRecord => ({
  ...STAMPS,
  SourceSystemIdentifier: id,
  AssignmentSourceSystemIdentifier: assignmentId,
  LMSUserSourceSystemIdentifier: userId,
  SubmissionStatus: 'graded',
  ...overrides,
});

export const gradeRow = (
  id: string,
  sectionId: string,
  userId: string,
  associationId: string,
  overrides: CsvRecord = {},
): CsvRecord => ({
  ...STAMPS,
  SourceSystemIdentifier: id,
  LMSSectionSourceSystemIdentifier: sectionId,
  LMSUserSourceSystemIdentifier: userId,
  LMSUserLMSSectionAssociationSourceSystemIdentifier: associationId,
  Grade: 'A',
  GradeType: 'Final',
  ...overrides,
});
