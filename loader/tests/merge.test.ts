import assert from 'node:assert/strict';
import test from 'node:test';

import { captureLogs, messages } from '../../shared/tests/log_capture.js';
import type { UdmResource } from '../../udm/schema.js';
import type { ResourceFile } from '../src/file_reader.js';
import { latestRowPerKey, mergeFile, processedFiles, toStagingRows, toSubmissionTypeRows } from '../src/merge.js';
import { ASSIGNMENTS, SECTIONS, USERS } from '../src/tables.js';
import { assignmentRow, openTestDatabase, sectionRow, userRow, writeResourceCsv } from './database.js';

const fileAt = (resource: UdmResource, path: string): ResourceFile => ({ resource, path, partition: {} });

test('new rows are inserted and rows with a missing parent are skipped', async (t) => {
  const { ctx, adapter, csvPath, lines } = await openTestDatabase(t);

  const users = writeResourceCsv(csvPath, 'users', [userRow('u1'), userRow('u2')]);
  assert.deepEqual(await mergeFile(ctx, USERS, fileAt('users', users)), {
    rows: 2,
    inserted: 2,
    updated: 0,
    undeleted: 0,
    softDeleted: 0,
    skipped: [],
  });
  await mergeFile(ctx, SECTIONS, fileAt('sections', writeResourceCsv(csvPath, 'sections', [sectionRow('s1')])));

  const assignments = writeResourceCsv(
    csvPath,
    'assignments',
    [assignmentRow('a1', 's1'), assignmentRow('a2', 'missing')],
    { sectionId: 's1' },
  );
  const stats = await mergeFile(ctx, ASSIGNMENTS, fileAt('assignments', assignments));

  assert.equal(stats.inserted, 1);
  assert.deepEqual(stats.skipped, ['a2']);
  assert.deepEqual(messages(lines, 'warn'), ['skipping row with an unresolved reference']);
  assert.deepEqual(
    await adapter.query(
      'SELECT a.SourceSystemIdentifier AS id, s.SourceSystemIdentifier AS section FROM lms.Assignment AS a ' +
        'INNER JOIN lms.LMSSection AS s ON s.LMSSectionIdentifier = a.LMSSectionIdentifier',
    ),
    [{ id: 'a1', section: 's1' }],
  );
  assert.deepEqual([...(await processedFiles(adapter, 'users'))], [users]);
});

test('merging the same rows again changes nothing', async (t) => {
  const { ctx, csvPath } = await openTestDatabase(t);
  const rows = [userRow('u1'), userRow('u2')];

  await mergeFile(ctx, USERS, fileAt('users', writeResourceCsv(csvPath, 'users', rows, {}, '2024-05-01-00-00-00')));
  const again = await mergeFile(ctx, USERS, fileAt('users', writeResourceCsv(csvPath, 'users', rows, {}, '2024-05-02-00-00-00')));

  assert.deepEqual(again, { rows: 2, inserted: 0, updated: 0, undeleted: 0, softDeleted: 0, skipped: [] });
});

test('a newer modification time overwrites the row but keeps its CreateDate', async (t) => {
  const { ctx, adapter, csvPath } = await openTestDatabase(t);

  await mergeFile(ctx, USERS, fileAt('users', writeResourceCsv(csvPath, 'users', [userRow('u1')], {}, '2024-05-01-00-00-00')));
  const changed = userRow('u1', {
    Name: 'Ada Lovelace',
    CreateDate: '2024-05-02 00:00:00',
    LastModifiedDate: '2024-05-02 00:00:00',
  });
  const stats = await mergeFile(ctx, USERS, fileAt('users', writeResourceCsv(csvPath, 'users', [changed], {}, '2024-05-02-00-00-00')));

  assert.equal(stats.updated, 1);
  assert.deepEqual(
    await adapter.query('SELECT Name AS name, CreateDate AS created, LastModifiedDate AS modified FROM lms.LMSUser'),
    [{ name: 'Ada Lovelace', created: '2024-05-01 00:00:00', modified: '2024-05-02 00:00:00' }],
  );
});

test('missing rows are soft-deleted per source system and restored when they reappear', async (t) => {
  const { ctx, adapter, csvPath } = await openTestDatabase(t);
  const deleted = async () => adapter.query('SELECT SourceSystemIdentifier AS id FROM lms.LMSUser WHERE DeletedAt IS NOT NULL');

  await mergeFile(
    ctx,
    USERS,
    fileAt(
      'users',
      writeResourceCsv(csvPath, 'users', [userRow('u1'), userRow('u2'), userRow('x1', { SourceSystem: 'Schoology' })], {}, '2024-05-01-00-00-00'),
    ),
  );

  const shrunk = await mergeFile(ctx, USERS, fileAt('users', writeResourceCsv(csvPath, 'users', [userRow('u1')], {}, '2024-05-02-00-00-00')));
  assert.equal(shrunk.softDeleted, 1);
  assert.deepEqual(await deleted(), [{ id: 'u2' }]);

  const restored = await mergeFile(
    ctx,
    USERS,
    fileAt('users', writeResourceCsv(csvPath, 'users', [userRow('u1'), userRow('u2')], {}, '2024-05-03-00-00-00')),
  );
  assert.equal(restored.undeleted, 1);
  assert.equal(restored.updated, 0);
  assert.deepEqual(await deleted(), []);
});

test('soft deletes of section-scoped rows stay within the staged sections', async (t) => {
  const { ctx, adapter, csvPath } = await openTestDatabase(t);
  await mergeFile(ctx, SECTIONS, fileAt('sections', writeResourceCsv(csvPath, 'sections', [sectionRow('s1'), sectionRow('s2')])));
  await mergeFile(
    ctx,
    ASSIGNMENTS,
    fileAt('assignments', writeResourceCsv(csvPath, 'assignments', [assignmentRow('a1', 's1'), assignmentRow('a2', 's1')], { sectionId: 's1' })),
  );
  await mergeFile(
    ctx,
    ASSIGNMENTS,
    fileAt('assignments', writeResourceCsv(csvPath, 'assignments', [assignmentRow('a3', 's2')], { sectionId: 's2' })),
  );

  const stats = await mergeFile(
    ctx,
    ASSIGNMENTS,
    fileAt(
      'assignments',
      writeResourceCsv(csvPath, 'assignments', [assignmentRow('a1', 's1')], { sectionId: 's1' }, '2024-05-07-00-00-00'),
    ),
  );

  assert.equal(stats.softDeleted, 1);
  assert.deepEqual(
    await adapter.query(
      'SELECT SourceSystemIdentifier AS id, DeletedAt IS NOT NULL AS deleted FROM lms.Assignment ORDER BY SourceSystemIdentifier',
    ),
    [
      { id: 'a1', deleted: 0 },
      { id: 'a2', deleted: 1 },
      { id: 'a3', deleted: 0 },
    ],
  );
});

test('an empty file is recorded without touching production rows', async (t) => {
  const { ctx, adapter, csvPath, lines } = await openTestDatabase(t);
  await mergeFile(ctx, USERS, fileAt('users', writeResourceCsv(csvPath, 'users', [userRow('u1')], {}, '2024-05-01-00-00-00')));

  const empty = writeResourceCsv(csvPath, 'users', [], {}, '2024-05-02-00-00-00');
  const stats = await mergeFile(ctx, USERS, fileAt('users', empty));

  assert.deepEqual(stats, { rows: 0, inserted: 0, updated: 0, undeleted: 0, softDeleted: 0, skipped: [] });
  assert.ok(messages(lines, 'info').includes('empty file, nothing to merge'));
  assert.deepEqual(
    await adapter.query('SELECT NumberOfRows AS numberofrows FROM lms.ProcessedFiles WHERE FullPath = ?', [empty]),
    [{ numberofrows: 0 }],
  );
  assert.deepEqual(await adapter.query('SELECT DeletedAt AS deletedat FROM lms.LMSUser'), [{ deletedat: null }]);
});

test('long descriptions are cut to the column length with a warning', async (t) => {
  const { ctx, adapter, csvPath, lines } = await openTestDatabase(t);
  await mergeFile(ctx, SECTIONS, fileAt('sections', writeResourceCsv(csvPath, 'sections', [sectionRow('s1')])));

  const long = assignmentRow('a1', 's1', { AssignmentDescription: 'x'.repeat(1100) });
  await mergeFile(ctx, ASSIGNMENTS, fileAt('assignments', writeResourceCsv(csvPath, 'assignments', [long], { sectionId: 's1' })));

  assert.deepEqual(messages(lines, 'warn'), ['value truncated to column length']);
  assert.deepEqual(await adapter.query('SELECT length(AssignmentDescription) AS size FROM lms.Assignment'), [{ size: 1024 }]);
});

test('a key repeated in one file keeps its last row', async (t) => {
  const { ctx, adapter, csvPath, lines } = await openTestDatabase(t);

  const users = writeResourceCsv(csvPath, 'users', [
    userRow('u1', { Name: 'First' }),
    userRow('u2'),
    userRow('u1', { Name: 'Second' }),
  ]);
  const stats = await mergeFile(ctx, USERS, fileAt('users', users));

  assert.deepEqual(stats, { rows: 2, inserted: 2, updated: 0, undeleted: 0, softDeleted: 0, skipped: [] });
  assert.deepEqual(messages(lines, 'warn'), ['duplicate row in file, keeping the last one']);
  assert.deepEqual(
    await adapter.query('SELECT SourceSystemIdentifier AS id, Name AS name FROM lms.LMSUser ORDER BY SourceSystemIdentifier'),
    [
      { id: 'u1', name: 'Second' },
      { id: 'u2', name: 'User u2' },
    ],
  );
});

test('rows sharing an identifier across source systems are kept apart', () => {
  const { logger, lines } = captureLogs();

  const rows = latestRowPerKey(
    [
      { SourceSystemIdentifier: 'u1', SourceSystem: 'Canvas', Name: 'A' },
      { SourceSystemIdentifier: 'u1', SourceSystem: 'Schoology', Name: 'B' },
      { SourceSystemIdentifier: 'u1', SourceSystem: 'Canvas', Name: 'C' },
    ],
    logger,
  );

  assert.deepEqual(
    rows.map((row) => `${row.SourceSystem}:${row.Name}`),
    ['Canvas:C', 'Schoology:B'],
  );
  assert.equal(messages(lines, 'warn').length, 1);
});

test('submission types follow the latest list of their assignment', async (t) => {
  const { ctx, adapter, csvPath } = await openTestDatabase(t);
  await mergeFile(ctx, SECTIONS, fileAt('sections', writeResourceCsv(csvPath, 'sections', [sectionRow('s1')])));
  const load = async (types: string, stamp: string) =>
    mergeFile(
      ctx,
      ASSIGNMENTS,
      fileAt(
        'assignments',
        writeResourceCsv(csvPath, 'assignments', [assignmentRow('a1', 's1', { SubmissionType: types })], { sectionId: 's1' }, stamp),
      ),
    );
  const active = async () =>
    adapter.query(
      'SELECT SubmissionType AS type, DeletedAt IS NULL AS active FROM lms.AssignmentSubmissionType ORDER BY SubmissionType',
    );

  await load('["online_upload","online_text_entry","online_upload"]', '2024-05-01-00-00-00');
  assert.deepEqual(await active(), [
    { type: 'online_text_entry', active: 1 },
    { type: 'online_upload', active: 1 },
  ]);

  await load('["online_upload"]', '2024-05-02-00-00-00');
  assert.deepEqual(await active(), [
    { type: 'online_text_entry', active: 0 },
    { type: 'online_upload', active: 1 },
  ]);

  await load('["online_text_entry","online_upload"]', '2024-05-03-00-00-00');
  assert.deepEqual(await active(), [
    { type: 'online_text_entry', active: 1 },
    { type: 'online_upload', active: 1 },
  ]);
});

test('a failing merge leaves production and the ledger unchanged', async (t) => {
  const { ctx, adapter, csvPath } = await openTestDatabase(t);
  await mergeFile(ctx, USERS, fileAt('users', writeResourceCsv(csvPath, 'users', [userRow('u1')], {}, '2024-05-01-00-00-00')));

  const broken = writeResourceCsv(
    csvPath,
    'users',
    [userRow('u1', { Name: 'Renamed', LastModifiedDate: '2024-05-02 00:00:00' }), userRow('u2', { SourceSystem: '' })],
    {},
    '2024-05-02-00-00-00',
  );
  await assert.rejects(mergeFile(ctx, USERS, fileAt('users', broken)), /NOT NULL constraint failed/);

  assert.deepEqual(await adapter.query('SELECT Name AS name FROM lms.LMSUser'), [{ name: 'User u1' }]);
  assert.equal((await processedFiles(adapter, 'users')).size, 1);
});

test('staging values turn empty text into NULL', () => {
  const { logger } = captureLogs();

  const [row] = toStagingRows(USERS, [{ SourceSystemIdentifier: 'u1', SourceSystem: 'Canvas', Name: '', UserRole: 'Student' }], logger);

  assert.deepEqual(row, ['u1', 'Canvas', 'Student', null, null, null, null, null, null, null]);
});

test('text is cut by characters, never inside a surrogate pair', () => {
  const { logger, lines } = captureLogs();

  const [row] = toStagingRows(
    USERS,
    [{ SourceSystemIdentifier: 'u1', SourceSystem: 'Canvas', UserRole: '\u{1F600}'.repeat(61) }],
    logger,
  );

  assert.equal(row[2], '\u{1F600}'.repeat(60));
  assert.deepEqual(messages(lines, 'warn'), ['value truncated to column length']);
});

test('unreadable submission type lists are skipped with a warning', () => {
  const { logger, lines } = captureLogs();
  const base = { SourceSystemIdentifier: 'a1', SourceSystem: 'Canvas' };

  const rows = toSubmissionTypeRows(
    [
      { ...base, SubmissionType: 'not json' },
      { ...base, SubmissionType: '"online_upload"' },
      { ...base, SubmissionType: '["on_paper",3,"on_paper",""]' },
      { ...base, SubmissionType: '' },
    ],
    logger,
  );

  assert.deepEqual(rows, [['a1', 'Canvas', 'on_paper']]);
  assert.deepEqual(messages(lines, 'warn'), ['unreadable submission type list', 'submission type is not a list']);
});
