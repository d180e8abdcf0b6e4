import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import test, { type TestContext } from 'node:test';
import { fileURLToPath } from 'node:url';

import { parseCsv } from '../../../shared/csv.js';
import type { RawRecord } from '../../common/records.js';
import { closeSyncStore, countRows, openSyncStore, readRecords, syncRecords, type SyncStore } from '../../common/sync_store.js';
import { mapSubmissions } from '../classroom_mapping.js';

function loadPull(name: string): RawRecord[] {
  const file = fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
  const [header, ...rows] = parseCsv(fs.readFileSync(file, 'utf8'));
  return rows.map((row) => Object.fromEntries(header.map((column, index) => [column, row[index] ?? null])));
}

function createStore(t: TestContext): SyncStore {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lms-submissions-'));
  const store = openSyncStore(path.join(dir, 'google-classroom-sync.sqlite'));
  t.after(() => {
    closeSyncStore(store);
    fs.rmSync(dir, { recursive: true, force: true });
  });
  return store;
}

test('three submission pulls accumulate 17, 59 and 99 stored rows', (t) => {
  const store = createStore(t);

  const first = loadPull('submissions-pull-1.csv');
  assert.equal(first.length, 17);
  const firstBatch = syncRecords(store, 'submissions', first, { now: () => new Date('2024-01-01T00:00:00Z') });
  assert.equal(firstBatch.length, 17);
  assert.equal(countRows(store, 'submissions'), 17);

  const second = loadPull('submissions-pull-2.csv');
  assert.equal(second.length, 58);
  const secondBatch = syncRecords(store, 'submissions', second, { now: () => new Date('2024-02-01T00:00:00Z') });
  assert.equal(secondBatch.length, 49);
  assert.equal(countRows(store, 'submissions'), 59);

  const third = loadPull('submissions-pull-3.csv');
  assert.equal(third.length, 98);
  const thirdBatch = syncRecords(store, 'submissions', third, { now: () => new Date('2024-03-01T00:00:00Z') });
  assert.equal(thirdBatch.length, 83);
  assert.equal(countRows(store, 'submissions'), 99);

  assert.equal(mapSubmissions(thirdBatch).length, 83);
  const carried = thirdBatch.find((row) => row.id === 'S1001');
  assert.equal(carried?.CreateDate, '2024-01-01 00:00:00');
  assert.equal(carried?.LastModifiedDate, '2024-03-01 00:00:00');
});

test('a grade change between pulls leaves one row with the latest grade', (t) => {
  const store = createStore(t);
  const submission = (assignedGrade: string): RawRecord => ({
    courseId: '9001',
    courseWorkId: '500',
    id: 'S4001',
    userId: 'u001',
    creationTime: '2024-04-01T09:00:00.000Z',
    updateTime: '2024-04-02T09:00:00.000Z',
    state: 'RETURNED',
    late: 'false',
    assignedGrade,
  });

  syncRecords(store, 'submissions', [submission('0')], { now: () => new Date('2024-04-02T10:00:00Z') });
  const [latest] = syncRecords(store, 'submissions', [submission('100')], {
    now: () => new Date('2024-04-03T10:00:00Z'),
  });

  assert.equal(countRows(store, 'submissions'), 1);
  assert.deepEqual(
    readRecords(store, 'submissions').map((row) => row.assignedGrade),
    ['100'],
  );
  const [mapped] = mapSubmissions([latest]);
  assert.equal(mapped.EarnedPoints, 100);
  assert.equal(mapped.Grade, '100');
});
