import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import test, { type TestContext } from 'node:test';

import { captureLogs, messages } from '../../../shared/tests/log_capture.js';
import {
  closeRunContext,
  createRunContext,
  groupBy,
  runEntity,
  syncResource,
  writeResource,
  type RunContext,
} from '../run_context.js';
import { StorageUnavailableError, countRows } from '../sync_store.js';

function createContext(t: TestContext) {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lms-run-'));
  const captured = captureLogs();
  const ctx: RunContext<{ name: string }> = createRunContext({
    connector: 'test-lms',
    client: { name: 'stub' },
    logger: captured.logger,
    tracker: captured.tracker,
    outputDirectory: path.join(dir, 'output'),
    syncDatabaseDirectory: path.join(dir, 'data'),
    now: () => new Date('2024-02-01T12:00:00Z'),
  });
  t.after(() => {
    closeRunContext(ctx);
    fs.rmSync(dir, { recursive: true, force: true });
  });
  return { ctx, dir, ...captured };
}

test('the sync store is opened per connector under the sync directory', (t) => {
  const { ctx, dir } = createContext(t);
  assert.equal(ctx.store.file, path.join(dir, 'data', 'test-lms-sync.sqlite'));
  assert.ok(fs.existsSync(ctx.store.file));
});

test('a successful entity logs its row count', async (t) => {
  const { ctx, lines } = createContext(t);
  assert.equal(await runEntity(ctx, 'sections', async () => 3), true);
  const entry = lines.find((line) => line.msg === 'entity extracted');
  assert.equal(entry?.entity, 'sections');
  assert.equal(entry?.rows, 3);
});

test('a failing entity is logged, fires the tracker and lets the run continue', async (t) => {
  const { ctx, lines, tracker } = createContext(t);
  const ok = await runEntity(ctx, 'users', async () => {
    throw new Error('unexpected payload');
  });
  assert.equal(ok, false);
  assert.deepEqual(messages(lines, 'error'), ['failed to extract users']);
  assert.equal(tracker.exitCode(), 1);
  assert.equal(await runEntity(ctx, 'sections', async () => 0), true);
});

test('storage failures abort the run', async (t) => {
  const { ctx } = createContext(t);
  await assert.rejects(
    runEntity(ctx, 'users', async () => {
      throw new StorageUnavailableError('disk gone', 'users');
    }),
    StorageUnavailableError,
  );
});

test('syncResource and writeResource use the run clock', (t) => {
  const { ctx, dir } = createContext(t);
  const [synced] = syncResource(ctx, 'rosters', [{ userId: 'u1', name: 'Ada' }], 'userId');
  assert.equal(synced.CreateDate, '2024-02-01 12:00:00');
  assert.equal(countRows(ctx.store, 'rosters'), 1);

  const file = writeResource(ctx, 'grades', [], { sectionId: 's1' });
  assert.equal(file, path.join(dir, 'output', 'section=s1', 'grades', '2024-02-01-12-00-00.csv'));
});

test('closeRunContext reports the exit code', (t) => {
  const { ctx, logger, lines } = createContext(t);
  logger.warn('only a warning');
  assert.equal(closeRunContext(ctx), 0);
  assert.equal(ctx.store.db.open, false);
  const summary = lines.find((line) => line.msg === 'run finished');
  assert.equal(summary?.warnings, 1);
});

test('groupBy keeps first-seen key order', () => {
  const groups = groupBy(['b1', 'a1', 'b2'], (value) => value[0]);
  assert.deepEqual([...groups.entries()], [
    ['b', ['b1', 'b2']],
    ['a', ['a1']],
  ]);
});
