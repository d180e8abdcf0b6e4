import assert from 'node:assert/strict';
import test from 'node:test';

import { ErrorTracker } from '../error_tracker.js';
import { captureLogs, messages } from './log_capture.js';

test('tracker starts clean and exits 0', () => {
  const tracker = new ErrorTracker();
  assert.equal(tracker.fired, false);
  assert.equal(tracker.exitCode(), 0);
  assert.deepEqual(tracker.snapshot(), { errors: 0, warnings: 0, lastError: undefined });
});

test('warnings are counted but do not fail the run', () => {
  const tracker = new ErrorTracker();
  tracker.record('warn');
  tracker.record('warn');
  assert.equal(tracker.fired, false);
  assert.equal(tracker.exitCode(), 0);
  assert.equal(tracker.snapshot().warnings, 2);
});

test('an error fires the tracker and keeps the last message', () => {
  const tracker = new ErrorTracker();
  tracker.record('error', 'first');
  tracker.record('error', 'second');
  assert.equal(tracker.fired, true);
  assert.equal(tracker.exitCode(), 1);
  assert.deepEqual(tracker.snapshot(), { errors: 2, warnings: 0, lastError: 'second' });
});

test('logger feeds error, fatal and warn entries into the tracker', () => {
  const { logger, tracker, lines } = captureLogs();
  logger.info('starting');
  logger.warn({ column: 'Title' }, 'value truncated');
  logger.error({ resource: 'users' }, 'failed to extract users');
  logger.fatal('run aborted');

  assert.deepEqual(tracker.snapshot(), { errors: 2, warnings: 1, lastError: 'run aborted' });
  assert.deepEqual(messages(lines), ['starting', 'value truncated', 'failed to extract users', 'run aborted']);
  assert.deepEqual(
    lines.map((line) => line.level),
    ['info', 'warn', 'error', 'fatal'],
  );
  assert.equal(lines[1].column, 'Title');
});

test('entries below the configured level are neither written nor counted', () => {
  const { logger, tracker, lines } = captureLogs('error');
  logger.warn('ignored');
  logger.info('ignored too');
  assert.equal(lines.length, 0);
  assert.equal(tracker.snapshot().warnings, 0);
});
