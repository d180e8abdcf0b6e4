import assert from 'node:assert/strict';
import test from 'node:test';

import { z } from 'zod';

import { CLIError, parseConfig, parseFlags, parseList, requireValue } from '../cli.js';

const FLAGS = { 'output-directory': 'OUTPUT_DIRECTORY', 'log-level': 'LOG_LEVEL' } as const;

test('parseFlags maps each flag to the variable it overrides', () => {
  const parsed = parseFlags(['--output-directory', '/tmp/out', '--log-level', 'debug'], FLAGS);
  assert.deepEqual(parsed, { values: { OUTPUT_DIRECTORY: '/tmp/out', LOG_LEVEL: 'debug' }, showHelp: false });
});

test('parseFlags recognises --help', () => {
  assert.equal(parseFlags(['--help'], FLAGS).showHelp, true);
});

test('parseFlags rejects unknown flags, stray values and missing values', () => {
  assert.throws(() => parseFlags(['--nope', 'x'], FLAGS), { name: 'Error', message: 'Unknown flag: --nope' });
  assert.throws(() => parseFlags(['positional'], FLAGS), CLIError);
  assert.throws(() => parseFlags(['--log-level'], FLAGS), { message: 'Missing value for --log-level' });
  assert.throws(() => parseFlags(['--output-directory', '--log-level', 'info'], FLAGS), {
    message: 'Missing value for --output-directory',
  });
});

test('requireValue returns the value after a flag', () => {
  assert.equal(requireValue(['--base-url', 'https://lms.test'], 1, '--base-url'), 'https://lms.test');
});

test('parseList trims and drops empty items', () => {
  assert.deepEqual(parseList(' a, b ,,c '), ['a', 'b', 'c']);
});

test('parseConfig turns validation failures into a CLIError naming each field', () => {
  const schema = z.object({ PORT: z.coerce.number().int(), NAME: z.string().min(1) });
  assert.deepEqual(parseConfig(schema, { PORT: '5432', NAME: 'lms' }), { PORT: 5432, NAME: 'lms' });

  assert.throws(
    () => parseConfig(schema, { PORT: 'abc' }),
    (error: unknown) =>
      error instanceof CLIError &&
      error.message.startsWith('Invalid configuration (') &&
      error.message.includes('PORT:') &&
      error.message.includes('NAME:'),
  );
});
