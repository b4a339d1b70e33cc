import test from 'node:test';
import assert from 'node:assert/strict';
import { LogLevel, formatLogLine, parseLogLevel } from '../utils/logger.js';

const NOW = new Date('2026-03-04T05:06:07.089Z');

test('formatLogLine prefixes timestamp and level', () => {
  assert.equal(formatLogLine('INFO', 'File reloaded', undefined, NOW), '[2026-03-04T05:06:07.089Z] [INFO] File reloaded');
});

test('formatLogLine appends metadata as JSON', () => {
  assert.equal(
    formatLogLine('WARN', 'Cannot watch file, retrying', { path: '/srv/a.txt', retryInMs: 1000 }, NOW),
    '[2026-03-04T05:06:07.089Z] [WARN] Cannot watch file, retrying {"path":"/srv/a.txt","retryInMs":1000}'
  );
});

test('formatLogLine omits empty metadata', () => {
  assert.equal(formatLogLine('DEBUG', 'Watch closed', {}, NOW), '[2026-03-04T05:06:07.089Z] [DEBUG] Watch closed');
});

test('parseLogLevel accepts names case-insensitively', () => {
  assert.equal(parseLogLevel('debug', LogLevel.INFO), LogLevel.DEBUG);
  assert.equal(parseLogLevel('WARN', LogLevel.INFO), LogLevel.WARN);
  assert.equal(parseLogLevel('Silent', LogLevel.INFO), LogLevel.SILENT);
});

test('parseLogLevel falls back on unknown or missing values', () => {
  assert.equal(parseLogLevel('verbose', LogLevel.ERROR), LogLevel.ERROR);
  assert.equal(parseLogLevel(undefined, LogLevel.INFO), LogLevel.INFO);
});
