import { access, mkdtemp, readFile, rm } from 'node:fs/promises';
import path from 'node:path';
import { tmpdir } from 'node:os';
import { setTimeout as delay } from 'node:timers/promises';
import { strict as assert } from 'node:assert';
import test from 'node:test';

import { createPinoLogger } from './pinoLogger';

type LogEntry = Record<string, unknown>;

const isLogEntry = (value: unknown): value is LogEntry =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const createTempDir = async () => mkdtemp(path.join(tmpdir(), 'pino-logger-test-'));

const waitForLogFile = async (filePath: string) => {
  for (let attempt = 0; attempt < 15; attempt += 1) {
    try {
      await access(filePath);
      return;
    } catch (error) {
      if (!(error instanceof Error) || !('code' in error) || error.code !== 'ENOENT') {
        throw error;
      }
    }

    await delay(100);
  }

  throw new Error(`Log file was not created: ${filePath}`);
};

const readLastLogEntry = async (filePath: string): Promise<LogEntry> => {
  await waitForLogFile(filePath);
  const contents = await readFile(filePath, 'utf8');
  const lines = contents
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  const lastLine = lines.at(-1);
  if (!lastLine) {
    throw new Error(`No log entries found for ${filePath}`);
  }

  const parsed: unknown = JSON.parse(lastLine);
  assert.ok(isLogEntry(parsed), 'Expected log line to be a JSON object');
  return parsed;
};

const expectString = (entry: LogEntry, key: string) => {
  const value = entry[key];
  assert.ok(typeof value === 'string', `Expected ${key} to be a string`);
  return value;
};

const expectTimestamp = (entry: LogEntry) => {
  const timestamp = expectString(entry, 'timestamp');
  assert.match(
    timestamp,
    /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\.\d{3} (UTC|[+-]\d{2}:\d{2})$/u,
    'Expected timestamp to be in human readable format.',
  );
  return timestamp;
};

const expectNumber = (entry: LogEntry, key: string) => {
  const value = entry[key];
  assert.ok(typeof value === 'number', `Expected ${key} to be a number`);
  return value;
};

const expectRecord = (entry: LogEntry, key: string) => {
  const value = entry[key];
  assert.ok(isLogEntry(value), `Expected ${key} to be an object`);
  return value;
};

void test('writes structured log entries to app log', async (t) => {
  const logDir = await createTempDir();
  void t.after(async () => {
    await rm(logDir, { recursive: true, force: true });
  });

  const logger = createPinoLogger({
    level: 'debug',
    logDirectory: logDir,
  });

  logger.info('Official result published.', {
    event: 'tests.logger.app_log',
    sessionId: '12',
    version: 3,
    outcome: 'success',
  });

  await delay(400);

  const entry = await readLastLogEntry(path.join(logDir, 'app.log'));
  assert.equal(expectString(entry, 'event'), 'tests.logger.app_log');
  assert.equal(expectString(entry, 'sessionId'), '12');
  assert.equal(expectNumber(entry, 'version'), 3);
  assert.equal(expectString(entry, 'outcome'), 'success');
  assert.equal(expectString(entry, 'msg'), 'Official result published.');
  expectTimestamp(entry);
});

void test('serialises error metadata for error log file', async (t) => {
  const logDir = await createTempDir();
  void t.after(async () => {
    await rm(logDir, { recursive: true, force: true });
  });

  const logger = createPinoLogger({ logDirectory: logDir });
  const error = new Error('boom');
  error.cause = new Error('root-cause');

  logger.error('Unexpected failure.', {
    event: 'tests.logger.error_log',
    sessionId: '7',
    outcome: 'failure',
    error,
  });

  await delay(400);

  const appEntry = await readLastLogEntry(path.join(logDir, 'app.log'));
  assert.equal(expectString(appEntry, 'event'), 'tests.logger.error_log');
  const errorRecord = expectRecord(appEntry, 'error');
  assert.equal(expectString(errorRecord, 'name'), 'Error');
  assert.equal(expectString(errorRecord, 'message'), 'boom');
  expectString(errorRecord, 'stack');
  const causeRecord = expectRecord(errorRecord, 'cause');
  assert.equal(expectString(causeRecord, 'name'), 'Error');

  const errorEntry = await readLastLogEntry(path.join(logDir, 'error.log'));
  assert.equal(expectString(errorEntry, 'event'), 'tests.logger.error_log');
  assert.equal(expectNumber(errorEntry, 'level'), 50); // Pino error level
  expectTimestamp(errorEntry);
});

void test('inherits context with withContext()', async (t) => {
  const logDir = await createTempDir();
  void t.after(async () => {
    await rm(logDir, { recursive: true, force: true });
  });

  const logger = createPinoLogger({ logDirectory: logDir });
  const sessionLogger = logger.withContext({
    sessionId: '42',
    feed: 'orbits-primary',
  });

  sessionLogger.info('Child logger entry.', {
    event: 'tests.logger.child',
    outcome: 'success',
    durationMs: 42,
  });

  await delay(400);

  const entry = await readLastLogEntry(path.join(logDir, 'app.log'));
  assert.equal(expectString(entry, 'sessionId'), '42');
  assert.equal(expectString(entry, 'feed'), 'orbits-primary');
  assert.equal(expectNumber(entry, 'durationMs'), 42);
  assert.equal(expectString(entry, 'event'), 'tests.logger.child');
  expectTimestamp(entry);
});

void test('writes to custom file name prefixes when provided', async (t) => {
  const logDir = await createTempDir();
  void t.after(async () => {
    await rm(logDir, { recursive: true, force: true });
  });

  const logger = createPinoLogger({
    logDirectory: logDir,
    fileNamePrefix: 'feed',
    disableConsoleLogs: true,
  });

  logger.info('Feed connected.', {
    event: 'tests.logger.custom_prefix',
    host: '127.0.0.1',
  });

  await delay(400);

  const entry = await readLastLogEntry(path.join(logDir, 'feed.log'));
  assert.equal(expectString(entry, 'event'), 'tests.logger.custom_prefix');
  assert.equal(expectString(entry, 'host'), '127.0.0.1');
  expectTimestamp(entry);

  logger.warn('Feed idle timeout.', {
    event: 'tests.logger.custom_prefix_warn',
    host: '127.0.0.1',
  });

  await delay(400);

  const warnEntry = await readLastLogEntry(path.join(logDir, 'feed-error.log'));
  assert.equal(expectString(warnEntry, 'event'), 'tests.logger.custom_prefix_warn');
  expectTimestamp(warnEntry);
});
