/**
 * Filename: tests/server/config/environment.test.ts
 * Purpose: Ensure environment configuration parsing and validation behave as expected.
 */

import assert from 'node:assert/strict';
import test from 'node:test';

import {
  __resetEnvironmentCacheForTests,
  EnvironmentValidationError,
  getEnvironment,
  parseEnvironment,
  type EnvIssue,
} from '../../../src/server/config/environment';

const issuesFor = (env: Record<string, string | undefined>): EnvIssue[] => {
  try {
    parseEnvironment(env, '/srv/engine');
  } catch (error) {
    assert.ok(error instanceof EnvironmentValidationError);
    return error.issues;
  }

  assert.fail('Expected the environment to be rejected.');
};

test('parseEnvironment applies defaults and resolves paths against the working directory', () => {
  const config = parseEnvironment({}, '/srv/engine');

  assert.deepEqual(config, {
    logging: {
      level: 'info',
      directory: '/srv/engine/logs',
      fileNamePrefix: 'app',
      disableFileLogs: false,
      disableConsoleLogs: false,
    },
    feed: {
      host: '127.0.0.1',
      port: 50000,
      connectTimeoutMs: 5000,
      idleTimeoutMs: 5000,
      autoReconnect: true,
      maxPacketBytes: 4096,
    },
    results: {
      rankingMode: 'auto',
      pointsSchemeId: 'national-heat',
      qualifyingPointsSchemeId: 'national-qualifying',
      otherPointsSchemeId: null,
      pointsScalesPath: '/srv/engine/config/points-scales.json',
      minValidLapMs: 0,
      publishDirectory: '/srv/engine/published',
    },
  });
});

test('parseEnvironment canonicalises provided values', () => {
  const config = parseEnvironment(
    {
      LOG_LEVEL: ' DEBUG ',
      LOG_DIR: '/var/log/timing',
      LOG_FILE_PREFIX: ' engine ',
      DISABLE_FILE_LOGS: 'TRUE',
      DISABLE_CONSOLE_LOGS: 'true',
      FEED_HOST: 'timing.local',
      FEED_PORT: ' 50010 ',
      FEED_AUTO_RECONNECT: 'false',
      RANKING_MODE: 'feed-reported',
      POINTS_SCHEME: 'club-sprint',
      POINTS_SCHEME_QUALIFYING: 'podium-only',
      POINTS_SCHEME_OTHER: ' club-sprint ',
      MIN_VALID_LAP_MS: '25000',
      PUBLISH_DIR: '',
    },
    '/srv/engine',
  );

  assert.equal(config.logging.level, 'debug');
  assert.equal(config.logging.directory, '/var/log/timing');
  assert.equal(config.logging.fileNamePrefix, 'engine');
  assert.equal(config.logging.disableFileLogs, true);
  assert.equal(config.logging.disableConsoleLogs, true);
  assert.equal(config.feed.host, 'timing.local');
  assert.equal(config.feed.port, 50010);
  assert.equal(config.feed.autoReconnect, false);
  assert.equal(config.results.rankingMode, 'feed-reported');
  assert.equal(config.results.pointsSchemeId, 'club-sprint');
  assert.equal(config.results.qualifyingPointsSchemeId, 'podium-only');
  assert.equal(config.results.otherPointsSchemeId, 'club-sprint');
  assert.equal(config.results.minValidLapMs, 25000);
  assert.equal(config.results.publishDirectory, '/srv/engine/published');
});

test('parseEnvironment reports one issue per invalid key', () => {
  assert.deepEqual(
    issuesFor({
      FEED_PORT: '70000',
      FEED_IDLE_TIMEOUT_MS: 'soon',
      FEED_MAX_PACKET_BYTES: '12',
      MIN_VALID_LAP_MS: '1.5',
      FEED_AUTO_RECONNECT: 'yes',
      LOG_LEVEL: 'verbose',
      RANKING_MODE: 'fastest',
      DISABLE_CONSOLE_LOGS: 'maybe',
      LOG_FILE_PREFIX: '../app',
    }),
    [
      { key: 'LOG_LEVEL', message: 'LOG_LEVEL must be one of debug, info, warn or error.' },
      {
        key: 'LOG_FILE_PREFIX',
        message: 'LOG_FILE_PREFIX may only contain letters, digits, dots, dashes and underscores.',
      },
      { key: 'DISABLE_CONSOLE_LOGS', message: 'DISABLE_CONSOLE_LOGS must be set to "true" or "false".' },
      { key: 'FEED_PORT', message: 'FEED_PORT must be at most 65535.' },
      { key: 'FEED_IDLE_TIMEOUT_MS', message: 'FEED_IDLE_TIMEOUT_MS must be a number.' },
      { key: 'FEED_AUTO_RECONNECT', message: 'FEED_AUTO_RECONNECT must be set to "true" or "false".' },
      { key: 'FEED_MAX_PACKET_BYTES', message: 'FEED_MAX_PACKET_BYTES must be at least 64.' },
      {
        key: 'RANKING_MODE',
        message: 'RANKING_MODE must be one of auto, time-derived or feed-reported.',
      },
      { key: 'MIN_VALID_LAP_MS', message: 'MIN_VALID_LAP_MS must be an integer.' },
    ],
  );
});

test('getEnvironment caches until reset', () => {
  const previous = process.env.FEED_PORT;

  try {
    process.env.FEED_PORT = '6001';
    __resetEnvironmentCacheForTests();
    assert.equal(getEnvironment().feed.port, 6001);

    process.env.FEED_PORT = '6002';
    assert.equal(getEnvironment().feed.port, 6001);

    __resetEnvironmentCacheForTests();
    assert.equal(getEnvironment().feed.port, 6002);
  } finally {
    if (previous === undefined) {
      delete process.env.FEED_PORT;
    } else {
      process.env.FEED_PORT = previous;
    }
    __resetEnvironmentCacheForTests();
  }
});
