/**
 * Filename: src/server/config/environment.ts
 * Purpose: Parse and validate process environment variables into strongly typed engine configuration.
 */

import { isAbsolute, join } from 'node:path';

import { z } from 'zod';

import type { LogLevel, RankingModePreference } from '@core/app';

export type EnvIssue = {
  key: string;
  message: string;
};

export type EngineEnvironment = {
  logging: {
    level: LogLevel;
    directory: string;
    fileNamePrefix: string;
    disableFileLogs: boolean;
    disableConsoleLogs: boolean;
  };
  feed: {
    host: string;
    port: number;
    connectTimeoutMs: number;
    idleTimeoutMs: number;
    autoReconnect: boolean;
    maxPacketBytes: number;
  };
  results: {
    rankingMode: RankingModePreference;
    /** Heat scale, also the default for prefinal grids. */
    pointsSchemeId: string;
    qualifyingPointsSchemeId: string;
    /** Scale for practice, prefinal and final sessions; `null` awards nothing. */
    otherPointsSchemeId: string | null;
    pointsScalesPath: string;
    minValidLapMs: number;
    publishDirectory: string;
  };
};

export class EnvironmentValidationError extends Error {
  constructor(public readonly issues: EnvIssue[]) {
    super('Environment configuration is invalid.');
    this.name = 'EnvironmentValidationError';
  }
}

const blankToUndefined = (value: unknown) => {
  if (typeof value !== 'string') {
    return value;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const withMessage = (message: string) => ({ errorMap: () => ({ message }) });

const booleanFlag = (key: string, defaultValue: boolean) =>
  z.preprocess(
    (value) => {
      const trimmed = blankToUndefined(value);
      return typeof trimmed === 'string' ? trimmed.toLowerCase() : trimmed;
    },
    z
      .enum(['true', 'false'], withMessage(`${key} must be set to "true" or "false".`))
      .default(defaultValue ? 'true' : 'false')
      .transform((flag) => flag === 'true'),
  );

const integer = (key: string, defaultValue: number, bounds: { min: number; max?: number }) =>
  z.preprocess(
    blankToUndefined,
    z.coerce
      .number({ invalid_type_error: `${key} must be a number.` })
      .int(`${key} must be an integer.`)
      .min(bounds.min, `${key} must be at least ${bounds.min}.`)
      .max(bounds.max ?? Number.MAX_SAFE_INTEGER, `${key} must be at most ${bounds.max}.`)
      .default(defaultValue),
  );

const text = (defaultValue: string) => z.preprocess(blankToUndefined, z.string().default(defaultValue));

const environmentSchema = z.object({
  LOG_LEVEL: z.preprocess(
    (value) => {
      const trimmed = blankToUndefined(value);
      return typeof trimmed === 'string' ? trimmed.toLowerCase() : trimmed;
    },
    z
      .enum(['debug', 'info', 'warn', 'error'], withMessage('LOG_LEVEL must be one of debug, info, warn or error.'))
      .default('info'),
  ),
  LOG_DIR: text('logs'),
  LOG_FILE_PREFIX: z.preprocess(
    blankToUndefined,
    z
      .string()
      .regex(/^[A-Za-z0-9_.-]+$/, 'LOG_FILE_PREFIX may only contain letters, digits, dots, dashes and underscores.')
      .default('app'),
  ),
  DISABLE_FILE_LOGS: booleanFlag('DISABLE_FILE_LOGS', false),
  DISABLE_CONSOLE_LOGS: booleanFlag('DISABLE_CONSOLE_LOGS', false),
  FEED_HOST: text('127.0.0.1'),
  FEED_PORT: integer('FEED_PORT', 50000, { min: 1, max: 65535 }),
  FEED_CONNECT_TIMEOUT_MS: integer('FEED_CONNECT_TIMEOUT_MS', 5000, { min: 100 }),
  FEED_IDLE_TIMEOUT_MS: integer('FEED_IDLE_TIMEOUT_MS', 5000, { min: 100 }),
  FEED_AUTO_RECONNECT: booleanFlag('FEED_AUTO_RECONNECT', true),
  FEED_MAX_PACKET_BYTES: integer('FEED_MAX_PACKET_BYTES', 4096, { min: 64 }),
  RANKING_MODE: z.preprocess(
    blankToUndefined,
    z
      .enum(
        ['auto', 'time-derived', 'feed-reported'],
        withMessage('RANKING_MODE must be one of auto, time-derived or feed-reported.'),
      )
      .default('auto'),
  ),
  POINTS_SCHEME: text('national-heat'),
  POINTS_SCHEME_QUALIFYING: text('national-qualifying'),
  POINTS_SCHEME_OTHER: z.preprocess(blankToUndefined, z.string().optional()),
  POINTS_SCALES_PATH: text('config/points-scales.json'),
  MIN_VALID_LAP_MS: integer('MIN_VALID_LAP_MS', 0, { min: 0 }),
  PUBLISH_DIR: text('published'),
});

const dedupeIssues = (issues: EnvIssue[]): EnvIssue[] => {
  const seen = new Map<string, EnvIssue>();

  for (const issue of issues) {
    if (!seen.has(issue.key)) {
      seen.set(issue.key, issue);
    }
  }

  return Array.from(seen.values());
};

export const parseEnvironment = (
  env: Record<string, string | undefined>,
  cwd: string = process.cwd(),
): EngineEnvironment => {
  const parsed = environmentSchema.safeParse(env);

  if (!parsed.success) {
    throw new EnvironmentValidationError(
      dedupeIssues(
        parsed.error.issues.map((issue) => ({
          key: String(issue.path[0] ?? 'environment'),
          message: issue.message,
        })),
      ),
    );
  }

  const values = parsed.data;
  const resolvePath = (value: string) => (isAbsolute(value) ? value : join(cwd, value));

  return {
    logging: {
      level: values.LOG_LEVEL,
      directory: resolvePath(values.LOG_DIR),
      fileNamePrefix: values.LOG_FILE_PREFIX,
      disableFileLogs: values.DISABLE_FILE_LOGS,
      disableConsoleLogs: values.DISABLE_CONSOLE_LOGS,
    },
    feed: {
      host: values.FEED_HOST,
      port: values.FEED_PORT,
      connectTimeoutMs: values.FEED_CONNECT_TIMEOUT_MS,
      idleTimeoutMs: values.FEED_IDLE_TIMEOUT_MS,
      autoReconnect: values.FEED_AUTO_RECONNECT,
      maxPacketBytes: values.FEED_MAX_PACKET_BYTES,
    },
    results: {
      rankingMode: values.RANKING_MODE,
      pointsSchemeId: values.POINTS_SCHEME,
      qualifyingPointsSchemeId: values.POINTS_SCHEME_QUALIFYING,
      otherPointsSchemeId: values.POINTS_SCHEME_OTHER ?? null,
      pointsScalesPath: resolvePath(values.POINTS_SCALES_PATH),
      minValidLapMs: values.MIN_VALID_LAP_MS,
      publishDirectory: resolvePath(values.PUBLISH_DIR),
    },
  };
};

let cachedEnvironment: EngineEnvironment | null = null;

export const getEnvironment = (): EngineEnvironment => {
  if (!cachedEnvironment) {
    cachedEnvironment = parseEnvironment(process.env);
  }

  return cachedEnvironment;
};

export const __resetEnvironmentCacheForTests = () => {
  cachedEnvironment = null;
};
