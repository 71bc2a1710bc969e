export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LoggerContext = {
  /** Machine friendly event name for querying (e.g. `results.official.published`). */
  event?: string;
  /** Timing session the entry pertains to. */
  sessionId?: string;
  /** Competitor (feed registration number) the entry pertains to. */
  competitorId?: string;
  /** Duration of the operation in milliseconds when applicable. */
  durationMs?: number;
  /** Outcome keyword such as `success`, `failure`, `rejected` or `skipped`. */
  outcome?: string;
  /** Optional error instance or metadata to serialise. */
  error?: unknown;
  /** Additional structured properties to enrich the log entry. */
  [key: string]: unknown;
};

export interface Logger {
  debug(message: string, context?: LoggerContext): void;
  info(message: string, context?: LoggerContext): void;
  warn(message: string, context?: LoggerContext): void;
  error(message: string, context?: LoggerContext): void;
  withContext(context: LoggerContext): Logger;
}
