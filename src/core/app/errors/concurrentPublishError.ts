import { ResultsEngineError } from './resultsEngineError';

/** Another publish for the same session is in flight; retry once it settles. */
export class ConcurrentPublishError extends ResultsEngineError {
  readonly code = 'CONCURRENT_PUBLISH' as const;

  constructor(sessionId: string) {
    super(`An official publish for session ${sessionId} is already in progress.`, sessionId);
    this.name = 'ConcurrentPublishError';
  }
}
