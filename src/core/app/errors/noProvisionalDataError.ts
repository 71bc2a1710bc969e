import { ResultsEngineError } from './resultsEngineError';

export class NoProvisionalDataError extends ResultsEngineError {
  readonly code = 'NO_PROVISIONAL_DATA' as const;

  constructor(sessionId: string) {
    super(`Session ${sessionId} has no laps to publish.`, sessionId);
    this.name = 'NoProvisionalDataError';
  }
}
