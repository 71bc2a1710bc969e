import { ResultsEngineError } from './resultsEngineError';

export class UnknownSessionError extends ResultsEngineError {
  readonly code = 'UNKNOWN_SESSION' as const;

  constructor(sessionId: string) {
    super(`Session ${sessionId} is not known to the engine.`, sessionId);
    this.name = 'UnknownSessionError';
  }
}
