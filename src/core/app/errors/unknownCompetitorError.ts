import { ResultsEngineError } from './resultsEngineError';

export class UnknownCompetitorError extends ResultsEngineError {
  readonly code = 'UNKNOWN_COMPETITOR' as const;

  constructor(
    sessionId: string,
    readonly competitorId: string,
  ) {
    super(`Competitor ${competitorId} is not registered in session ${sessionId}.`, sessionId);
    this.name = 'UnknownCompetitorError';
  }
}
