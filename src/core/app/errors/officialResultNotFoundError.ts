import { ResultsEngineError } from './resultsEngineError';

export class OfficialResultNotFoundError extends ResultsEngineError {
  readonly code = 'OFFICIAL_RESULT_NOT_FOUND' as const;

  constructor(
    sessionId: string,
    readonly version: number | null,
  ) {
    super(
      version === null
        ? `Session ${sessionId} has no official result yet.`
        : `Session ${sessionId} has no official result version ${version}.`,
      sessionId,
    );
    this.name = 'OfficialResultNotFoundError';
  }
}
