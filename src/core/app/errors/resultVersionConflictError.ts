import { ResultsEngineError } from './resultsEngineError';

/** Raised by result repositories when an append would skip or reuse a version. */
export class ResultVersionConflictError extends ResultsEngineError {
  readonly code = 'RESULT_VERSION_CONFLICT' as const;

  constructor(
    sessionId: string,
    readonly expectedVersion: number,
    readonly receivedVersion: number,
  ) {
    super(
      `Session ${sessionId} expected official version ${expectedVersion} but received ${receivedVersion}.`,
      sessionId,
    );
    this.name = 'ResultVersionConflictError';
  }
}
