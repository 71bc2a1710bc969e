export type ResultsEngineErrorCode =
  | 'UNKNOWN_SESSION'
  | 'UNKNOWN_COMPETITOR'
  | 'NO_PROVISIONAL_DATA'
  | 'CONCURRENT_PUBLISH'
  | 'INVALID_PENALTY_PARAMS'
  | 'OFFICIAL_RESULT_NOT_FOUND'
  | 'INVALID_GRID_INPUT'
  | 'RESULT_VERSION_CONFLICT';

/**
 * Base class for errors the engine returns to the caller of a single
 * operation. None of them leave engine state partially updated.
 */
export abstract class ResultsEngineError extends Error {
  abstract readonly code: ResultsEngineErrorCode;

  readonly sessionId: string;

  protected constructor(message: string, sessionId: string) {
    super(message);
    this.sessionId = sessionId;
  }
}

export const isResultsEngineError = (value: unknown): value is ResultsEngineError =>
  value instanceof ResultsEngineError;
