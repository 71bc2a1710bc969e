import { ResultsEngineError } from './resultsEngineError';

export type PenaltyParamsIssue = {
  path: string;
  message: string;
};

export class InvalidPenaltyParamsError extends ResultsEngineError {
  readonly code = 'INVALID_PENALTY_PARAMS' as const;

  constructor(
    sessionId: string,
    readonly issues: PenaltyParamsIssue[],
  ) {
    super(
      `Penalty rejected: ${issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join('; ')}`,
      sessionId,
    );
    this.name = 'InvalidPenaltyParamsError';
  }
}
