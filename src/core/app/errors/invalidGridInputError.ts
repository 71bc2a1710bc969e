import type { GridInputIssue } from '@core/domain';

import { ResultsEngineError } from './resultsEngineError';

export class InvalidGridInputError extends ResultsEngineError {
  readonly code = 'INVALID_GRID_INPUT' as const;

  constructor(readonly issues: GridInputIssue[]) {
    super(
      `Prefinal grid input rejected: ${issues.map((issue) => issue.message).join('; ')}`,
      issues.find((issue) => issue.sessionId !== null)?.sessionId ?? '',
    );
    this.name = 'InvalidGridInputError';
  }
}
