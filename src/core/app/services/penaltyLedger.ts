/**
 * File: src/core/app/services/penaltyLedger.ts
 * Summary: Validates and stages steward penalties in the append-only session ledger.
 */

import { randomUUID } from 'node:crypto';

import { z } from 'zod';

import type { Penalty, PenaltyEvent } from '@core/domain';

import { InvalidPenaltyParamsError } from '../errors/invalidPenaltyParamsError';
import type { Logger } from '../ports/logger';
import type { SessionRegistry } from './sessionRegistry';

export type SubmitPenaltyInput = {
  sessionId: string;
  competitorId: string;
  kind: string;
  params?: Record<string, unknown>;
  author: string;
  reason?: string | null;
};

const nonZeroInteger = (field: string) =>
  z
    .number({ required_error: `${field} is required.`, invalid_type_error: `${field} must be a number.` })
    .int(`${field} must be an integer.`)
    .refine((value) => value !== 0, `${field} must not be zero.`);

const penaltySchema = z.discriminatedUnion(
  'kind',
  [
    z.object({ kind: z.literal('disqualify'), params: z.object({}).strict().default({}) }),
    z.object({
      kind: z.literal('position_adjust'),
      params: z.object({ offset: nonZeroInteger('offset') }).strict(),
    }),
    z.object({
      kind: z.literal('time_adjust'),
      params: z.object({ deltaMs: nonZeroInteger('deltaMs') }).strict(),
    }),
    z.object({
      kind: z.literal('invalidate_lap'),
      params: z
        .object({
          lapNumber: z
            .number({ required_error: 'lapNumber is required.' })
            .int('lapNumber must be an integer.')
            .positive('lapNumber must be positive.'),
        })
        .strict(),
    }),
  ],
  { errorMap: () => ({ message: 'Unknown penalty kind.' }) },
);

const submissionSchema = z
  .object({
    sessionId: z.string().trim().min(1, 'sessionId is required.'),
    competitorId: z.string().trim().min(1, 'competitorId is required.'),
    author: z.string().trim().min(1, 'author is required.'),
    reason: z.string().trim().max(500).nullish(),
  })
  .and(penaltySchema);

type ParsedSubmission = z.infer<typeof submissionSchema>;

const toPenalty = (submission: ParsedSubmission): Penalty => {
  switch (submission.kind) {
    case 'disqualify':
      return { kind: 'disqualify' };
    case 'position_adjust':
      return { kind: 'position_adjust', offset: submission.params.offset };
    case 'time_adjust':
      return { kind: 'time_adjust', deltaMs: submission.params.deltaMs };
    case 'invalidate_lap':
      return { kind: 'invalidate_lap', lapNumber: submission.params.lapNumber };
    default: {
      const exhaustive: never = submission;
      throw new Error(`Unhandled penalty submission ${JSON.stringify(exhaustive)}`);
    }
  }
};

const formatIssues = (issues: z.ZodIssue[]) =>
  issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));

type PenaltyLedgerDependencies = {
  registry: SessionRegistry;
  logger?: Logger;
  clock?: () => Date;
  generateId?: () => string;
};

export class PenaltyLedger {
  private readonly registry: SessionRegistry;

  private readonly logger?: Logger;

  private readonly clock: () => Date;

  private readonly generateId: () => string;

  constructor(dependencies: PenaltyLedgerDependencies) {
    this.registry = dependencies.registry;
    this.logger = dependencies.logger;
    this.clock = dependencies.clock ?? (() => new Date());
    this.generateId = dependencies.generateId ?? randomUUID;
  }

  /** Stages a penalty. Nothing official changes until the next publish. */
  submitPenalty(input: SubmitPenaltyInput): PenaltyEvent {
    const parsed = submissionSchema.safeParse(input);

    if (!parsed.success) {
      throw new InvalidPenaltyParamsError(String(input.sessionId), formatIssues(parsed.error.issues));
    }

    const submission = parsed.data;
    const record = this.registry.require(submission.sessionId);
    record.requireCompetitor(submission.competitorId);

    const penalty = toPenalty(submission);

    if (
      penalty.kind === 'invalidate_lap' &&
      !record
        .lapsFor(submission.competitorId)
        .some((lap) => lap.lapNumber === penalty.lapNumber)
    ) {
      throw new InvalidPenaltyParamsError(record.id, [
        {
          path: 'params.lapNumber',
          message: `Competitor ${submission.competitorId} has no lap ${penalty.lapNumber}.`,
        },
      ]);
    }

    const entry = record.appendPenalty({
      id: this.generateId(),
      sessionId: record.id,
      competitorId: submission.competitorId,
      penalty,
      reason: submission.reason ?? null,
      author: submission.author,
      submittedAt: this.clock(),
    });

    this.logger?.info?.('Penalty staged.', {
      event: 'results.penalty.submitted',
      outcome: 'success',
      sessionId: record.id,
      competitorId: entry.competitorId,
      penaltyId: entry.id,
      penaltyKind: penalty.kind,
      ledgerSequence: entry.sequence,
      author: entry.author,
    });

    return entry;
  }

  listPenalties(sessionId: string): PenaltyEvent[] {
    return [...this.registry.require(sessionId).penalties];
  }
}
