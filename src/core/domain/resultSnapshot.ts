import type { OfficialEntry } from './officialOrder';
import type { PointsTable } from './points';

export type ResultSnapshot = {
  sessionId: string;
  basis: 'official';
  /** 1, 2, 3… per session, without gaps. */
  version: number;
  entries: ReadonlyArray<Readonly<OfficialEntry>>;
  /** Number of ledger entries applied. */
  ledgerSize: number;
  /** Highest lap/position journal sequence the entries were derived from. */
  journalSequence: number;
  createdAt: Date;
};

/** The unit handed to publication collaborators; keyed by `(sessionId, version)`. */
export type PublishedResult = {
  sessionId: string;
  version: number;
  snapshot: ResultSnapshot;
  points: PointsTable;
};

export const createResultSnapshot = (input: Omit<ResultSnapshot, 'basis'>): ResultSnapshot =>
  Object.freeze({
    sessionId: input.sessionId,
    basis: 'official' as const,
    version: input.version,
    entries: Object.freeze(
      input.entries.map((entry) =>
        Object.freeze({ ...entry, penaltyIds: [...entry.penaltyIds] }),
      ),
    ),
    ledgerSize: input.ledgerSize,
    journalSequence: input.journalSequence,
    createdAt: input.createdAt,
  });
