export type DisqualifyPenalty = {
  kind: 'disqualify';
};

export type PositionAdjustPenalty = {
  kind: 'position_adjust';
  /** Positive values lose places, negative values gain them. */
  offset: number;
};

export type TimeAdjustPenalty = {
  kind: 'time_adjust';
  deltaMs: number;
};

export type InvalidateLapPenalty = {
  kind: 'invalidate_lap';
  lapNumber: number;
};

export type Penalty =
  | DisqualifyPenalty
  | PositionAdjustPenalty
  | TimeAdjustPenalty
  | InvalidateLapPenalty;

export type PenaltyKind = Penalty['kind'];

export const PENALTY_KINDS = [
  'disqualify',
  'position_adjust',
  'time_adjust',
  'invalidate_lap',
] as const satisfies ReadonlyArray<PenaltyKind>;

/**
 * A staged steward decision. Ledger entries are never edited; a correction is
 * submitted as another entry.
 */
export type PenaltyEvent = {
  id: string;
  /** 1-based position in the session ledger. */
  sequence: number;
  sessionId: string;
  competitorId: string;
  penalty: Penalty;
  reason: string | null;
  author: string;
  submittedAt: Date;
};

const formatSigned = (value: number, unit: string) => `${value > 0 ? '+' : ''}${value}${unit}`;

export const describePenalty = (penalty: Penalty): string => {
  switch (penalty.kind) {
    case 'disqualify':
      return 'DQ';
    case 'position_adjust':
      return `${formatSigned(penalty.offset, '')} pos`;
    case 'time_adjust':
      return formatSigned(penalty.deltaMs / 1000, 's');
    case 'invalidate_lap':
      return `lap ${penalty.lapNumber} invalidated`;
    default: {
      const exhaustive: never = penalty;
      return exhaustive;
    }
  }
};
