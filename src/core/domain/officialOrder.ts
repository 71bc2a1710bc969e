/**
 * File: src/core/domain/officialOrder.ts
 * Summary: Replays a penalty ledger over raw lap data to produce the official finishing order.
 */

import type { Competitor } from './competitor';
import { summariseLaps, type LapRecord, type LapStanding } from './lap';
import type { PenaltyEvent } from './penalty';
import {
  compareByLapsThenBestLap,
  rankStandings,
  type CompetitorStanding,
  type StandingComparator,
} from './ranking';
import type { RankingMode } from './session';

export type OfficialEntryStatus = 'classified' | 'not_started' | 'disqualified';

export type OfficialEntry = {
  competitorId: string;
  carNumber: string;
  displayName: string;
  position: number;
  status: OfficialEntryStatus;
  pointsEligible: boolean;
  totalLaps: number;
  bestLapMs: number | null;
  totalTimeMs: number | null;
  /** Ledger entries that touched this competitor, in ledger order. */
  penaltyIds: string[];
};

export type FeedPositionReport = {
  competitorId: string;
  position: number;
  sequence: number;
};

export type OfficialDerivationInput = {
  competitors: ReadonlyArray<Competitor>;
  laps: ReadonlyArray<LapRecord>;
  feedPositions: ReadonlyMap<string, number>;
  rankingMode: RankingMode;
  penalties: ReadonlyArray<PenaltyEvent>;
  comparator?: StandingComparator;
};

type PenaltyEffects = {
  excludedLaps: Set<number>;
  timeDeltaMs: number;
  disqualifiedAt: number | null;
  positionOffset: number;
  firstPositionAdjustAt: number | null;
  penaltyIds: string[];
};

const createEffects = (): PenaltyEffects => ({
  excludedLaps: new Set<number>(),
  timeDeltaMs: 0,
  disqualifiedAt: null,
  positionOffset: 0,
  firstPositionAdjustAt: null,
  penaltyIds: [],
});

const collectPenaltyEffects = (
  penalties: ReadonlyArray<PenaltyEvent>,
): Map<string, PenaltyEffects> => {
  const effects = new Map<string, PenaltyEffects>();
  const ordered = [...penalties].sort((left, right) => left.sequence - right.sequence);

  for (const entry of ordered) {
    const current = effects.get(entry.competitorId) ?? createEffects();
    effects.set(entry.competitorId, current);
    current.penaltyIds.push(entry.id);

    const { penalty } = entry;
    switch (penalty.kind) {
      case 'disqualify':
        current.disqualifiedAt ??= entry.sequence;
        break;
      case 'position_adjust':
        current.positionOffset += penalty.offset;
        current.firstPositionAdjustAt ??= entry.sequence;
        break;
      case 'time_adjust':
        current.timeDeltaMs += penalty.deltaMs;
        break;
      case 'invalidate_lap':
        current.excludedLaps.add(penalty.lapNumber);
        break;
      default: {
        const exhaustive: never = penalty;
        throw new Error(`Unhandled penalty ${JSON.stringify(exhaustive)}`);
      }
    }
  }

  return effects;
};

const shiftTimes = (standing: LapStanding, deltaMs: number): LapStanding => {
  if (deltaMs === 0) {
    return standing;
  }

  const shift = (value: number | null) => (value === null ? null : value + deltaMs);

  return {
    ...standing,
    bestLapMs: shift(standing.bestLapMs),
    totalTimeMs: shift(standing.totalTimeMs),
    reachedAtMs: shift(standing.reachedAtMs),
  };
};

const groupLapsByCompetitor = (laps: ReadonlyArray<LapRecord>) => {
  const grouped = new Map<string, LapRecord[]>();
  for (const lap of laps) {
    const bucket = grouped.get(lap.competitorId);
    if (bucket) {
      bucket.push(lap);
    } else {
      grouped.set(lap.competitorId, [lap]);
    }
  }
  return grouped;
};

const applyPositionOffsets = (
  classified: CompetitorStanding[],
  effects: ReadonlyMap<string, PenaltyEffects>,
): CompetitorStanding[] => {
  const order = [...classified];
  const adjustments = [...effects.entries()]
    .filter(([, effect]) => effect.firstPositionAdjustAt !== null && effect.positionOffset !== 0)
    .sort(([, left], [, right]) => (left.firstPositionAdjustAt ?? 0) - (right.firstPositionAdjustAt ?? 0));

  for (const [competitorId, effect] of adjustments) {
    const index = order.findIndex((standing) => standing.competitor.id === competitorId);
    if (index === -1) {
      continue;
    }

    const [moved] = order.splice(index, 1);
    const target = Math.min(Math.max(index + effect.positionOffset, 0), order.length);
    order.splice(target, 0, moved);
  }

  return order;
};

/**
 * Deterministic: the same competitors, laps, feed positions and ledger always
 * give the same entries.
 */
export const deriveOfficialEntries = (input: OfficialDerivationInput): OfficialEntry[] => {
  const effects = collectPenaltyEffects(input.penalties);
  const lapsByCompetitor = groupLapsByCompetitor(input.laps);

  const standings: CompetitorStanding[] = input.competitors.map((competitor) => {
    const effect = effects.get(competitor.id);
    const laps = summariseLaps(lapsByCompetitor.get(competitor.id) ?? [], effect?.excludedLaps);

    return {
      competitor,
      laps: shiftTimes(laps, effect?.timeDeltaMs ?? 0),
      feedPosition: input.feedPositions.get(competitor.id) ?? null,
    };
  });

  const ranked = rankStandings(
    standings,
    input.rankingMode,
    input.comparator ?? compareByLapsThenBestLap,
  );

  const isDisqualified = (standing: CompetitorStanding) =>
    (effects.get(standing.competitor.id)?.disqualifiedAt ?? null) !== null;

  const disqualified = ranked
    .filter(isDisqualified)
    .sort(
      (left, right) =>
        (effects.get(left.competitor.id)?.disqualifiedAt ?? 0) -
        (effects.get(right.competitor.id)?.disqualifiedAt ?? 0),
    );
  const remaining = ranked.filter((standing) => !isDisqualified(standing));
  const started = remaining.filter((standing) => standing.laps.totalLaps > 0);
  const notStarted = remaining.filter((standing) => standing.laps.totalLaps === 0);

  const classified = applyPositionOffsets(started, effects);

  const withStatus = (status: OfficialEntryStatus) => (standing: CompetitorStanding) => ({
    standing,
    status,
  });

  const finishingOrder = [
    ...classified.map(withStatus('classified')),
    ...notStarted.map(withStatus('not_started')),
    ...disqualified.map(withStatus('disqualified')),
  ];

  return finishingOrder.map(({ standing, status }, index) => ({
    competitorId: standing.competitor.id,
    carNumber: standing.competitor.carNumber,
    displayName: standing.competitor.displayName,
    position: index + 1,
    status,
    pointsEligible: status === 'classified',
    totalLaps: standing.laps.totalLaps,
    bestLapMs: standing.laps.bestLapMs,
    totalTimeMs: standing.laps.totalTimeMs,
    penaltyIds: [...(effects.get(standing.competitor.id)?.penaltyIds ?? [])],
  }));
};

/** Latest feed-reported position per competitor, up to and including `upToSequence`. */
export const collectFeedPositions = (
  reports: ReadonlyArray<FeedPositionReport>,
  upToSequence: number = Number.POSITIVE_INFINITY,
): Map<string, number> => {
  const positions = new Map<string, number>();
  for (const report of reports) {
    if (report.sequence <= upToSequence) {
      positions.set(report.competitorId, report.position);
    }
  }
  return positions;
};
