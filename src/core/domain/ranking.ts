import { compareCompetitorIds, type Competitor } from './competitor';
import type { LapStanding } from './lap';
import type { RankingMode } from './session';

export type CompetitorStanding = {
  competitor: Competitor;
  laps: LapStanding;
  /** Latest on-track position announced by the feed, if any. */
  feedPosition: number | null;
};

export type StandingComparator = (left: CompetitorStanding, right: CompetitorStanding) => number;

const compareNullableAscending = (left: number | null, right: number | null): number => {
  if (left === null && right === null) {
    return 0;
  }

  if (left === null) {
    return 1;
  }

  if (right === null) {
    return -1;
  }

  return left - right;
};

/**
 * Most laps first, then quickest best lap, then whoever reached the lap count
 * first. Competitors without a time sort behind those with one.
 */
export const compareByLapsThenBestLap: StandingComparator = (left, right) =>
  right.laps.totalLaps - left.laps.totalLaps ||
  compareNullableAscending(left.laps.bestLapMs, right.laps.bestLapMs) ||
  compareNullableAscending(left.laps.reachedAtMs, right.laps.reachedAtMs) ||
  compareNullableAscending(left.laps.reachedAtSequence, right.laps.reachedAtSequence);

export const rankStandings = (
  standings: ReadonlyArray<CompetitorStanding>,
  mode: RankingMode,
  comparator: StandingComparator = compareByLapsThenBestLap,
): CompetitorStanding[] => {
  const timeOrder: StandingComparator = (left, right) =>
    comparator(left, right) || compareCompetitorIds(left.competitor.id, right.competitor.id);

  if (mode === 'time-derived') {
    return [...standings].sort(timeOrder);
  }

  return [...standings].sort(
    (left, right) =>
      compareNullableAscending(left.feedPosition, right.feedPosition) || timeOrder(left, right),
  );
};
