import type { CompetitorStanding } from './ranking';
import type { RankingMode } from './session';

export type ClassificationGap = {
  lapsBehind: number;
  /** Best-lap difference to the leader; only set when on the leader's lap. */
  timeMs: number | null;
};

export type ClassificationEntry = {
  competitorId: string;
  carNumber: string;
  displayName: string;
  position: number;
  totalLaps: number;
  bestLapMs: number | null;
  totalTimeMs: number | null;
  /** `null` for the leader. */
  gap: ClassificationGap | null;
};

export type Classification = {
  sessionId: string;
  basis: 'provisional';
  /** Bumped on every recompute so readers can tell views apart cheaply. */
  revision: number;
  rankingMode: RankingMode;
  entries: ReadonlyArray<Readonly<ClassificationEntry>>;
  updatedAt: Date;
};

const computeGap = (
  leader: CompetitorStanding,
  standing: CompetitorStanding,
): ClassificationGap => {
  const lapsBehind = Math.max(0, leader.laps.totalLaps - standing.laps.totalLaps);
  const leaderBest = leader.laps.bestLapMs;
  const best = standing.laps.bestLapMs;

  return {
    lapsBehind,
    timeMs: lapsBehind === 0 && leaderBest !== null && best !== null ? best - leaderBest : null,
  };
};

export const buildClassificationEntries = (
  ranked: ReadonlyArray<CompetitorStanding>,
): ClassificationEntry[] => {
  const leader = ranked[0];

  return ranked.map((standing, index) => ({
    competitorId: standing.competitor.id,
    carNumber: standing.competitor.carNumber,
    displayName: standing.competitor.displayName,
    position: index + 1,
    totalLaps: standing.laps.totalLaps,
    bestLapMs: standing.laps.bestLapMs,
    totalTimeMs: standing.laps.totalTimeMs,
    gap: index === 0 || !leader ? null : computeGap(leader, standing),
  }));
};

export const createClassification = (input: {
  sessionId: string;
  revision: number;
  rankingMode: RankingMode;
  entries: ReadonlyArray<ClassificationEntry>;
  updatedAt: Date;
}): Classification =>
  Object.freeze({
    sessionId: input.sessionId,
    basis: 'provisional' as const,
    revision: input.revision,
    rankingMode: input.rankingMode,
    entries: Object.freeze(
      input.entries.map((entry) =>
        Object.freeze({ ...entry, gap: entry.gap ? Object.freeze({ ...entry.gap }) : null }),
      ),
    ),
    updatedAt: input.updatedAt,
  });

export const emptyClassification = (
  sessionId: string,
  rankingMode: RankingMode,
  updatedAt: Date,
): Classification =>
  createClassification({ sessionId, revision: 0, rankingMode, entries: [], updatedAt });
