import {
  isRaceKind,
  NO_POINTS_SCALE,
  type PointsScale,
  type RankingMode,
  type SessionKind,
} from '@core/domain';

import type { SessionConfigResolver } from './sessionRegistry';

/** `auto` trusts the feed order in races and ranks on lap times elsewhere. */
export type RankingModePreference = RankingMode | 'auto';

/** Qualifying and heats each have a scale; other kinds score only when `other` is set. */
export type SessionPointsScales = {
  qualifying: PointsScale;
  heat: PointsScale;
  other: PointsScale | null;
};

export type SessionConfigDefaults = {
  rankingMode: RankingModePreference;
  pointsScales: SessionPointsScales;
  minValidLapMs: number;
};

export const pointsScaleForKind = (scales: SessionPointsScales, kind: SessionKind): PointsScale => {
  switch (kind) {
    case 'qualifying':
      return scales.qualifying;
    case 'heat':
      return scales.heat;
    default:
      return scales.other ?? NO_POINTS_SCALE;
  }
};

export const createSessionConfigResolver =
  (defaults: SessionConfigDefaults): SessionConfigResolver =>
  (session) => ({
    rankingMode:
      defaults.rankingMode === 'auto'
        ? isRaceKind(session.kind)
          ? 'feed-reported'
          : 'time-derived'
        : defaults.rankingMode,
    pointsScale: pointsScaleForKind(defaults.pointsScales, session.kind),
    minValidLapMs: Math.max(0, defaults.minValidLapMs),
  });
