import type { ResultSnapshot } from './resultSnapshot';

export type PointsScale = {
  schemeId: string;
  /** Positions `1..fieldSize` are scored; everything below scores nothing. */
  fieldSize: number;
  points: Readonly<Record<number, number>>;
};

/** Scale for sessions that award nothing. */
export const NO_POINTS_SCALE: PointsScale = Object.freeze({
  schemeId: 'none',
  fieldSize: 0,
  points: Object.freeze({}),
});

export type PointsEntry = {
  schemeId: string;
  sessionId: string;
  /** Always the version of the official snapshot the entry was computed from. */
  version: number;
  competitorId: string;
  position: number;
  points: number;
};

export type PointsTable = {
  schemeId: string;
  sessionId: string;
  version: number;
  entries: ReadonlyArray<Readonly<PointsEntry>>;
};

export const pointsForPosition = (scale: PointsScale, position: number): number => {
  if (!Number.isInteger(position) || position < 1 || position > scale.fieldSize) {
    return 0;
  }

  return scale.points[position] ?? 0;
};

export const computePoints = (snapshot: ResultSnapshot, scale: PointsScale): PointsTable => {
  const entries = snapshot.entries.map((entry) =>
    Object.freeze({
      schemeId: scale.schemeId,
      sessionId: snapshot.sessionId,
      version: snapshot.version,
      competitorId: entry.competitorId,
      position: entry.position,
      points: entry.pointsEligible ? pointsForPosition(scale, entry.position) : 0,
    }),
  );

  return Object.freeze({
    schemeId: scale.schemeId,
    sessionId: snapshot.sessionId,
    version: snapshot.version,
    entries: Object.freeze(entries),
  });
};
