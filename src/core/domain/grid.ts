import { compareCompetitorIds } from './competitor';
import { computePoints, type PointsScale } from './points';
import type { ResultSnapshot } from './resultSnapshot';

export type PrefinalGridInput = {
  /** Official snapshots, one per heat session. */
  heats: ReadonlyArray<ResultSnapshot>;
  scale: PointsScale;
  /** Official qualifying snapshot used to break points ties. */
  qualifying?: ResultSnapshot | null;
};

export type GridHeatContribution = {
  sessionId: string;
  version: number;
  position: number | null;
  points: number;
};

export type PrefinalGridRow = {
  gridPosition: number;
  competitorId: string;
  carNumber: string;
  displayName: string;
  totalPoints: number;
  qualifyingPosition: number | null;
  heats: GridHeatContribution[];
};

export type GridInputIssue = {
  sessionId: string | null;
  message: string;
};

export const validatePrefinalGridInput = (input: PrefinalGridInput): GridInputIssue[] => {
  const issues: GridInputIssue[] = [];

  if (input.heats.length === 0) {
    issues.push({ sessionId: null, message: 'At least one heat snapshot is required.' });
  }

  const seen = new Set<string>();
  for (const heat of input.heats) {
    if (heat.basis !== 'official') {
      issues.push({ sessionId: heat.sessionId, message: 'Heat snapshot is not official.' });
    }

    if (seen.has(heat.sessionId)) {
      issues.push({ sessionId: heat.sessionId, message: 'Heat session listed more than once.' });
    }
    seen.add(heat.sessionId);
  }

  const qualifying = input.qualifying;
  if (qualifying) {
    if (qualifying.basis !== 'official') {
      issues.push({ sessionId: qualifying.sessionId, message: 'Qualifying snapshot is not official.' });
    }

    if (seen.has(qualifying.sessionId)) {
      issues.push({
        sessionId: qualifying.sessionId,
        message: 'Qualifying session cannot also be a heat.',
      });
    }
  }

  return issues;
};

type GridAccumulator = Omit<PrefinalGridRow, 'gridPosition'>;

/**
 * Sums heat points per competitor and orders the grid: most points first, then
 * the better official qualifying position, then competitor id.
 */
export const buildPrefinalGrid = (input: PrefinalGridInput): PrefinalGridRow[] => {
  const qualifyingPositions = new Map<string, number>();
  for (const entry of input.qualifying?.entries ?? []) {
    if (entry.status === 'classified') {
      qualifyingPositions.set(entry.competitorId, entry.position);
    }
  }

  const rows = new Map<string, GridAccumulator>();
  for (const heat of input.heats) {
    for (const entry of heat.entries) {
      if (!rows.has(entry.competitorId)) {
        rows.set(entry.competitorId, {
          competitorId: entry.competitorId,
          carNumber: entry.carNumber,
          displayName: entry.displayName,
          totalPoints: 0,
          qualifyingPosition: qualifyingPositions.get(entry.competitorId) ?? null,
          heats: [],
        });
      }
    }
  }

  for (const heat of input.heats) {
    const points = new Map(
      computePoints(heat, input.scale).entries.map((entry) => [entry.competitorId, entry]),
    );

    for (const row of rows.values()) {
      const awarded = points.get(row.competitorId);
      row.heats.push({
        sessionId: heat.sessionId,
        version: heat.version,
        position: awarded?.position ?? null,
        points: awarded?.points ?? 0,
      });
      row.totalPoints += awarded?.points ?? 0;
    }
  }

  const ordered = [...rows.values()].sort((left, right) => {
    if (left.totalPoints !== right.totalPoints) {
      return right.totalPoints - left.totalPoints;
    }

    const leftQualifying = left.qualifyingPosition ?? Number.POSITIVE_INFINITY;
    const rightQualifying = right.qualifyingPosition ?? Number.POSITIVE_INFINITY;
    if (leftQualifying !== rightQualifying) {
      return leftQualifying < rightQualifying ? -1 : 1;
    }

    return compareCompetitorIds(left.competitorId, right.competitorId);
  });

  return ordered.map((row, index) => ({ gridPosition: index + 1, ...row }));
};
