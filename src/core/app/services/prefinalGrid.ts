import {
  buildPrefinalGrid,
  validatePrefinalGridInput,
  type PointsScale,
  type PrefinalGridRow,
  type ResultSnapshot,
} from '@core/domain';

import { InvalidGridInputError } from '../errors/invalidGridInputError';
import { OfficialResultNotFoundError } from '../errors/officialResultNotFoundError';
import type { Logger } from '../ports/logger';
import type { OfficialResultRepository } from '../ports/officialResultRepository';
import type { PointsScaleProvider } from '../ports/pointsScaleProvider';

export type BuildPrefinalGridRequest = {
  heatSessionIds: string[];
  qualifyingSessionId?: string | null;
  /** Falls back to the service's default scheme. */
  schemeId?: string;
};

export type PrefinalGrid = {
  schemeId: string;
  heats: { sessionId: string; version: number }[];
  qualifying: { sessionId: string; version: number } | null;
  rows: PrefinalGridRow[];
};

type PrefinalGridDependencies = {
  repository: OfficialResultRepository;
  scales: PointsScaleProvider;
  defaultSchemeId: string;
  logger?: Logger;
};

/** Builds the prefinal grid from the latest official version of each named session. */
export class PrefinalGridService {
  constructor(private readonly dependencies: PrefinalGridDependencies) {}

  async build(request: BuildPrefinalGridRequest): Promise<PrefinalGrid> {
    const schemeId = request.schemeId ?? this.dependencies.defaultSchemeId;
    const scale = this.resolveScale(schemeId);

    const heats = await Promise.all(
      request.heatSessionIds.map((sessionId) => this.latestSnapshot(sessionId)),
    );
    const qualifying = request.qualifyingSessionId
      ? await this.latestSnapshot(request.qualifyingSessionId)
      : null;

    const input = { heats, scale, qualifying };
    const issues = validatePrefinalGridInput(input);
    if (issues.length > 0) {
      throw new InvalidGridInputError(issues);
    }

    const rows = buildPrefinalGrid(input);

    this.dependencies.logger?.info?.('Prefinal grid built.', {
      event: 'results.grid.built',
      outcome: 'success',
      schemeId,
      heats: heats.length,
      rows: rows.length,
    });

    return {
      schemeId,
      heats: heats.map((heat) => ({ sessionId: heat.sessionId, version: heat.version })),
      qualifying: qualifying
        ? { sessionId: qualifying.sessionId, version: qualifying.version }
        : null,
      rows,
    };
  }

  private resolveScale(schemeId: string): PointsScale {
    const scale = this.dependencies.scales.get(schemeId);
    if (!scale) {
      throw new InvalidGridInputError([
        { sessionId: null, message: `Unknown points scheme "${schemeId}".` },
      ]);
    }

    return scale;
  }

  private async latestSnapshot(sessionId: string): Promise<ResultSnapshot> {
    const published = await this.dependencies.repository.get(sessionId);
    if (!published) {
      throw new OfficialResultNotFoundError(sessionId, null);
    }

    return published.snapshot;
  }
}
