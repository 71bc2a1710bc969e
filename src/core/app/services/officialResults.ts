/**
 * File: src/core/app/services/officialResults.ts
 * Summary: Derives official orderings from the penalty ledger and publishes versioned snapshots.
 */

import {
  collectFeedPositions,
  compareByLapsThenBestLap,
  computePoints,
  createResultSnapshot,
  deriveOfficialEntries,
  type OfficialEntry,
  type PointsTable,
  type PublishedResult,
  type RankingMode,
  type ResultSnapshot,
  type StandingComparator,
} from '@core/domain';

import { ConcurrentPublishError } from '../errors/concurrentPublishError';
import { NoProvisionalDataError } from '../errors/noProvisionalDataError';
import { OfficialResultNotFoundError } from '../errors/officialResultNotFoundError';
import { isResultsEngineError } from '../errors/resultsEngineError';
import type { Logger } from '../ports/logger';
import type { OfficialResultRepository } from '../ports/officialResultRepository';
import type { PublicationDispatcher } from './publicationDispatcher';
import type { SessionRecord, SessionRegistry } from './sessionRegistry';

export type OfficialPreview = {
  sessionId: string;
  rankingMode: RankingMode;
  entries: OfficialEntry[];
  ledgerSize: number;
  journalSequence: number;
};

type OfficialResultsDependencies = {
  registry: SessionRegistry;
  repository: OfficialResultRepository;
  dispatcher: PublicationDispatcher;
  logger?: Logger;
  clock?: () => Date;
  comparator?: StandingComparator;
};

export class OfficialResultsService {
  private readonly registry: SessionRegistry;

  private readonly repository: OfficialResultRepository;

  private readonly dispatcher: PublicationDispatcher;

  private readonly logger?: Logger;

  private readonly clock: () => Date;

  private readonly comparator: StandingComparator;

  private readonly publishing = new Set<string>();

  constructor(dependencies: OfficialResultsDependencies) {
    this.registry = dependencies.registry;
    this.repository = dependencies.repository;
    this.dispatcher = dependencies.dispatcher;
    this.logger = dependencies.logger;
    this.clock = dependencies.clock ?? (() => new Date());
    this.comparator = dependencies.comparator ?? compareByLapsThenBestLap;
  }

  /** Replays the whole ledger over the current history. Changes nothing. */
  previewOfficial(sessionId: string): OfficialPreview {
    const record = this.registry.require(sessionId);
    return this.derive(record, record.journalSequence, record.penalties.length);
  }

  async publishOfficial(sessionId: string): Promise<PublishedResult> {
    const record = this.registry.require(sessionId);

    if (record.laps.length === 0) {
      throw new NoProvisionalDataError(sessionId);
    }

    if (this.publishing.has(sessionId)) {
      throw new ConcurrentPublishError(sessionId);
    }

    this.publishing.add(sessionId);
    const startedAt = Date.now();

    try {
      // Captured before the first await so the snapshot matches its watermarks.
      const derived = this.derive(record, record.journalSequence, record.penalties.length);
      const version = (await this.repository.latestVersion(sessionId)) + 1;

      const snapshot = createResultSnapshot({
        sessionId,
        version,
        entries: derived.entries,
        ledgerSize: derived.ledgerSize,
        journalSequence: derived.journalSequence,
        createdAt: this.clock(),
      });
      const points = computePoints(snapshot, record.config.pointsScale);
      const published: PublishedResult = Object.freeze({ sessionId, version, snapshot, points });

      await this.repository.append(published);

      this.logger?.info?.('Official result published.', {
        event: 'results.official.published',
        outcome: 'success',
        sessionId,
        version,
        ledgerSize: snapshot.ledgerSize,
        journalSequence: snapshot.journalSequence,
        entries: snapshot.entries.length,
        durationMs: Date.now() - startedAt,
      });

      this.dispatcher.dispatch(published);
      return published;
    } catch (error) {
      this.logger?.warn?.('Official result publish failed.', {
        event: 'results.official.publish_failed',
        outcome: 'failure',
        sessionId,
        code: isResultsEngineError(error) ? error.code : undefined,
        durationMs: Date.now() - startedAt,
        error,
      });
      throw error;
    } finally {
      this.publishing.delete(sessionId);
    }
  }

  async getOfficial(sessionId: string, version?: number): Promise<ResultSnapshot> {
    return (await this.requirePublished(sessionId, version)).snapshot;
  }

  async getPoints(sessionId: string, version?: number): Promise<PointsTable> {
    return (await this.requirePublished(sessionId, version)).points;
  }

  listOfficialVersions(sessionId: string): Promise<number[]> {
    return this.repository.listVersions(sessionId);
  }

  /**
   * Re-derives a published version from the raw history and ledger prefix its
   * watermarks name. Equal to the stored entries unless history was lost.
   */
  async replayOfficial(sessionId: string, version: number): Promise<OfficialEntry[]> {
    const record = this.registry.require(sessionId);
    const { snapshot } = await this.requirePublished(sessionId, version);
    return this.derive(record, snapshot.journalSequence, snapshot.ledgerSize).entries;
  }

  private async requirePublished(sessionId: string, version?: number): Promise<PublishedResult> {
    const published = await this.repository.get(sessionId, version);
    if (!published) {
      throw new OfficialResultNotFoundError(sessionId, version ?? null);
    }

    return published;
  }

  private derive(record: SessionRecord, journalSequence: number, ledgerSize: number): OfficialPreview {
    const entries = deriveOfficialEntries({
      competitors: record.competitorsUpTo(journalSequence),
      laps: record.laps.filter((lap) => lap.sequence <= journalSequence),
      feedPositions: collectFeedPositions(record.positionReports, journalSequence),
      rankingMode: record.config.rankingMode,
      penalties: record.penalties.slice(0, ledgerSize),
      comparator: this.comparator,
    });

    return {
      sessionId: record.id,
      rankingMode: record.config.rankingMode,
      entries,
      ledgerSize,
      journalSequence,
    };
  }
}
