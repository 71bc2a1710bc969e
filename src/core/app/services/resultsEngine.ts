/**
 * File: src/core/app/services/resultsEngine.ts
 * Summary: Facade wiring the feed hub, aggregator, ledger and official results into one engine.
 */

import type {
  Classification,
  OfficialEntry,
  PenaltyEvent,
  PointsTable,
  PublishedResult,
  ResultSnapshot,
  Session,
  SessionConfig,
  StandingComparator,
  TimingEvent,
} from '@core/domain';

import type { Logger } from '../ports/logger';
import type { OfficialResultRepository } from '../ports/officialResultRepository';
import type { PointsScaleProvider } from '../ports/pointsScaleProvider';
import type { ResultPublisher } from '../ports/resultPublisher';
import { FeedHub } from './feedHub';
import { OfficialResultsService, type OfficialPreview } from './officialResults';
import { PenaltyLedger, type SubmitPenaltyInput } from './penaltyLedger';
import { PrefinalGridService, type BuildPrefinalGridRequest, type PrefinalGrid } from './prefinalGrid';
import { ProvisionalAggregator } from './provisionalAggregator';
import { PublicationDispatcher } from './publicationDispatcher';
import { SessionRegistry, type SessionConfigResolver } from './sessionRegistry';

export type ResultsEngineDependencies = {
  resolveSessionConfig: SessionConfigResolver;
  repository: OfficialResultRepository;
  scales: PointsScaleProvider;
  defaultSchemeId: string;
  publishers?: ReadonlyArray<ResultPublisher>;
  logger?: Logger;
  clock?: () => Date;
  comparator?: StandingComparator;
};

export class ResultsEngine {
  readonly hub: FeedHub;

  readonly dispatcher: PublicationDispatcher;

  private readonly registry: SessionRegistry;

  private readonly aggregator: ProvisionalAggregator;

  private readonly ledger: PenaltyLedger;

  private readonly official: OfficialResultsService;

  private readonly grid: PrefinalGridService;

  constructor(dependencies: ResultsEngineDependencies) {
    const { logger, clock, comparator } = dependencies;

    this.registry = new SessionRegistry({
      resolveConfig: dependencies.resolveSessionConfig,
      logger,
      clock,
    });
    this.hub = new FeedHub(logger);
    this.dispatcher = new PublicationDispatcher(dependencies.publishers ?? [], logger);
    this.aggregator = new ProvisionalAggregator({
      registry: this.registry,
      logger,
      clock,
      comparator,
    });
    this.ledger = new PenaltyLedger({ registry: this.registry, logger, clock });
    this.official = new OfficialResultsService({
      registry: this.registry,
      repository: dependencies.repository,
      dispatcher: this.dispatcher,
      logger,
      clock,
      comparator,
    });
    this.grid = new PrefinalGridService({
      repository: dependencies.repository,
      scales: dependencies.scales,
      defaultSchemeId: dependencies.defaultSchemeId,
      logger,
    });

    this.hub.subscribe((event) => this.aggregator.apply(event));
  }

  /** Feeds one decoded event through the hub; rejected events are logged there. */
  ingest(event: TimingEvent): void {
    this.hub.dispatch(event);
  }

  /** Opens a session ahead of the feed, optionally with its own ranking mode, scale or lap floor. */
  openSession(sessionId: string, name?: string, config?: Partial<SessionConfig>): Session {
    return this.registry.open(sessionId, name, config).session;
  }

  getSession(sessionId: string): Session {
    return this.aggregator.getSession(sessionId);
  }

  listSessions(): Session[] {
    return this.aggregator.listSessions();
  }

  getProvisional(sessionId: string): Classification {
    return this.aggregator.getProvisional(sessionId);
  }

  submitPenalty(input: SubmitPenaltyInput): PenaltyEvent {
    return this.ledger.submitPenalty(input);
  }

  listPenalties(sessionId: string): PenaltyEvent[] {
    return this.ledger.listPenalties(sessionId);
  }

  previewOfficial(sessionId: string): OfficialPreview {
    return this.official.previewOfficial(sessionId);
  }

  publishOfficial(sessionId: string): Promise<PublishedResult> {
    return this.official.publishOfficial(sessionId);
  }

  getOfficial(sessionId: string, version?: number): Promise<ResultSnapshot> {
    return this.official.getOfficial(sessionId, version);
  }

  getPoints(sessionId: string, version?: number): Promise<PointsTable> {
    return this.official.getPoints(sessionId, version);
  }

  listOfficialVersions(sessionId: string): Promise<number[]> {
    return this.official.listOfficialVersions(sessionId);
  }

  replayOfficial(sessionId: string, version: number): Promise<OfficialEntry[]> {
    return this.official.replayOfficial(sessionId, version);
  }

  buildPrefinalGrid(request: BuildPrefinalGridRequest): Promise<PrefinalGrid> {
    return this.grid.build(request);
  }
}

export const createResultsEngine = (dependencies: ResultsEngineDependencies) =>
  new ResultsEngine(dependencies);
