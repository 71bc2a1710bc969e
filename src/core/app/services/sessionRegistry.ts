/**
 * File: src/core/app/services/sessionRegistry.ts
 * Summary: In-memory session state shared by the aggregator, the penalty ledger and the snapshot builder.
 */

import {
  canTransitionSession,
  emptyClassification,
  inferSessionKind,
  type Classification,
  type Competitor,
  type FeedPositionReport,
  type LapRecord,
  type PenaltyEvent,
  type Session,
  type SessionConfig,
  type SessionKind,
  type SessionState,
} from '@core/domain';

import { UnknownCompetitorError } from '../errors/unknownCompetitorError';
import { UnknownSessionError } from '../errors/unknownSessionError';
import type { Logger } from '../ports/logger';

export type SessionDescriptor = {
  id: string;
  name: string;
  kind: SessionKind;
};

export type SessionConfigResolver = (session: SessionDescriptor) => SessionConfig;

/**
 * Everything the engine knows about one session. Laps, feed position reports
 * and competitor registrations share one journal sequence so an official
 * snapshot can name exactly how much history it was derived from.
 */
export class SessionRecord {
  private state: SessionState = 'idle';

  private sequence = 0;

  private current: Classification;

  private readonly competitorMap = new Map<string, Competitor>();

  private readonly registeredAt = new Map<string, number>();

  private readonly lapJournal: LapRecord[] = [];

  private readonly lapsByCompetitor = new Map<string, LapRecord[]>();

  private readonly positionJournal: FeedPositionReport[] = [];

  private readonly latestPositions = new Map<string, number>();

  private readonly ledger: PenaltyEvent[] = [];

  constructor(
    readonly id: string,
    readonly name: string,
    readonly kind: SessionKind,
    readonly config: SessionConfig,
    readonly createdAt: Date,
  ) {
    this.current = emptyClassification(id, config.rankingMode, createdAt);
  }

  get session(): Session {
    return {
      id: this.id,
      name: this.name,
      kind: this.kind,
      state: this.state,
      config: this.config,
      createdAt: this.createdAt,
    };
  }

  get sessionState(): SessionState {
    return this.state;
  }

  get journalSequence(): number {
    return this.sequence;
  }

  get classification(): Classification {
    return this.current;
  }

  get competitors(): Competitor[] {
    return [...this.competitorMap.values()];
  }

  get laps(): ReadonlyArray<LapRecord> {
    return this.lapJournal;
  }

  get positionReports(): ReadonlyArray<FeedPositionReport> {
    return this.positionJournal;
  }

  get feedPositions(): ReadonlyMap<string, number> {
    return this.latestPositions;
  }

  get penalties(): ReadonlyArray<PenaltyEvent> {
    return this.ledger;
  }

  hasCompetitor(competitorId: string): boolean {
    return this.competitorMap.has(competitorId);
  }

  requireCompetitor(competitorId: string): Competitor {
    const competitor = this.competitorMap.get(competitorId);
    if (!competitor) {
      throw new UnknownCompetitorError(this.id, competitorId);
    }

    return competitor;
  }

  lapsFor(competitorId: string): ReadonlyArray<LapRecord> {
    return this.lapsByCompetitor.get(competitorId) ?? [];
  }

  highestLapNumber(competitorId: string): number {
    const laps = this.lapsByCompetitor.get(competitorId);
    return laps && laps.length > 0 ? laps[laps.length - 1].lapNumber : 0;
  }

  /** Competitors registered at or before `sequence`, in registration order. */
  competitorsUpTo(sequence: number): Competitor[] {
    return this.competitors.filter(
      (competitor) => (this.registeredAt.get(competitor.id) ?? 0) <= sequence,
    );
  }

  transition(to: SessionState): boolean {
    if (!canTransitionSession(this.state, to)) {
      return false;
    }

    this.state = to;
    return true;
  }

  /** Returns `false` when the competitor is already known; the first registration wins. */
  registerCompetitor(competitor: Competitor): boolean {
    if (this.competitorMap.has(competitor.id)) {
      return false;
    }

    this.sequence += 1;
    this.competitorMap.set(competitor.id, Object.freeze({ ...competitor }));
    this.registeredAt.set(competitor.id, this.sequence);
    return true;
  }

  appendLap(lap: Omit<LapRecord, 'sequence'>): LapRecord {
    this.sequence += 1;
    const record: LapRecord = Object.freeze({ ...lap, sequence: this.sequence });

    this.lapJournal.push(record);
    const bucket = this.lapsByCompetitor.get(record.competitorId);
    if (bucket) {
      bucket.push(record);
    } else {
      this.lapsByCompetitor.set(record.competitorId, [record]);
    }

    return record;
  }

  reportPosition(competitorId: string, position: number): FeedPositionReport {
    this.sequence += 1;
    const report: FeedPositionReport = Object.freeze({
      competitorId,
      position,
      sequence: this.sequence,
    });

    this.positionJournal.push(report);
    this.latestPositions.set(competitorId, position);
    return report;
  }

  appendPenalty(entry: Omit<PenaltyEvent, 'sequence'>): PenaltyEvent {
    const event: PenaltyEvent = Object.freeze({
      ...entry,
      penalty: Object.freeze({ ...entry.penalty }),
      sequence: this.ledger.length + 1,
    });

    this.ledger.push(event);
    return event;
  }

  swapClassification(next: Classification) {
    this.current = next;
  }
}

type SessionRegistryDependencies = {
  resolveConfig: SessionConfigResolver;
  logger?: Logger;
  clock?: () => Date;
};

export class SessionRegistry {
  private readonly sessions = new Map<string, SessionRecord>();

  private readonly resolveConfig: SessionConfigResolver;

  private readonly logger?: Logger;

  private readonly clock: () => Date;

  constructor(dependencies: SessionRegistryDependencies) {
    this.resolveConfig = dependencies.resolveConfig;
    this.logger = dependencies.logger;
    this.clock = dependencies.clock ?? (() => new Date());
  }

  /**
   * Returns the existing session or creates it. The name and the config
   * overrides only matter on creation; overridden fields replace what the
   * resolver picks for the session.
   */
  open(sessionId: string, name?: string | null, overrides: Partial<SessionConfig> = {}): SessionRecord {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      return existing;
    }

    const sessionName = name?.trim() || sessionId;
    const kind = inferSessionKind(sessionName);
    const resolved = this.resolveConfig({ id: sessionId, name: sessionName, kind });
    const config: SessionConfig = {
      rankingMode: overrides.rankingMode ?? resolved.rankingMode,
      pointsScale: overrides.pointsScale ?? resolved.pointsScale,
      minValidLapMs: Math.max(0, overrides.minValidLapMs ?? resolved.minValidLapMs),
    };
    const record = new SessionRecord(sessionId, sessionName, kind, config, this.clock());
    this.sessions.set(sessionId, record);

    this.logger?.info?.('Timing session opened.', {
      event: 'results.session.opened',
      outcome: 'success',
      sessionId,
      sessionName,
      sessionKind: kind,
      rankingMode: config.rankingMode,
      pointsScheme: config.pointsScale.schemeId,
    });

    return record;
  }

  get(sessionId: string): SessionRecord | null {
    return this.sessions.get(sessionId) ?? null;
  }

  require(sessionId: string): SessionRecord {
    const record = this.sessions.get(sessionId);
    if (!record) {
      throw new UnknownSessionError(sessionId);
    }

    return record;
  }

  list(): Session[] {
    return [...this.sessions.values()].map((record) => record.session);
  }
}
