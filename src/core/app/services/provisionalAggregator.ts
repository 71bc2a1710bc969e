/**
 * File: src/core/app/services/provisionalAggregator.ts
 * Summary: Applies timing events to session state and keeps the provisional classification current.
 */

import {
  buildClassificationEntries,
  compareByLapsThenBestLap,
  createClassification,
  rankStandings,
  summariseLaps,
  type Classification,
  type CompetitorRegisteredEvent,
  type CompetitorStanding,
  type LapCompletedEvent,
  type PositionChangedEvent,
  type Session,
  type SessionStateChangedEvent,
  type StandingComparator,
  type TimingEvent,
} from '@core/domain';

import type { Logger } from '../ports/logger';
import type { SessionRecord, SessionRegistry } from './sessionRegistry';

type ProvisionalAggregatorDependencies = {
  registry: SessionRegistry;
  logger?: Logger;
  clock?: () => Date;
  comparator?: StandingComparator;
};

export class ProvisionalAggregator {
  private readonly registry: SessionRegistry;

  private readonly logger?: Logger;

  private readonly clock: () => Date;

  private readonly comparator: StandingComparator;

  constructor(dependencies: ProvisionalAggregatorDependencies) {
    this.registry = dependencies.registry;
    this.logger = dependencies.logger;
    this.clock = dependencies.clock ?? (() => new Date());
    this.comparator = dependencies.comparator ?? compareByLapsThenBestLap;
  }

  /**
   * Applies one event. Validation happens before any state is touched, so an
   * event that throws leaves the session exactly as it was.
   */
  apply(event: TimingEvent): void {
    switch (event.kind) {
      case 'session_state_changed':
        this.applySessionState(event);
        return;
      case 'competitor_registered':
        this.applyRegistration(event);
        return;
      case 'lap_completed':
        this.applyLap(event);
        return;
      case 'position_changed':
        this.applyPosition(event);
        return;
      default: {
        const exhaustive: never = event;
        throw new Error(`Unhandled timing event ${JSON.stringify(exhaustive)}`);
      }
    }
  }

  getProvisional(sessionId: string): Classification {
    return this.registry.require(sessionId).classification;
  }

  getSession(sessionId: string): Session {
    return this.registry.require(sessionId).session;
  }

  listSessions(): Session[] {
    return this.registry.list();
  }

  private applySessionState(event: SessionStateChangedEvent) {
    const record = this.registry.open(event.sessionId, event.sessionName);
    const from = record.sessionState;

    if (!record.transition(event.state)) {
      return;
    }

    this.logger?.info?.('Session state changed.', {
      event: 'results.session.state_changed',
      outcome: 'success',
      sessionId: record.id,
      from,
      to: event.state,
      flag: event.flag ?? undefined,
    });
  }

  private applyRegistration(event: CompetitorRegisteredEvent) {
    const record = this.registry.open(event.sessionId);
    const registered = record.registerCompetitor({
      id: event.competitorId,
      carNumber: event.carNumber,
      transponder: event.transponder,
      displayName: event.displayName,
    });

    if (!registered) {
      return;
    }

    this.recompute(record);
  }

  private applyLap(event: LapCompletedEvent) {
    const record = this.registry.require(event.sessionId);
    record.requireCompetitor(event.competitorId);

    if (event.lapNumber <= record.highestLapNumber(event.competitorId)) {
      this.logger?.debug?.('Ignoring duplicate or stale lap.', {
        event: 'results.lap.ignored',
        outcome: 'skipped',
        sessionId: record.id,
        competitorId: event.competitorId,
        lapNumber: event.lapNumber,
      });
      return;
    }

    const minValidLapMs = record.config.minValidLapMs;
    record.appendLap({
      competitorId: event.competitorId,
      lapNumber: event.lapNumber,
      lapTimeMs: event.lapTimeMs,
      elapsedMs: event.elapsedMs,
      valid: minValidLapMs === 0 || event.lapTimeMs >= minValidLapMs,
    });

    this.recompute(record);
  }

  private applyPosition(event: PositionChangedEvent) {
    const record = this.registry.require(event.sessionId);
    record.requireCompetitor(event.competitorId);
    record.reportPosition(event.competitorId, event.position);

    if (record.config.rankingMode === 'feed-reported') {
      this.recompute(record);
    }
  }

  private recompute(record: SessionRecord) {
    const standings: CompetitorStanding[] = record.competitors.map((competitor) => ({
      competitor,
      laps: summariseLaps(record.lapsFor(competitor.id)),
      feedPosition: record.feedPositions.get(competitor.id) ?? null,
    }));

    const ranked = rankStandings(standings, record.config.rankingMode, this.comparator);

    record.swapClassification(
      createClassification({
        sessionId: record.id,
        revision: record.classification.revision + 1,
        rankingMode: record.config.rankingMode,
        entries: buildClassificationEntries(ranked),
        updatedAt: this.clock(),
      }),
    );
  }
}
