import type { SessionState } from './session';

type TimingEventBase = {
  sessionId: string;
};

export type SessionStateChangedEvent = TimingEventBase & {
  kind: 'session_state_changed';
  state: SessionState;
  sessionName: string | null;
  /** Raw flag text when the change came from a flag record. */
  flag: string | null;
};

export type CompetitorRegisteredEvent = TimingEventBase & {
  kind: 'competitor_registered';
  competitorId: string;
  carNumber: string;
  transponder: string | null;
  displayName: string;
};

export type LapCompletedEvent = TimingEventBase & {
  kind: 'lap_completed';
  competitorId: string;
  lapNumber: number;
  lapTimeMs: number;
  elapsedMs: number | null;
};

export type PositionChangedEvent = TimingEventBase & {
  kind: 'position_changed';
  competitorId: string;
  position: number;
  lapsCompleted: number | null;
  elapsedMs: number | null;
};

export type TimingEvent =
  | SessionStateChangedEvent
  | CompetitorRegisteredEvent
  | LapCompletedEvent
  | PositionChangedEvent;

export type TimingEventKind = TimingEvent['kind'];
