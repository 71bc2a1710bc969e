import type { PointsScale } from './points';

export type SessionState = 'idle' | 'live' | 'ended';

export type SessionKind = 'practice' | 'qualifying' | 'heat' | 'prefinal' | 'final';

/**
 * `time-derived` ranks on laps and lap times; `feed-reported` trusts the
 * on-track order announced by the timing system.
 */
export type RankingMode = 'time-derived' | 'feed-reported';

export type SessionConfig = {
  rankingMode: RankingMode;
  pointsScale: PointsScale;
  /** Laps faster than this are recorded as invalid. Zero disables the check. */
  minValidLapMs: number;
};

export type Session = {
  id: string;
  name: string;
  kind: SessionKind;
  state: SessionState;
  config: SessionConfig;
  createdAt: Date;
};

const STATE_ORDER: Record<SessionState, number> = {
  idle: 0,
  live: 1,
  ended: 2,
};

export const canTransitionSession = (from: SessionState, to: SessionState): boolean =>
  STATE_ORDER[to] > STATE_ORDER[from];

const GROUP_TOKEN = /\b(?:group|grp)\s*[12ab]\b/gi;

export const inferSessionKind = (name: string): SessionKind => {
  const normalised = name.replace(GROUP_TOKEN, ' ').toLowerCase();

  if (normalised.includes('qual')) {
    return 'qualifying';
  }

  if (normalised.includes('heat')) {
    return 'heat';
  }

  // Checked before "final" since every prefinal name contains it.
  if (/pre[\s-]?final/.test(normalised)) {
    return 'prefinal';
  }

  if (normalised.includes('final') || normalised.includes('main event')) {
    return 'final';
  }

  return 'practice';
};

export const isRaceKind = (kind: SessionKind): boolean =>
  kind === 'heat' || kind === 'prefinal' || kind === 'final';
