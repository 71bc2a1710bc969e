export type LapRecord = {
  competitorId: string;
  lapNumber: number;
  lapTimeMs: number;
  /** Session elapsed time at the crossing, as reported by the feed. */
  elapsedMs: number | null;
  valid: boolean;
  /** Position in the session journal; shared with feed position reports. */
  sequence: number;
};

export type LapStanding = {
  totalLaps: number;
  bestLapMs: number | null;
  totalTimeMs: number | null;
  /** Feed time at which the competitor reached `totalLaps`. */
  reachedAtMs: number | null;
  reachedAtSequence: number | null;
};

export const EMPTY_LAP_STANDING: LapStanding = Object.freeze({
  totalLaps: 0,
  bestLapMs: null,
  totalTimeMs: null,
  reachedAtMs: null,
  reachedAtSequence: null,
});

/**
 * Summarises a competitor's laps. Lap numbers may have gaps when packets were
 * missed, so the lap count is the highest recorded lap number less every
 * recorded lap that does not count.
 */
export const summariseLaps = (
  laps: ReadonlyArray<LapRecord>,
  excludedLapNumbers: ReadonlySet<number> = new Set<number>(),
): LapStanding => {
  if (laps.length === 0) {
    return EMPTY_LAP_STANDING;
  }

  let highestLapNumber = 0;
  let uncounted = 0;
  let bestLapMs: number | null = null;
  let lastCounted: LapRecord | null = null;

  for (const lap of laps) {
    highestLapNumber = Math.max(highestLapNumber, lap.lapNumber);

    if (!lap.valid || excludedLapNumbers.has(lap.lapNumber)) {
      uncounted += 1;
      continue;
    }

    if (bestLapMs === null || lap.lapTimeMs < bestLapMs) {
      bestLapMs = lap.lapTimeMs;
    }

    if (!lastCounted || lap.lapNumber > lastCounted.lapNumber) {
      lastCounted = lap;
    }
  }

  return {
    totalLaps: Math.max(0, highestLapNumber - uncounted),
    bestLapMs,
    totalTimeMs: lastCounted?.elapsedMs ?? null,
    reachedAtMs: lastCounted?.elapsedMs ?? null,
    reachedAtSequence: lastCounted?.sequence ?? null,
  };
};

export const formatLapTime = (milliseconds: number): string => {
  const minutes = Math.floor(milliseconds / 60_000);
  const seconds = Math.floor((milliseconds % 60_000) / 1000);
  const millis = milliseconds % 1000;
  return `${minutes}:${String(seconds).padStart(2, '0')}.${String(millis).padStart(3, '0')}`;
};
