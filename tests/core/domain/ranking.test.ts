import assert from 'node:assert/strict';
import test from 'node:test';

import {
  compareCompetitorIds,
  EMPTY_LAP_STANDING,
  inferSessionKind,
  rankStandings,
  summariseLaps,
  type CompetitorStanding,
  type LapRecord,
  type LapStanding,
} from '../../../src/core/domain';

const standing = (
  id: string,
  laps: Partial<LapStanding>,
  feedPosition: number | null = null,
): CompetitorStanding => ({
  competitor: { id, carNumber: id, transponder: null, displayName: `Driver ${id}` },
  laps: { ...EMPTY_LAP_STANDING, ...laps },
  feedPosition,
});

const lap = (lapNumber: number, lapTimeMs: number, overrides: Partial<LapRecord> = {}): LapRecord => ({
  competitorId: '1',
  lapNumber,
  lapTimeMs,
  elapsedMs: lapNumber * 60_000,
  valid: true,
  sequence: lapNumber,
  ...overrides,
});

test('time-derived ranking orders by laps, best lap, then time reached', () => {
  const ranked = rankStandings(
    [
      standing('A', { totalLaps: 9, bestLapMs: 58_000 }),
      standing('B', { totalLaps: 10, bestLapMs: 59_000, reachedAtMs: 600_500 }),
      standing('C', { totalLaps: 10, bestLapMs: 59_000, reachedAtMs: 600_100 }),
      standing('D', { totalLaps: 10, bestLapMs: 58_500 }),
      standing('E', { totalLaps: 0 }),
    ],
    'time-derived',
  );

  assert.deepEqual(
    ranked.map((entry) => entry.competitor.id),
    ['D', 'C', 'B', 'A', 'E'],
  );
});

test('ties fall back to numeric-aware competitor ids', () => {
  const ranked = rankStandings(
    [standing('10', { totalLaps: 3 }), standing('2', { totalLaps: 3 }), standing('B7', { totalLaps: 3 })],
    'time-derived',
  );

  assert.deepEqual(
    ranked.map((entry) => entry.competitor.id),
    ['2', '10', 'B7'],
  );
  assert.ok(compareCompetitorIds('9', '10') < 0);
  assert.ok(compareCompetitorIds('A', 'B') < 0);
  assert.equal(compareCompetitorIds('7', '7'), 0);
});

test('feed-reported ranking trusts feed positions and appends unreported competitors', () => {
  const ranked = rankStandings(
    [
      standing('A', { totalLaps: 10, bestLapMs: 58_000 }, 2),
      standing('B', { totalLaps: 9, bestLapMs: 59_000 }, 1),
      standing('C', { totalLaps: 10, bestLapMs: 57_000 }),
      standing('D', { totalLaps: 4, bestLapMs: 61_000 }),
    ],
    'feed-reported',
  );

  assert.deepEqual(
    ranked.map((entry) => entry.competitor.id),
    ['B', 'A', 'C', 'D'],
  );
});

test('an injected comparator replaces the lap ordering', () => {
  const slowestFirst = (left: CompetitorStanding, right: CompetitorStanding) =>
    (right.laps.bestLapMs ?? 0) - (left.laps.bestLapMs ?? 0);

  const ranked = rankStandings(
    [standing('A', { bestLapMs: 58_000 }), standing('B', { bestLapMs: 60_000 })],
    'time-derived',
    slowestFirst,
  );

  assert.deepEqual(
    ranked.map((entry) => entry.competitor.id),
    ['B', 'A'],
  );
});

test('summariseLaps counts gaps and excludes invalid laps', () => {
  const summary = summariseLaps([
    lap(1, 61_000),
    lap(2, 25_000, { valid: false }),
    lap(4, 59_500),
  ]);

  assert.deepEqual(summary, {
    totalLaps: 3,
    bestLapMs: 59_500,
    totalTimeMs: 240_000,
    reachedAtMs: 240_000,
    reachedAtSequence: 4,
  });
});

test('summariseLaps drops invalidated laps from best lap and count', () => {
  const summary = summariseLaps([lap(1, 61_000), lap(2, 58_000), lap(3, 60_000)], new Set([2]));

  assert.equal(summary.totalLaps, 2);
  assert.equal(summary.bestLapMs, 60_000);
  assert.equal(summary.totalTimeMs, 180_000);
});

test('session kinds are inferred from run names', () => {
  assert.equal(inferSessionKind('Senior Qualifying Group A'), 'qualifying');
  assert.equal(inferSessionKind('Heat 3'), 'heat');
  assert.equal(inferSessionKind('Pre-Final'), 'prefinal');
  assert.equal(inferSessionKind('Prefinal Group 1'), 'prefinal');
  assert.equal(inferSessionKind('Main Event'), 'final');
  assert.equal(inferSessionKind('Final'), 'final');
  assert.equal(inferSessionKind('Warm up'), 'practice');
});
