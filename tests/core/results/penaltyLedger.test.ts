import assert from 'node:assert/strict';
import test from 'node:test';

import {
  InvalidPenaltyParamsError,
  PenaltyLedger,
  ProvisionalAggregator,
  SessionRegistry,
  UnknownCompetitorError,
  UnknownSessionError,
} from '../../../src/core/app';
import {
  createFixedClock,
  fixedConfig,
  InMemoryLogger,
  lapEvent,
  registerEvent,
} from '../__fixtures__/resultsFixtures';

const submittedAt = new Date('2026-03-14T10:30:00.000Z');

const createLedger = () => {
  const clock = createFixedClock(submittedAt);
  const registry = new SessionRegistry({ resolveConfig: fixedConfig('time-derived'), clock });
  const aggregator = new ProvisionalAggregator({ registry, clock });
  const logger = new InMemoryLogger();
  let counter = 0;
  const ledger = new PenaltyLedger({
    registry,
    logger,
    clock,
    generateId: () => {
      counter += 1;
      return `pen-${counter}`;
    },
  });

  aggregator.apply(registerEvent('1', 'A'));
  aggregator.apply(registerEvent('1', 'B'));
  aggregator.apply(lapEvent('1', 'A', 1, 60_000));
  aggregator.apply(lapEvent('1', 'A', 2, 59_000));

  return { ledger, aggregator, logger };
};

const issuesOf = (run: () => unknown) => {
  try {
    run();
  } catch (error) {
    assert.ok(error instanceof InvalidPenaltyParamsError);
    return error.issues;
  }

  assert.fail('Expected the penalty to be rejected.');
};

test('accepted penalties are appended with ledger sequence numbers', () => {
  const { ledger, aggregator, logger } = createLedger();
  const revision = aggregator.getProvisional('1').revision;

  const first = ledger.submitPenalty({
    sessionId: '1',
    competitorId: 'A',
    kind: 'time_adjust',
    params: { deltaMs: 5000 },
    author: 'race-control',
    reason: '  jump start ',
  });
  const second = ledger.submitPenalty({
    sessionId: '1',
    competitorId: 'B',
    kind: 'disqualify',
    author: 'race-control',
  });

  assert.deepEqual(first, {
    id: 'pen-1',
    sequence: 1,
    sessionId: '1',
    competitorId: 'A',
    penalty: { kind: 'time_adjust', deltaMs: 5000 },
    reason: 'jump start',
    author: 'race-control',
    submittedAt,
  });
  assert.equal(second.sequence, 2);
  assert.deepEqual(second.penalty, { kind: 'disqualify' });
  assert.equal(second.reason, null);

  assert.deepEqual(
    ledger.listPenalties('1').map((entry) => entry.id),
    ['pen-1', 'pen-2'],
  );
  assert.equal(aggregator.getProvisional('1').revision, revision);
  assert.deepEqual(logger.events(), ['results.penalty.submitted', 'results.penalty.submitted']);
});

test('unknown penalty kinds are rejected', () => {
  const { ledger } = createLedger();

  const issues = issuesOf(() =>
    ledger.submitPenalty({ sessionId: '1', competitorId: 'A', kind: 'drive_through', author: 'rc' }),
  );

  assert.deepEqual(issues, [{ path: 'kind', message: 'Unknown penalty kind.' }]);
  assert.deepEqual(ledger.listPenalties('1'), []);
});

test('zero and fractional adjustments are rejected', () => {
  const { ledger } = createLedger();

  assert.deepEqual(
    issuesOf(() =>
      ledger.submitPenalty({
        sessionId: '1',
        competitorId: 'A',
        kind: 'position_adjust',
        params: { offset: 0 },
        author: 'rc',
      }),
    ),
    [{ path: 'params.offset', message: 'offset must not be zero.' }],
  );

  assert.deepEqual(
    issuesOf(() =>
      ledger.submitPenalty({
        sessionId: '1',
        competitorId: 'A',
        kind: 'time_adjust',
        params: { deltaMs: 1.5 },
        author: 'rc',
      }),
    ),
    [{ path: 'params.deltaMs', message: 'deltaMs must be an integer.' }],
  );
});

test('an author is required', () => {
  const { ledger } = createLedger();

  assert.deepEqual(
    issuesOf(() =>
      ledger.submitPenalty({ sessionId: '1', competitorId: 'A', kind: 'disqualify', author: '  ' }),
    ),
    [{ path: 'author', message: 'author is required.' }],
  );
});

test('penalties must name a known session, competitor and lap', () => {
  const { ledger } = createLedger();

  assert.throws(
    () => ledger.submitPenalty({ sessionId: '7', competitorId: 'A', kind: 'disqualify', author: 'rc' }),
    UnknownSessionError,
  );
  assert.throws(
    () => ledger.submitPenalty({ sessionId: '1', competitorId: 'Z', kind: 'disqualify', author: 'rc' }),
    UnknownCompetitorError,
  );
  assert.deepEqual(
    issuesOf(() =>
      ledger.submitPenalty({
        sessionId: '1',
        competitorId: 'A',
        kind: 'invalidate_lap',
        params: { lapNumber: 5 },
        author: 'rc',
      }),
    ),
    [{ path: 'params.lapNumber', message: 'Competitor A has no lap 5.' }],
  );

  const accepted = ledger.submitPenalty({
    sessionId: '1',
    competitorId: 'A',
    kind: 'invalidate_lap',
    params: { lapNumber: 2 },
    author: 'rc',
  });
  assert.equal(accepted.sequence, 1);
  assert.equal(ledger.listPenalties('1').length, 1);
});
