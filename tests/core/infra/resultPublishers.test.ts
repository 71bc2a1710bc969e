import assert from 'node:assert/strict';
import { mkdtemp, readdir, readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import test from 'node:test';

import { ResultVersionConflictError } from '../../../src/core/app';
import {
  InMemoryOfficialResultRepository,
  JsonFileResultPublisher,
  LoggingResultPublisher,
  resultFilePath,
} from '../../../src/core/infra';
import {
  createTestEngine,
  InMemoryLogger,
  lapEvent,
  registerEvent,
  sessionEvent,
} from '../__fixtures__/resultsFixtures';

const publishHeat = async (sessionId: string) => {
  const { engine } = createTestEngine();
  engine.ingest(sessionEvent(sessionId, 'idle', 'Heat 1'));
  for (const [index, competitorId] of ['7', '3', '11', '5'].entries()) {
    engine.ingest(registerEvent(sessionId, competitorId));
    engine.ingest(lapEvent(sessionId, competitorId, 1, 60_000 + index * 500));
  }
  engine.submitPenalty({ sessionId, competitorId: '3', kind: 'disqualify', author: 'race-control' });
  return engine.publishOfficial(sessionId);
};

test('result paths escape the session id', () => {
  assert.equal(resultFilePath('out', 'heat.1', 2), join('out', 'heat%2E1', 'v2.json'));
  assert.equal(resultFilePath('out', 'a/b', 1), join('out', 'a%2Fb', 'v1.json'));
});

test('the file publisher writes one file per version and overwrites repeats', async () => {
  const directory = await mkdtemp(join(tmpdir(), 'published-'));
  const publisher = new JsonFileResultPublisher(directory);
  const result = await publishHeat('heat.1');

  await publisher.publish(result);
  await publisher.publish(result);

  assert.deepEqual(await readdir(join(directory, 'heat%2E1')), ['v1.json']);

  const stored: unknown = JSON.parse(await readFile(resultFilePath(directory, 'heat.1', 1), 'utf8'));
  assert.deepEqual(stored, JSON.parse(JSON.stringify(result)));
});

test('the logging publisher reports the classified podium', async () => {
  const logger = new InMemoryLogger();
  const result = await publishHeat('4');

  await new LoggingResultPublisher(logger).publish(result);

  assert.equal(logger.entries.length, 1);
  assert.deepEqual(logger.entries[0]?.context?.podium, [
    'P1 #7 Driver 7',
    'P2 #11 Driver 11',
    'P3 #5 Driver 5',
  ]);
  assert.equal(logger.entries[0]?.context?.schemeId, 'test-six');
});

test('the repository only accepts the next version', async () => {
  const repository = new InMemoryOfficialResultRepository();
  const result = await publishHeat('4');

  await repository.append(result);
  await assert.rejects(
    repository.append(result),
    (error: unknown) =>
      error instanceof ResultVersionConflictError && error.expectedVersion === 2 && error.receivedVersion === 1,
  );

  assert.equal(await repository.latestVersion('4'), 1);
  assert.equal(await repository.get('4', 1), result);
  assert.equal(await repository.get('4', 2), null);
  assert.equal(await repository.get('other'), null);
  assert.deepEqual(await repository.listVersions('4'), [1]);
});
