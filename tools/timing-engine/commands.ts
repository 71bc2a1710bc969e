/**
 * File: tools/timing-engine/commands.ts
 * Summary: Command implementations behind the timing-engine CLI.
 */

import type { Writable } from 'node:stream';

import type { Logger, ResultsEngine } from '@core/app';
import { formatLapTime, type Classification } from '@core/domain';
import { readFeedFile, type TcpFeedClient } from '@core/infra';

import type { EngineContext } from '../../src/dependencies/engine';

export type CliCommand =
  | { name: 'listen' }
  | { name: 'replay'; file: string; sessionId: string | null; publish: boolean }
  | { name: 'help' };

export const USAGE = [
  'Usage:',
  '  timing-engine listen',
  '  timing-engine replay <feed-file> [sessionId] [--publish]',
].join('\n');

export const parseCliArgs = (args: ReadonlyArray<string>): CliCommand => {
  const [command, ...rest] = args;
  const positional = rest.filter((arg) => !arg.startsWith('--'));

  if (command === 'listen') {
    return { name: 'listen' };
  }

  if (command === 'replay' && positional[0]) {
    return {
      name: 'replay',
      file: positional[0],
      sessionId: positional[1] ?? null,
      publish: rest.includes('--publish'),
    };
  }

  return { name: 'help' };
};

const formatGap = (entry: Classification['entries'][number]) => {
  if (!entry.gap) {
    return '';
  }

  if (entry.gap.lapsBehind > 0) {
    return `+${entry.gap.lapsBehind}L`;
  }

  return entry.gap.timeMs === null ? '' : `+${(entry.gap.timeMs / 1000).toFixed(3)}`;
};

export const formatClassification = (classification: Classification): string => {
  const header = `Session ${classification.sessionId} (${classification.rankingMode}, revision ${classification.revision})`;
  const rows = classification.entries.map((entry) =>
    [
      `P${entry.position}`.padEnd(4),
      `#${entry.carNumber}`.padEnd(6),
      entry.displayName.padEnd(24),
      String(entry.totalLaps).padStart(3),
      (entry.bestLapMs === null ? '-' : formatLapTime(entry.bestLapMs)).padStart(10),
      formatGap(entry).padStart(9),
    ]
      .join(' ')
      .trimEnd(),
  );

  return [header, ...rows].join('\n');
};

export type ReplayResult = {
  events: number;
  sessions: string[];
  published: { sessionId: string; version: number }[];
};

export const runReplay = async (
  command: { file: string; sessionId: string | null; publish: boolean },
  context: EngineContext,
  output: Writable,
  logger: Logger,
): Promise<ReplayResult> => {
  const { engine } = context;
  let events = 0;

  for await (const event of readFeedFile(command.file, context.createDecoder())) {
    engine.ingest(event);
    events += 1;
  }

  const sessions = command.sessionId
    ? [engine.getSession(command.sessionId).id]
    : engine.listSessions().map((session) => session.id);

  for (const sessionId of sessions) {
    output.write(`${formatClassification(engine.getProvisional(sessionId))}\n\n`);
  }

  const published = command.publish ? await publishSessions(engine, sessions, logger) : [];

  logger.info('Feed replay completed.', {
    event: 'tools.timing_engine.replay.complete',
    outcome: 'success',
    file: command.file,
    events,
    sessions: sessions.length,
    published: published.length,
  });

  return { events, sessions, published };
};

const publishSessions = async (engine: ResultsEngine, sessionIds: string[], logger: Logger) => {
  const published: { sessionId: string; version: number }[] = [];

  for (const sessionId of sessionIds) {
    if (engine.getProvisional(sessionId).entries.every((entry) => entry.totalLaps === 0)) {
      logger.info('Skipping publish for session without laps.', {
        event: 'tools.timing_engine.replay.publish_skipped',
        outcome: 'skipped',
        sessionId,
      });
      continue;
    }

    const result = await engine.publishOfficial(sessionId);
    published.push({ sessionId, version: result.version });
  }

  await engine.dispatcher.drain();
  return published;
};

/** Runs until `signal` aborts, then stops the client and waits for pending publications. */
export const runListen = async (
  client: TcpFeedClient,
  engine: ResultsEngine,
  signal: AbortSignal,
  logger: Logger,
): Promise<void> => {
  client.start();

  await new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener('abort', () => resolve(), { once: true });
  });

  await client.stop();
  await engine.dispatcher.drain();

  logger.info('Timing feed listener stopped.', {
    event: 'tools.timing_engine.listen.stopped',
    outcome: 'success',
    decoder: client.decoderStats,
    hub: engine.hub.stats,
    publications: engine.dispatcher.stats,
  });
};
