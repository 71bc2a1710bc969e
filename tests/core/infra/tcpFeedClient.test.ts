/**
 * Filename: tests/core/infra/tcpFeedClient.test.ts
 * Purpose: Drive the TCP feed client against an in-process server.
 */

import assert from 'node:assert/strict';
import { once } from 'node:events';
import { createServer, type Server, type Socket } from 'node:net';
import test from 'node:test';

import type { TimingEvent } from '../../../src/core/domain';
import {
  TcpFeedClient,
  type FeedClientStatus,
  type FeedConnectionError,
} from '../../../src/core/infra';

type StatusChange = { status: FeedClientStatus; failure: string | null };

/** Collects values and resolves waiters once a predicate holds. */
class Recorder<T> {
  readonly values: T[] = [];

  private waiters: Array<{ predicate: (values: T[]) => boolean; resolve: () => void }> = [];

  push = (value: T) => {
    this.values.push(value);
    this.waiters = this.waiters.filter((waiter) => {
      if (waiter.predicate(this.values)) {
        waiter.resolve();
        return false;
      }
      return true;
    });
  };

  until(predicate: (values: T[]) => boolean): Promise<void> {
    if (predicate(this.values)) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.waiters.push({ predicate, resolve });
    });
  }
}

const listen = async (onConnection: (socket: Socket, count: number) => void) => {
  let count = 0;
  const sockets = new Set<Socket>();
  const server = createServer((socket) => {
    count += 1;
    sockets.add(socket);
    socket.on('close', () => sockets.delete(socket));
    onConnection(socket, count);
  });

  server.listen(0, '127.0.0.1');
  await once(server, 'listening');

  const address = server.address();
  assert.ok(address !== null && typeof address === 'object');

  const close = async () => {
    for (const socket of sockets) {
      socket.destroy();
    }
    server.close();
    await once(server, 'close');
  };

  return { server, port: address.port, close };
};

const statusRecorder = () => {
  const recorder = new Recorder<StatusChange>();
  const onStatus = (status: FeedClientStatus, error?: FeedConnectionError) =>
    recorder.push({ status, failure: error?.failure ?? null });
  return { recorder, onStatus };
};

const closeServer = async (server: Server) => {
  server.close();
  await once(server, 'close');
};

test('decodes packets split across TCP chunks', async () => {
  const feed = await listen((socket) => {
    socket.write('$B,5,"Heat 1"\n$A,"7","7",123,');
    setTimeout(() => socket.write('"Ann","Lee"\n$J,"7","00:01:00.500","00:01:00.500"\n'), 20);
  });
  const events = new Recorder<TimingEvent>();
  const { recorder, onStatus } = statusRecorder();
  const client = new TcpFeedClient({
    host: '127.0.0.1',
    port: feed.port,
    onEvent: events.push,
    onStatus,
    autoReconnect: false,
  });

  client.start();
  await events.until((values) => values.length === 3);
  await client.stop();
  await feed.close();

  assert.deepEqual(
    events.values.map((event) => event.kind),
    ['session_state_changed', 'competitor_registered', 'lap_completed'],
  );
  assert.deepEqual(events.values[2], {
    kind: 'lap_completed',
    sessionId: '5',
    competitorId: '7',
    lapNumber: 1,
    lapTimeMs: 60_500,
    elapsedMs: 60_500,
  });
  assert.deepEqual(
    recorder.values.map((change) => change.status),
    ['connecting', 'connected', 'stopped'],
  );
  assert.equal(client.decoderStats.events, 3);
});

test('silence longer than the idle timeout drops the connection', async () => {
  const feed = await listen(() => undefined);
  const { recorder, onStatus } = statusRecorder();
  const client = new TcpFeedClient({
    host: '127.0.0.1',
    port: feed.port,
    onEvent: () => undefined,
    onStatus,
    idleTimeoutMs: 100,
    autoReconnect: false,
  });

  client.start();
  await recorder.until((values) => values.some((change) => change.status === 'reconnect_needed'));

  assert.deepEqual(recorder.values, [
    { status: 'connecting', failure: null },
    { status: 'connected', failure: null },
    { status: 'reconnect_needed', failure: 'idle_timeout' },
  ]);
  assert.equal(client.status, 'reconnect_needed');

  await client.stop();
  await feed.close();
});

test('reconnects after the server closes the connection', async () => {
  const feed = await listen((socket, count) => {
    if (count === 1) {
      socket.end('$B,1,"Practice"\n$A,"4","4",0,"Kim","Park"\n$J,"4","00:00:58.000","00:00:58.000"\n$J,"4","00:00:5');
    } else {
      socket.write('$J,"4","00:00:57.000","00:01:55.000"\n');
    }
  });
  const events = new Recorder<TimingEvent>();
  const { recorder, onStatus } = statusRecorder();
  const client = new TcpFeedClient({
    host: '127.0.0.1',
    port: feed.port,
    onEvent: events.push,
    onStatus,
    initialBackoffMs: 20,
  });

  client.start();
  await events.until((values) => values.length === 4);
  await client.stop();
  await feed.close();

  assert.deepEqual(
    recorder.values.map((change) => change.status),
    ['connecting', 'connected', 'reconnect_needed', 'connecting', 'connected', 'stopped'],
  );
  assert.equal(recorder.values[2]?.failure, 'closed');
  assert.deepEqual(events.values[3], {
    kind: 'lap_completed',
    sessionId: '1',
    competitorId: '4',
    lapNumber: 2,
    lapTimeMs: 57_000,
    elapsedMs: 115_000,
  });
});

test('a refused connection is reported without retrying when reconnects are off', async () => {
  const unused = createServer();
  unused.listen(0, '127.0.0.1');
  await once(unused, 'listening');
  const address = unused.address();
  assert.ok(address !== null && typeof address === 'object');
  await closeServer(unused);

  const { recorder, onStatus } = statusRecorder();
  const client = new TcpFeedClient({
    host: '127.0.0.1',
    port: address.port,
    onEvent: () => undefined,
    onStatus,
    autoReconnect: false,
  });

  client.start();
  await recorder.until((values) => values.some((change) => change.status === 'reconnect_needed'));
  await client.stop();

  assert.deepEqual(recorder.values.slice(0, 2), [
    { status: 'connecting', failure: null },
    { status: 'reconnect_needed', failure: 'socket_error' },
  ]);
});
