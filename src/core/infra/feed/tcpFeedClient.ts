/**
 * File: src/core/infra/feed/tcpFeedClient.ts
 * Summary: TCP transport for the timing feed with idle detection and backoff reconnects.
 */

import { once } from 'node:events';
import { createConnection, type Socket } from 'node:net';

import { FeedDecoder, type FeedDecoderStats, type Logger } from '@core/app';
import type { TimingEvent } from '@core/domain';

import { FeedConnectionError, type FeedConnectionFailure } from './feedConnectionError';

export type FeedClientStatus = 'idle' | 'connecting' | 'connected' | 'reconnect_needed' | 'stopped';

export type TcpFeedClientOptions = {
  host: string;
  port: number;
  onEvent: (event: TimingEvent) => void;
  onStatus?: (status: FeedClientStatus, error?: FeedConnectionError) => void;
  decoder?: FeedDecoder;
  logger?: Logger;
  connectTimeoutMs?: number;
  /** Silence longer than this counts as a lost connection. */
  idleTimeoutMs?: number;
  autoReconnect?: boolean;
  initialBackoffMs?: number;
  maxBackoffMs?: number;
};

const DEFAULT_CONNECT_TIMEOUT_MS = 5_000;
const DEFAULT_IDLE_TIMEOUT_MS = 5_000;
const DEFAULT_INITIAL_BACKOFF_MS = 1_000;
const DEFAULT_MAX_BACKOFF_MS = 10_000;

/**
 * Packets sent while the connection is down are not recovered; after a
 * reconnect the decoder resumes with the next complete packet.
 */
export class TcpFeedClient {
  private socket: Socket | null = null;

  private connectTimer: NodeJS.Timeout | null = null;

  private reconnectTimer: NodeJS.Timeout | null = null;

  private backoffMs: number;

  private currentStatus: FeedClientStatus = 'idle';

  private readonly decoder: FeedDecoder;

  private readonly endpoint: string;

  constructor(private readonly options: TcpFeedClientOptions) {
    this.decoder = options.decoder ?? new FeedDecoder();
    this.endpoint = `${options.host}:${options.port}`;
    this.backoffMs = options.initialBackoffMs ?? DEFAULT_INITIAL_BACKOFF_MS;
  }

  get status(): FeedClientStatus {
    return this.currentStatus;
  }

  get decoderStats(): FeedDecoderStats {
    return this.decoder.stats;
  }

  /** Connects, or reconnects after `reconnect_needed`. No-op while connecting or connected. */
  start(): void {
    if (this.currentStatus === 'connecting' || this.currentStatus === 'connected') {
      return;
    }

    this.clearReconnectTimer();
    this.connect();
  }

  async stop(): Promise<void> {
    this.clearReconnectTimer();
    this.clearConnectTimer();
    this.setStatus('stopped');

    const socket = this.socket;
    this.socket = null;

    if (socket && !socket.closed) {
      const closed = once(socket, 'close');
      socket.destroy();
      await closed;
    }
  }

  private connect() {
    this.setStatus('connecting');
    const socket = createConnection({ host: this.options.host, port: this.options.port });
    this.socket = socket;

    this.connectTimer = setTimeout(() => {
      this.fail(socket, 'connect_timeout');
    }, this.options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS);

    socket.once('connect', () => {
      if (this.socket !== socket) {
        return;
      }

      this.clearConnectTimer();
      this.backoffMs = this.options.initialBackoffMs ?? DEFAULT_INITIAL_BACKOFF_MS;
      socket.setTimeout(this.options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS);
      this.setStatus('connected');

      this.options.logger?.info?.('Timing feed connected.', {
        event: 'feed.connection.established',
        outcome: 'success',
        endpoint: this.endpoint,
      });
    });

    socket.on('data', (chunk: Buffer) => {
      if (this.socket !== socket) {
        return;
      }

      for (const event of this.decoder.push(chunk)) {
        this.options.onEvent(event);
      }
    });

    socket.on('timeout', () => this.fail(socket, 'idle_timeout'));
    socket.on('error', (error) => this.fail(socket, 'socket_error', error));
    socket.on('close', () => this.fail(socket, 'closed'));
  }

  private fail(socket: Socket, failure: FeedConnectionFailure, cause?: unknown) {
    if (this.socket !== socket || this.currentStatus === 'stopped') {
      return;
    }

    this.socket = null;
    this.clearConnectTimer();
    socket.destroy();

    const droppedBytes = this.decoder.reset();
    const error = new FeedConnectionError(failure, this.endpoint, { cause });
    const autoReconnect = this.options.autoReconnect ?? true;

    this.options.logger?.warn?.('Timing feed connection lost.', {
      event: 'feed.connection.lost',
      outcome: 'failure',
      endpoint: this.endpoint,
      failure,
      droppedBytes,
      retryInMs: autoReconnect ? this.backoffMs : undefined,
      error: cause,
    });

    this.setStatus('reconnect_needed', error);

    if (autoReconnect) {
      this.scheduleReconnect();
    }
  }

  private scheduleReconnect() {
    const delayMs = this.backoffMs;
    this.backoffMs = Math.min(this.backoffMs * 2, this.options.maxBackoffMs ?? DEFAULT_MAX_BACKOFF_MS);

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.currentStatus === 'reconnect_needed') {
        this.connect();
      }
    }, delayMs);
  }

  private setStatus(status: FeedClientStatus, error?: FeedConnectionError) {
    this.currentStatus = status;
    this.options.onStatus?.(status, error);
  }

  private clearConnectTimer() {
    if (this.connectTimer) {
      clearTimeout(this.connectTimer);
      this.connectTimer = null;
    }
  }

  private clearReconnectTimer() {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }
}
