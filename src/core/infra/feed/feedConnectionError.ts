export type FeedConnectionFailure = 'connect_timeout' | 'idle_timeout' | 'closed' | 'socket_error';

export class FeedConnectionError extends Error {
  constructor(
    readonly failure: FeedConnectionFailure,
    readonly endpoint: string,
    options?: { cause?: unknown },
  ) {
    super(`Timing feed ${endpoint} lost: ${failure.replace('_', ' ')}.`, options);
    this.name = 'FeedConnectionError';
  }
}
