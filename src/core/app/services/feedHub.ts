import type { TimingEvent } from '@core/domain';

import { isResultsEngineError } from '../errors/resultsEngineError';
import type { Logger } from '../ports/logger';

export type TimingEventListener = (event: TimingEvent) => void;

export type FeedHubStats = {
  dispatched: number;
  rejected: number;
};

/**
 * Ingest boundary between the decoder and everything that consumes events.
 * A listener that throws is logged and skipped; the other listeners still see
 * the event and the feed keeps flowing.
 */
export class FeedHub {
  private readonly listeners = new Set<TimingEventListener>();

  private readonly counters: FeedHubStats = { dispatched: 0, rejected: 0 };

  constructor(private readonly logger?: Logger) {}

  get stats(): FeedHubStats {
    return { ...this.counters };
  }

  subscribe(listener: TimingEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  dispatch(event: TimingEvent): void {
    this.counters.dispatched += 1;

    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.counters.rejected += 1;
        this.logger?.warn?.('Timing event rejected by listener.', {
          event: 'feed.event.rejected',
          outcome: 'rejected',
          sessionId: event.sessionId,
          eventKind: event.kind,
          code: isResultsEngineError(error) ? error.code : undefined,
          error,
        });
      }
    }
  }
}
