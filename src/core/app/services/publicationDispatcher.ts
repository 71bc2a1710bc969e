import type { PublishedResult } from '@core/domain';

import type { Logger } from '../ports/logger';
import type { ResultPublisher } from '../ports/resultPublisher';

export type PublicationStats = {
  delivered: number;
  failed: number;
};

/**
 * Hands committed official results to outbound publishers without holding up
 * the caller. A failed delivery is logged and counted; it never undoes the
 * commit and is not retried here.
 */
export class PublicationDispatcher {
  private readonly pending = new Set<Promise<void>>();

  private readonly counters: PublicationStats = { delivered: 0, failed: 0 };

  constructor(
    private readonly publishers: ReadonlyArray<ResultPublisher>,
    private readonly logger?: Logger,
  ) {}

  get stats(): PublicationStats {
    return { ...this.counters };
  }

  dispatch(result: PublishedResult): void {
    for (const publisher of this.publishers) {
      const delivery = this.deliver(publisher, result);
      this.pending.add(delivery);
      void delivery.then(() => {
        this.pending.delete(delivery);
      });
    }
  }

  /** Resolves once every delivery started so far has settled. */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  private async deliver(publisher: ResultPublisher, result: PublishedResult): Promise<void> {
    const startedAt = Date.now();

    try {
      await publisher.publish(result);
      this.counters.delivered += 1;
      this.logger?.info?.('Official result delivered.', {
        event: 'results.publication.delivered',
        outcome: 'success',
        sessionId: result.sessionId,
        version: result.version,
        publisher: publisher.name,
        durationMs: Date.now() - startedAt,
      });
    } catch (error) {
      this.counters.failed += 1;
      this.logger?.error?.('Official result delivery failed.', {
        event: 'results.publication.failed',
        outcome: 'failure',
        sessionId: result.sessionId,
        version: result.version,
        publisher: publisher.name,
        durationMs: Date.now() - startedAt,
        error,
      });
    }
  }
}
