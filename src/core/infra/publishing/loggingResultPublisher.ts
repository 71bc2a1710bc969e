import type { Logger, ResultPublisher } from '@core/app';
import type { PublishedResult } from '@core/domain';

export class LoggingResultPublisher implements ResultPublisher {
  readonly name = 'log';

  constructor(private readonly logger: Logger) {}

  async publish(result: PublishedResult): Promise<void> {
    const podium = result.snapshot.entries
      .filter((entry) => entry.status === 'classified')
      .slice(0, 3)
      .map((entry) => `P${entry.position} #${entry.carNumber} ${entry.displayName}`);

    this.logger.info('Official result available.', {
      event: 'results.publication.logged',
      outcome: 'success',
      sessionId: result.sessionId,
      version: result.version,
      schemeId: result.points.schemeId,
      entries: result.snapshot.entries.length,
      podium,
    });
  }
}
