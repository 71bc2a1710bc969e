import type { PublishedResult } from '@core/domain';

/**
 * Outbound collaborator (spreadsheet, file drop, relational store). Receives
 * each official result once per successful publish and must upsert
 * idempotently on `(sessionId, version)`.
 */
export interface ResultPublisher {
  readonly name: string;
  publish(result: PublishedResult): Promise<void>;
}
