import type { PublishedResult } from '@core/domain';

/**
 * Durable home of official snapshots and the points computed from them.
 * Implementations must reject an append whose version is not exactly the
 * latest version plus one.
 */
export interface OfficialResultRepository {
  /** Latest official version for the session, or 0 when none exists. */
  latestVersion(sessionId: string): Promise<number>;
  append(result: PublishedResult): Promise<void>;
  /** Latest result when `version` is omitted. */
  get(sessionId: string, version?: number): Promise<PublishedResult | null>;
  listVersions(sessionId: string): Promise<number[]>;
}
