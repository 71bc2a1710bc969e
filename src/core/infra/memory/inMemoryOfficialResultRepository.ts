import { ResultVersionConflictError, type OfficialResultRepository } from '@core/app';
import type { PublishedResult } from '@core/domain';

/** Process-local result store. Versions live in an array indexed by `version - 1`. */
export class InMemoryOfficialResultRepository implements OfficialResultRepository {
  private readonly results = new Map<string, PublishedResult[]>();

  async latestVersion(sessionId: string): Promise<number> {
    return this.results.get(sessionId)?.length ?? 0;
  }

  async append(result: PublishedResult): Promise<void> {
    const versions = this.results.get(result.sessionId) ?? [];
    const expectedVersion = versions.length + 1;

    if (result.version !== expectedVersion || result.snapshot.version !== result.version) {
      throw new ResultVersionConflictError(result.sessionId, expectedVersion, result.version);
    }

    versions.push(result);
    this.results.set(result.sessionId, versions);
  }

  async get(sessionId: string, version?: number): Promise<PublishedResult | null> {
    const versions = this.results.get(sessionId) ?? [];

    if (version === undefined) {
      return versions.at(-1) ?? null;
    }

    return versions[version - 1] ?? null;
  }

  async listVersions(sessionId: string): Promise<number[]> {
    return (this.results.get(sessionId) ?? []).map((result) => result.version);
  }
}
