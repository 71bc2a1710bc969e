import { mkdir, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { ResultPublisher } from '@core/app';
import type { PublishedResult } from '@core/domain';

const toSafeSegment = (value: string) => encodeURIComponent(value).replace(/\./g, '%2E');

export const resultFilePath = (directory: string, sessionId: string, version: number) =>
  join(directory, toSafeSegment(sessionId), `v${version}.json`);

/**
 * Drops each official result as `<dir>/<session>/v<version>.json`. The file
 * is written beside its target and renamed into place, so publishing the same
 * version twice leaves one complete file.
 */
export class JsonFileResultPublisher implements ResultPublisher {
  readonly name = 'json-file';

  constructor(private readonly directory: string) {}

  async publish(result: PublishedResult): Promise<void> {
    const target = resultFilePath(this.directory, result.sessionId, result.version);
    const temporary = `${target}.${process.pid}.tmp`;

    await mkdir(join(this.directory, toSafeSegment(result.sessionId)), { recursive: true });
    await writeFile(temporary, `${JSON.stringify(result, null, 2)}\n`, 'utf8');
    await rename(temporary, target);
  }
}
