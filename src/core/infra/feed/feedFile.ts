import { createReadStream } from 'node:fs';

import { decodeFeed, FeedDecoder } from '@core/app';
import type { TimingEvent } from '@core/domain';

/** Streams a captured feed file through the decoder as if it arrived live. */
export const readFeedFile = (
  filePath: string,
  decoder: FeedDecoder = new FeedDecoder(),
): AsyncGenerator<TimingEvent, void, undefined> =>
  decodeFeed(createReadStream(filePath, { highWaterMark: 16 * 1024 }), decoder);
