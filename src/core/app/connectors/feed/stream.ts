import type { TimingEvent } from '@core/domain';

import { FeedDecoder } from './decoder';

/**
 * Lazily decodes a chunked byte source. When the source finishes, whatever
 * partial packet is left is decoded as the final one.
 */
export async function* decodeFeed(
  source: AsyncIterable<Uint8Array | string>,
  decoder: FeedDecoder = new FeedDecoder(),
): AsyncGenerator<TimingEvent, void, undefined> {
  for await (const chunk of source) {
    yield* decoder.push(chunk);
  }

  yield* decoder.end();
}
