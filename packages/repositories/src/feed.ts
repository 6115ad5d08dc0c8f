// Policy feed - lazy iteration over every stored policy

import type { Policy } from '@tessera/protocol';
import type { Storage } from './interfaces/index.js';

export const DEFAULT_FEED_BATCH_SIZE = 10000;

/**
 * Page through a storage in fixed-size batches.
 *
 * The feed is lazy: each page is fetched when the previous one has been
 * consumed. It ends on the first empty page. Calling it again starts over
 * from the first page.
 *
 * @example
 * ```typescript
 * for await (const policy of feedPolicies(storage, 500)) {
 *   await cache.add(policy);
 * }
 * ```
 *
 * @throws InvalidPaginationError if batchSize is not positive
 */
export async function* feedPolicies(
  storage: Storage,
  batchSize = DEFAULT_FEED_BATCH_SIZE
): AsyncGenerator<Policy, void, undefined> {
  let offset = 0;
  for (;;) {
    const page = await storage.getAll(batchSize, offset);
    if (page.length === 0) return;
    yield* page;
    offset += batchSize;
  }
}
