// GuardCache - memoizes candidate retrieval per (inquiry, checker)

import { LRUCache } from 'lru-cache';
import { inquiryKey } from '@tessera/protocol';
import type { CheckerDescriptor, Inquiry, Policy } from '@tessera/protocol';
import type { Storage } from '@tessera/repositories';

export const DEFAULT_GUARD_CACHE_SIZE = 1024;

export type GuardCacheOptions = {
  /**
   * Maximum number of memoized lookups (default 1024)
   */
  maxSize?: number;
};

/**
 * Memoizes `findForInquiry` results of a storage, keyed by the inquiry
 * content and the checker kind.
 *
 * The cache does not observe the storage. Its owner marks it stale when the
 * policy set changes and fresh once the change has settled:
 * - while stale, every lookup goes to the storage; results are retained
 * - while fresh, retained results are served without a storage query
 * - marking the cache stale drops what it retained before
 *
 * A new cache starts stale.
 *
 * @example
 * ```typescript
 * const inner = new MemoryStorage();
 * const cache = new GuardCache(inner);
 * const storage = withChangeNotifications(inner, () => cache.invalidate());
 * cache.markFresh();
 * const guard = new Guard(storage, checker, { cache });
 * ```
 */
export class GuardCache {
  private entries: LRUCache<string, readonly Policy[]>;
  private stale = true;

  // Bumped whenever entries are dropped. A lookup started before the bump
  // must not retain its (possibly outdated) result.
  private generation = 0;

  constructor(
    private storage: Storage,
    options: GuardCacheOptions = {}
  ) {
    this.entries = new LRUCache({ max: options.maxSize ?? DEFAULT_GUARD_CACHE_SIZE });
  }

  get isStale(): boolean {
    return this.stale;
  }

  /**
   * Number of retained lookups
   */
  get size(): number {
    return this.entries.size;
  }

  /**
   * Stop serving memoized results and drop them.
   *
   * Entries memoized before the cache went stale describe the policy set
   * as it was before the change, so they are not served again after
   * markFresh(). Only lookups made from the stale point on are retained.
   */
  markStale(): void {
    this.stale = true;
    this.invalidate();
  }

  /**
   * Serve memoized results again.
   */
  markFresh(): void {
    this.stale = false;
  }

  /**
   * Drop memoized results without changing the stale flag.
   */
  invalidate(): void {
    this.entries.clear();
    this.generation++;
  }

  async findForInquiry(inquiry: Inquiry, checker: CheckerDescriptor): Promise<Policy[]> {
    const key = cacheKey(inquiry, checker);
    if (key === undefined) {
      return this.storage.findForInquiry(inquiry, checker);
    }

    if (!this.stale) {
      const hit = this.entries.get(key);
      if (hit) return [...hit];
    }

    const generation = this.generation;
    const policies = await this.storage.findForInquiry(inquiry, checker);
    if (generation === this.generation) {
      this.entries.set(key, Object.freeze([...policies]));
    }
    return policies;
  }
}

function cacheKey(inquiry: Inquiry, checker: CheckerDescriptor): string | undefined {
  const key = inquiryKey(inquiry);
  return key === undefined ? undefined : `${checker.kind}\u0000${key}`;
}
