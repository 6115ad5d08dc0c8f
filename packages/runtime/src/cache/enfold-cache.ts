// EnfoldCache - a storage in front of another storage
//
// Reads go to the cache storage first and fall back to the primary when the
// cache has nothing. Writes go to the primary, then to the cache. The two
// writes are not transactional; the read fallback covers a cache that
// missed a write.

import {
  PolicyCreationError,
  PolicyDeletionError,
  PolicyExistsError,
  PolicyNotFoundError,
  PolicyUpdateError,
} from '@tessera/protocol';
import type { CheckerDescriptor, Id, Inquiry, Policy } from '@tessera/protocol';
import { DEFAULT_FEED_BATCH_SIZE, MemoryStorage, feedPolicies } from '@tessera/repositories';
import type { Storage } from '@tessera/repositories';
import { silentLogger, type Logger } from '../logging/index.js';

export type EnfoldCacheOptions = {
  /**
   * The fast storage. Defaults to a MemoryStorage.
   */
  cache?: Storage;

  /**
   * Page size used by populate() (default 10000)
   */
  batchSize?: number;

  logger?: Logger;
};

function isAny(error: unknown, types: ReadonlyArray<new (...args: never[]) => Error>): boolean {
  return types.some((type) => error instanceof type);
}

/**
 * Two-tier storage: a primary storage with a cache storage in front.
 *
 * @example
 * ```typescript
 * const storage = new EnfoldCache(new PgStorage(db));
 * await storage.populate();
 * const guard = new Guard(storage, new RulesChecker());
 * ```
 */
export class EnfoldCache implements Storage {
  readonly primary: Storage;
  readonly cache: Storage;
  private batchSize: number;
  private logger: Logger;

  constructor(primary: Storage, options: EnfoldCacheOptions = {}) {
    this.primary = primary;
    this.cache = options.cache ?? new MemoryStorage();
    this.batchSize = options.batchSize ?? DEFAULT_FEED_BATCH_SIZE;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Copy every policy of the primary storage into the cache.
   * Policies the cache already holds are skipped.
   *
   * @returns The number of policies copied
   */
  async populate(): Promise<number> {
    let copied = 0;
    let skipped = 0;

    for await (const policy of feedPolicies(this.primary, this.batchSize)) {
      try {
        await this.cache.add(policy);
        copied++;
      } catch (error) {
        if (!(error instanceof PolicyExistsError)) throw error;
        skipped++;
      }
    }

    this.logger.info('Policy cache populated', { copied, skipped, batchSize: this.batchSize });
    return copied;
  }

  async add(policy: Policy): Promise<void> {
    try {
      await this.primary.add(policy);
    } catch (error) {
      if (!(error instanceof PolicyExistsError)) throw error;
      this.logger.debug('Policy already stored in primary', { uid: policy.uid });
    }
    await this.cache.add(policy);
  }

  async get(uid: Id): Promise<Policy | null> {
    const cached = await this.cache.get(uid);
    if (cached) return cached;
    return this.primary.get(uid);
  }

  async getAll(limit: number, offset: number): Promise<Policy[]> {
    const cached = await this.cache.getAll(limit, offset);
    if (cached.length > 0) return cached;
    return this.primary.getAll(limit, offset);
  }

  async findForInquiry(inquiry: Inquiry, checker?: CheckerDescriptor): Promise<Policy[]> {
    const cached = await this.cache.findForInquiry(inquiry, checker);
    if (cached.length > 0) return cached;
    return this.primary.findForInquiry(inquiry, checker);
  }

  /**
   * Update both tiers. A policy the cache does not hold yet is added to it.
   */
  async update(policy: Policy): Promise<void> {
    try {
      await this.primary.update(policy);
    } catch (error) {
      if (!isAny(error, [PolicyNotFoundError, PolicyUpdateError, PolicyCreationError])) {
        throw error;
      }
      this.logger.debug('Primary update skipped', { uid: policy.uid, error: String(error) });
    }

    if (await this.cache.get(policy.uid)) {
      await this.cache.update(policy);
    } else {
      await this.cache.add(policy);
    }
  }

  async delete(uid: Id): Promise<void> {
    try {
      await this.primary.delete(uid);
    } catch (error) {
      if (!isAny(error, [PolicyNotFoundError, PolicyDeletionError])) throw error;
      this.logger.debug('Primary delete skipped', { uid, error: String(error) });
    }
    await this.cache.delete(uid);
  }
}
