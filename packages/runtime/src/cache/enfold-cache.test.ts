// Tests for the EnfoldCache
// Verifies warm-up, read-through fallback and which primary errors are swallowed.

import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  createInquiry,
  createPolicy,
  PolicyDeletionError,
  PolicyExistsError,
  PolicyUpdateError,
} from '@tessera/protocol';
import { MemoryStorage, createMemoryStorage } from '@tessera/repositories';
import { createCapturingLogger } from '../logging/index.js';
import { EnfoldCache } from './enfold-cache.js';

const one = createPolicy({ uid: '1', effect: 'allow', subjects: ['Max'] });
const two = createPolicy({ uid: '2', effect: 'deny', subjects: ['Nina'] });
const three = createPolicy({ uid: '3', effect: 'allow', subjects: ['Ben'] });

describe('EnfoldCache', () => {
  let primary: MemoryStorage;
  let cache: MemoryStorage;
  let storage: EnfoldCache;

  beforeEach(() => {
    primary = new MemoryStorage();
    cache = new MemoryStorage();
    storage = new EnfoldCache(primary, { cache });
  });

  describe('populate', () => {
    it('copies the primary into the cache, advancing by the batch size', async () => {
      primary = await createMemoryStorage([one, two, three]);
      const getAll = vi.spyOn(primary, 'getAll');
      const logger = createCapturingLogger();
      storage = new EnfoldCache(primary, { cache, batchSize: 2, logger });

      expect(await storage.populate()).toBe(3);

      expect(cache.size).toBe(3);
      expect(getAll.mock.calls).toEqual([
        [2, 0],
        [2, 2],
        [2, 4],
      ]);
      expect(logger.entries).toEqual([
        {
          level: 'info',
          message: 'Policy cache populated',
          data: { copied: 3, skipped: 0, batchSize: 2 },
        },
      ]);
    });

    it('skips policies the cache already holds', async () => {
      primary = await createMemoryStorage([one, two]);
      await cache.add(one);
      storage = new EnfoldCache(primary, { cache });

      expect(await storage.populate()).toBe(1);
      expect(cache.size).toBe(2);
    });

    it('uses a memory cache by default', async () => {
      primary = await createMemoryStorage([one]);
      storage = new EnfoldCache(primary);

      await storage.populate();

      expect(storage.cache).toBeInstanceOf(MemoryStorage);
      expect(await storage.cache.get('1')).toBe(one);
    });
  });

  describe('add', () => {
    it('writes to both tiers', async () => {
      await storage.add(one);

      expect(await primary.get('1')).toBe(one);
      expect(await cache.get('1')).toBe(one);
    });

    it('treats a policy already in the primary as synced', async () => {
      await primary.add(one);

      await storage.add(one);

      expect(await cache.get('1')).toBe(one);
    });

    it('propagates other primary errors and leaves the cache alone', async () => {
      vi.spyOn(primary, 'add').mockRejectedValue(new Error('disk full'));

      await expect(storage.add(one)).rejects.toThrow('disk full');
      expect(cache.size).toBe(0);
    });

    it('propagates a duplicate in the cache', async () => {
      await cache.add(one);

      await expect(storage.add(one)).rejects.toThrow(PolicyExistsError);
    });
  });

  describe('reads', () => {
    it('serves the cache without touching the primary', async () => {
      await cache.add(one);
      const get = vi.spyOn(primary, 'get');
      const findForInquiry = vi.spyOn(primary, 'findForInquiry');

      expect(await storage.get('1')).toBe(one);
      expect(await storage.getAll(10, 0)).toEqual([one]);
      expect(await storage.findForInquiry(createInquiry(), { kind: 'exact' })).toEqual([one]);
      expect(get).not.toHaveBeenCalled();
      expect(findForInquiry).not.toHaveBeenCalled();
    });

    it('falls back to the primary when the cache has nothing', async () => {
      await primary.add(two);

      expect(await storage.get('2')).toBe(two);
      expect(await storage.getAll(10, 0)).toEqual([two]);
      expect(await storage.findForInquiry(createInquiry(), { kind: 'exact' })).toEqual([two]);
      expect(await storage.get('missing')).toBeNull();
    });
  });

  describe('update', () => {
    it('writes to both tiers', async () => {
      await storage.add(one);
      const replaced = createPolicy({ uid: '1', effect: 'deny', subjects: ['Max'] });

      await storage.update(replaced);

      expect(await primary.get('1')).toBe(replaced);
      expect(await cache.get('1')).toBe(replaced);
    });

    it('adds a policy the cache does not hold yet', async () => {
      await primary.add(one);
      const replaced = createPolicy({ uid: '1', effect: 'deny', subjects: ['Max'] });

      await storage.update(replaced);

      expect(await cache.get('1')).toBe(replaced);
    });

    it('swallows a primary that does not hold the policy', async () => {
      await cache.add(one);
      const replaced = createPolicy({ uid: '1', effect: 'deny', subjects: ['Max'] });

      await storage.update(replaced);

      expect(await primary.get('1')).toBeNull();
      expect(await cache.get('1')).toBe(replaced);
    });

    it('propagates other primary errors', async () => {
      vi.spyOn(primary, 'update').mockRejectedValue(new Error('connection reset'));

      await expect(storage.update(one)).rejects.toThrow('connection reset');
      expect(cache.size).toBe(0);
    });
  });

  describe('delete', () => {
    it('removes from both tiers', async () => {
      await storage.add(one);

      await storage.delete('1');

      expect(primary.size).toBe(0);
      expect(cache.size).toBe(0);
    });

    it('swallows a primary deletion error', async () => {
      await cache.add(one);
      vi.spyOn(primary, 'delete').mockRejectedValue(new PolicyDeletionError('1', 'locked'));

      await storage.delete('1');

      expect(cache.size).toBe(0);
    });

    it('propagates other primary errors', async () => {
      await cache.add(one);
      vi.spyOn(primary, 'delete').mockRejectedValue(new PolicyUpdateError('1', 'wrong error'));

      await expect(storage.delete('1')).rejects.toThrow(PolicyUpdateError);
      expect(cache.size).toBe(1);
    });
  });
});
