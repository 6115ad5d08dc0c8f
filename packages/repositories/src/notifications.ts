// Change notifications - report successful mutations of a storage

import type { CheckerDescriptor, Id, Inquiry, Policy } from '@tessera/protocol';
import type { Storage, StorageChangeListener } from './interfaces/index.js';

/**
 * Wrap a storage so that every successful add, update and delete is
 * reported to a listener. Failed mutations are not reported.
 *
 * @example
 * ```typescript
 * const storage = withChangeNotifications(new MemoryStorage(), () => guardCache.markStale());
 * ```
 */
export function withChangeNotifications(
  storage: Storage,
  onChange: StorageChangeListener
): Storage {
  return {
    async add(policy: Policy): Promise<void> {
      await storage.add(policy);
      onChange({ type: 'added', uid: policy.uid });
    },

    get(uid: Id): Promise<Policy | null> {
      return storage.get(uid);
    },

    getAll(limit: number, offset: number): Promise<Policy[]> {
      return storage.getAll(limit, offset);
    },

    findForInquiry(inquiry: Inquiry, checker?: CheckerDescriptor): Promise<Policy[]> {
      return storage.findForInquiry(inquiry, checker);
    },

    async update(policy: Policy): Promise<void> {
      await storage.update(policy);
      onChange({ type: 'updated', uid: policy.uid });
    },

    async delete(uid: Id): Promise<void> {
      await storage.delete(uid);
      onChange({ type: 'deleted', uid });
    },
  };
}
