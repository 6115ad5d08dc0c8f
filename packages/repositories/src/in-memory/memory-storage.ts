// In-memory Storage for development and testing
//
// Data does not persist between restarts. Policies are frozen values, so
// they are stored and returned as they are.

import {
  PolicyExistsError,
  PolicyUpdateError,
  isCheckerKind,
  policyTypeForChecker,
} from '@tessera/protocol';
import type { CheckerDescriptor, Id, Inquiry, Policy } from '@tessera/protocol';
import type { Storage } from '../interfaces/index.js';
import { assertValidPage } from '../pagination.js';

export class MemoryStorage implements Storage {
  private policies = new Map<Id, Policy>();

  async add(policy: Policy): Promise<void> {
    if (this.policies.has(policy.uid)) {
      throw new PolicyExistsError(policy.uid);
    }
    this.policies.set(policy.uid, policy);
  }

  async get(uid: Id): Promise<Policy | null> {
    return this.policies.get(uid) ?? null;
  }

  async getAll(limit: number, offset: number): Promise<Policy[]> {
    assertValidPage(limit, offset);
    return Array.from(this.policies.values()).slice(offset, offset + limit);
  }

  /**
   * Candidates are pre-filtered by the policy type the checker can match.
   * Host-defined checkers get every policy.
   */
  async findForInquiry(_inquiry: Inquiry, checker?: CheckerDescriptor): Promise<Policy[]> {
    const all = Array.from(this.policies.values());
    if (!checker || !isCheckerKind(checker.kind)) {
      return all;
    }
    const type = policyTypeForChecker(checker.kind);
    return all.filter((policy) => policy.type === type);
  }

  async update(policy: Policy): Promise<void> {
    if (!this.policies.has(policy.uid)) {
      throw new PolicyUpdateError(policy.uid, 'policy does not exist');
    }
    this.policies.set(policy.uid, policy);
  }

  async delete(uid: Id): Promise<void> {
    this.policies.delete(uid);
  }

  /**
   * Number of stored policies
   */
  get size(): number {
    return this.policies.size;
  }

  /**
   * Clear all data
   */
  clear(): void {
    this.policies.clear();
  }
}

/**
 * Create an in-memory Storage, optionally seeded with policies.
 *
 * @example
 * ```typescript
 * const storage = await createMemoryStorage([
 *   createPolicy({ uid: '1', effect: 'allow', subjects: ['Max'], actions: ['get'] }),
 * ]);
 * ```
 */
export async function createMemoryStorage(policies: Policy[] = []): Promise<MemoryStorage> {
  const storage = new MemoryStorage();
  for (const policy of policies) {
    await storage.add(policy);
  }
  return storage;
}
