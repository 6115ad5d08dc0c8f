import type { CheckerDescriptor, Id, Inquiry, Policy } from '@tessera/protocol';

/**
 * Storage contract for policies.
 *
 * Storages are the only stateful collaborator of the decision engine. Every
 * operation is asynchronous; implementations may be backed by memory, a
 * database or another storage (see EnfoldCache in the runtime).
 */
export interface Storage {
  /**
   * Store a new policy.
   * @throws PolicyExistsError if a policy with the same uid is stored
   */
  add(policy: Policy): Promise<void>;

  /**
   * Get a policy by uid
   * @returns Policy or null if not found
   */
  get(uid: Id): Promise<Policy | null>;

  /**
   * List policies in a stable order.
   * @throws InvalidPaginationError if limit <= 0 or offset < 0
   */
  getAll(limit: number, offset: number): Promise<Policy[]>;

  /**
   * Candidate policies for an inquiry.
   *
   * A storage MAY pre-filter by what it knows about the checker, but MUST
   * NOT omit a policy the checker would match. Without a checker every
   * policy is a candidate.
   *
   * @throws UnknownCheckerTypeError if the storage pushes filters down and
   * does not know the checker kind
   */
  findForInquiry(inquiry: Inquiry, checker?: CheckerDescriptor): Promise<Policy[]>;

  /**
   * Replace a stored policy with the same uid.
   * @throws PolicyUpdateError if no such policy is stored
   */
  update(policy: Policy): Promise<void>;

  /**
   * Remove a policy. Removing an absent uid is a no-op.
   */
  delete(uid: Id): Promise<void>;
}

/**
 * A mutation that went through a storage.
 */
export type StorageChange = {
  type: 'added' | 'updated' | 'deleted';
  uid: Id;
};

export type StorageChangeListener = (change: StorageChange) => void;
