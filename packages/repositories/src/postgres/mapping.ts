// Row <-> Policy conversion

import { policyFromDocument, policyToDocument } from '@tessera/protocol';
import type { Policy } from '@tessera/protocol';
import type { PolicyRow } from './schema/index.js';

/**
 * Columns written for a policy. Timestamps are left to the caller.
 */
export function policyToRow(policy: Policy): Omit<PolicyRow, 'createdAt' | 'updatedAt'> {
  const document = policyToDocument(policy);
  return {
    uid: document.uid,
    type: document.type,
    effect: document.effect,
    description: document.description ?? null,
    subjects: document.subjects,
    resources: document.resources,
    actions: document.actions,
    context: document.context,
    startTag: document.startTag,
    endTag: document.endTag,
  };
}

/**
 * Rebuild a policy from its row. The stored documents are validated again.
 *
 * @throws PolicyCreationError if the row holds a malformed document
 */
export function rowToPolicy(row: PolicyRow): Policy {
  return policyFromDocument({
    uid: row.uid,
    description: row.description ?? undefined,
    effect: row.effect,
    type: row.type,
    subjects: row.subjects,
    resources: row.resources,
    actions: row.actions,
    context: row.context,
    startTag: row.startTag,
    endTag: row.endTag,
  });
}
