// Filter push-down for candidate retrieval

import { policyTypeForChecker } from '@tessera/protocol';
import type { CheckerDescriptor, Inquiry, PolicyType } from '@tessera/protocol';

/**
 * What a database may filter on before the checker runs.
 *
 * - type: only policies of this type can match
 * - contains: each condition list must contain the inquiry value verbatim
 */
export type InquiryFilter = {
  type?: PolicyType;
  contains?: {
    subjects: string;
    resources: string;
    actions: string;
  };
};

/**
 * Derive the push-down filter for an inquiry and checker.
 *
 * Only the exact checker can be narrowed beyond the policy type: an exact
 * match needs the inquiry value to be one of the stored patterns. Fuzzy and
 * regex patterns can match values they do not contain, so they filter by
 * type alone.
 *
 * @throws UnknownCheckerTypeError for a checker kind outside the built-ins
 */
export function createInquiryFilter(
  inquiry: Inquiry,
  checker?: CheckerDescriptor
): InquiryFilter {
  if (!checker) return {};

  const type = policyTypeForChecker(checker.kind);
  if (checker.kind !== 'exact') return { type };

  const { subject, resource, action } = inquiry;
  if (typeof subject !== 'string' || typeof resource !== 'string' || typeof action !== 'string') {
    return { type };
  }

  return {
    type,
    contains: { subjects: subject, resources: resource, actions: action },
  };
}
