// Checker contract and the context check shared by every checker

import { satisfied } from '@tessera/protocol';
import type { CheckerDescriptor, Inquiry, Policy } from '@tessera/protocol';

/**
 * A Checker decides whether a policy matches an inquiry.
 *
 * Checkers are pure: they read the policy and the inquiry and nothing else
 * (the pattern compiler cache aside). A checker returns false for policies
 * of the other family rather than throwing.
 */
export interface Checker extends CheckerDescriptor {
  fits(policy: Policy, inquiry: Inquiry): boolean;
}

/**
 * Check every context rule of a policy against the inquiry context.
 * A rule whose name is missing from the inquiry context fails.
 */
export function contextFits(context: Policy['context'], inquiry: Inquiry): boolean {
  return Object.entries(context).every(
    ([name, rule]) =>
      Object.hasOwn(inquiry.context, name) && satisfied(rule, inquiry.context[name], inquiry)
  );
}
