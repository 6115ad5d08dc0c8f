// Rules checker - matches rule-based policies against structured inquiries

import { isFieldMap, satisfied } from '@tessera/protocol';
import type { Inquiry, InquiryField, Policy, RuleCondition } from '@tessera/protocol';
import { contextFits, type Checker } from './checker.js';

function conditionFits(condition: RuleCondition, value: InquiryField, inquiry: Inquiry): boolean {
  if (isFieldMap(condition)) {
    // field maps only match structured values
    if (typeof value === 'string') return false;
    return Object.entries(condition).every(
      ([key, rule]) => Object.hasOwn(value, key) && satisfied(rule, value[key], inquiry)
    );
  }
  // a bare rule is checked against the whole field
  return satisfied(condition, value, inquiry);
}

function fieldFits(
  conditions: readonly RuleCondition[],
  value: InquiryField,
  inquiry: Inquiry
): boolean {
  return conditions.some((condition) => conditionFits(condition, value, inquiry));
}

/**
 * Checker for rule-based policies.
 *
 * For each of subject, resource and action, at least one condition must
 * hold: a field map holds when every rule is satisfied by the inquiry
 * field's value at the same key (a missing key fails), a bare rule when it
 * is satisfied by the field value itself. Context rules are checked as in
 * the string checkers.
 *
 * @example
 * ```typescript
 * const policy = createPolicy({
 *   uid: '1',
 *   effect: 'allow',
 *   subjects: [{ name: eq('Max'), role: inList('admin', 'editor') }],
 *   resources: [{ id: regexMatch('\\d+') }],
 *   actions: [{ method: eq('get') }],
 * });
 * new RulesChecker().fits(policy, createInquiry({
 *   subject: { name: 'Max', role: 'admin' },
 *   resource: { id: '42' },
 *   action: { method: 'get' },
 * })); // true
 * ```
 */
export class RulesChecker implements Checker {
  readonly kind = 'rules';

  fits(policy: Policy, inquiry: Inquiry): boolean {
    if (policy.type !== 'rule') return false;

    return (
      fieldFits(policy.subjects, inquiry.subject, inquiry) &&
      fieldFits(policy.resources, inquiry.resource, inquiry) &&
      fieldFits(policy.actions, inquiry.action, inquiry) &&
      contextFits(policy.context, inquiry)
    );
  }
}
