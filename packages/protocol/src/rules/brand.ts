// Rule identity - tells rule documents apart from look-alike literals
//
// A literal such as `{ type: 'any' }` is shaped like a rule. Only objects
// built by the rule factories or accepted by the rule schema count as rules.

import type { Rule } from '../types/rules.js';

const ruleDocuments = new WeakSet<object>();

/**
 * Record a rule document as a rule.
 */
export function markRule<T extends Rule>(rule: T): T {
  ruleDocuments.add(rule);
  return rule;
}

/**
 * Check if a value is a rule (as opposed to a field map or a literal).
 *
 * Rules come from the factories (`eq`, `cidr`, `and`, ...) or from
 * `validateRule` / `policyFromDocument`. A hand-written object with a rule
 * tag is a literal.
 */
export function isRule(value: unknown): value is Rule {
  return typeof value === 'object' && value !== null && ruleDocuments.has(value);
}
