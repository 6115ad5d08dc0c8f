// Rule types - composable predicates used by rule-based policies and contexts

import type { RuleValue } from './common.js';

/**
 * Ordering and equality comparisons against a fixed value.
 * Sequences compare as ordered sequences, not element-wise.
 */
export type ComparisonRule = {
  readonly type: 'eq' | 'not_eq' | 'greater' | 'less' | 'greater_or_equal' | 'less_or_equal';
  readonly value: RuleValue;
};

/**
 * Truthiness checks. A zero-argument function candidate is invoked first.
 */
export type BooleanRule = {
  readonly type: 'is_true' | 'is_false';
};

/**
 * String predicates. Non-string candidates never satisfy them.
 */
export type StringRule =
  | {
      readonly type: 'str_equal' | 'starts_with' | 'ends_with' | 'contains';
      readonly value: string;
      readonly caseInsensitive?: boolean;
    }
  | { readonly type: 'regex_match'; readonly pattern: string }
  | { readonly type: 'pairs_equal' };

/**
 * Membership predicates.
 * - in_list / not_in_list: the candidate itself is (not) a member
 * - all_* / any_*: the candidate is a sequence whose elements are checked
 */
export type ListRule = {
  readonly type:
    | 'in_list'
    | 'not_in_list'
    | 'all_in_list'
    | 'all_not_in_list'
    | 'any_in_list'
    | 'any_not_in_list';
  readonly values: readonly RuleValue[];
};

/**
 * Candidate is an IP literal inside the CIDR block (IPv4 or IPv6).
 */
export type NetworkRule = {
  readonly type: 'cidr';
  readonly cidr: string;
};

/**
 * Compare the candidate with a field of the inquiry being evaluated.
 */
export type InquiryRule = {
  readonly type: 'subject_equal' | 'action_equal' | 'resource_in';
};

/**
 * Logical combinators over other rules.
 */
export type LogicRule =
  | { readonly type: 'and' | 'or'; readonly rules: readonly Rule[] }
  | { readonly type: 'not'; readonly rule: Rule };

/**
 * Constant rules: `any` is always satisfied, `neither` never is.
 */
export type ConstantRule = {
  readonly type: 'any' | 'neither';
};

/**
 * Host-defined predicate, looked up by name in the rule registry.
 */
export type CustomRule = {
  readonly type: 'custom';
  readonly name: string;
  readonly args: readonly RuleValue[];
};

/**
 * A Rule is an immutable document. Its variant tag and arguments are all
 * that is needed to evaluate it, so the document form is the rule itself.
 */
export type Rule =
  | ComparisonRule
  | BooleanRule
  | StringRule
  | ListRule
  | NetworkRule
  | InquiryRule
  | LogicRule
  | ConstantRule
  | CustomRule;

export type RuleType = Rule['type'];

/**
 * Field name → Rule. Used by rule-based policies to match structured
 * inquiry fields (e.g. `{ id: regexMatch('\\d+') }`).
 */
export type RuleFieldMap = { readonly [field: string]: Rule };
