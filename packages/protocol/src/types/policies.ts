// Policy types - stored access rules

import type { Id } from './common.js';
import type { Rule, RuleFieldMap } from './rules.js';

/**
 * Outcome attached to a Policy.
 */
export type Effect = 'allow' | 'deny';

export const ALLOW_ACCESS: Effect = 'allow';
export const DENY_ACCESS: Effect = 'deny';

/**
 * Which representation the conditions use. Determines which checker
 * family may consider the policy.
 */
export type PolicyType = 'string' | 'rule';

/**
 * A rule-based condition: a field map, or a bare rule applied to the
 * whole inquiry field.
 */
export type RuleCondition = Rule | RuleFieldMap;

type PolicyBase = {
  uid: Id;
  description?: string;
  effect: Effect;

  /**
   * Context name → Rule, checked against the inquiry context
   */
  context: { readonly [name: string]: Rule };

  /**
   * Delimiters of regular-expression holes in string patterns
   */
  startTag: string;
  endTag: string;
};

/**
 * Policy whose conditions are string patterns.
 */
export type StringPolicy = PolicyBase & {
  type: 'string';
  subjects: readonly string[];
  resources: readonly string[];
  actions: readonly string[];
};

/**
 * Policy whose conditions are rules or field maps of rules.
 */
export type RulePolicy = PolicyBase & {
  type: 'rule';
  subjects: readonly RuleCondition[];
  resources: readonly RuleCondition[];
  actions: readonly RuleCondition[];
};

/**
 * A Policy is an immutable value object. Mutation happens only through
 * Storage.update, which replaces the whole policy.
 */
export type Policy = StringPolicy | RulePolicy;

/**
 * The condition fields shared by both policy types.
 */
export type PolicyField = 'subjects' | 'resources' | 'actions';

export const POLICY_FIELDS: readonly PolicyField[] = ['subjects', 'resources', 'actions'];
