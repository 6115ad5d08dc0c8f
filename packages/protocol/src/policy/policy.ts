// Policy construction, type derivation and document conversion

import type { Id, RuleValue } from '../types/common.js';
import type { Rule, RuleFieldMap } from '../types/rules.js';
import type {
  Effect,
  Policy,
  PolicyField,
  PolicyType,
  RuleCondition,
} from '../types/policies.js';
import { POLICY_FIELDS } from '../types/policies.js';
import { PolicyCreationError, UnknownCheckerTypeError } from '../errors.js';
import { eq } from '../rules/factories.js';
import { isRule } from '../rules/brand.js';
import { validatePolicyDocument, type PolicyDocument } from '../validation/documents.js';

export const DEFAULT_START_TAG = '<';
export const DEFAULT_END_TAG = '>';

/**
 * A condition as accepted on input. Literal values inside field maps are
 * shorthand for an `eq` rule.
 *
 * Only rules built by the rule factories (or parsed by `validateRule`) are
 * rules. A plain object such as `{ type: 'any' }` is a field map, matched
 * against the `type` field of the inquiry value.
 */
export type PolicyConditionInput =
  | string
  | Rule
  | { readonly [field: string]: Rule | RuleValue };

/**
 * Input for creating a Policy
 */
export type CreatePolicyInput = {
  uid: Id;
  description?: string;

  /**
   * Defaults to deny
   */
  effect?: Effect;

  subjects?: readonly PolicyConditionInput[];
  resources?: readonly PolicyConditionInput[];
  actions?: readonly PolicyConditionInput[];

  /**
   * Context name → Rule. Literal values are shorthand for an `eq` rule.
   */
  context?: { readonly [name: string]: Rule | RuleValue };

  startTag?: string;
  endTag?: string;
};

type NormalizedCondition = string | RuleCondition;

function toRule(value: Rule | RuleValue): Rule {
  return isRule(value) ? value : eq(value);
}

function normalizeCondition(
  condition: PolicyConditionInput,
  uid: Id,
  field: PolicyField
): NormalizedCondition {
  if (typeof condition === 'string') return condition;
  if (isRule(condition)) return condition;

  if (typeof condition !== 'object' || condition === null || Array.isArray(condition)) {
    throw new PolicyCreationError(`${field} must hold strings, rules or field maps`, { uid });
  }

  const fieldMap: Record<string, Rule> = {};
  for (const [key, value] of Object.entries(condition)) {
    fieldMap[key] = toRule(value);
  }
  return Object.freeze(fieldMap);
}

function normalizeContext(
  context: CreatePolicyInput['context']
): { readonly [name: string]: Rule } {
  const normalized: Record<string, Rule> = {};
  for (const [name, value] of Object.entries(context ?? {})) {
    normalized[name] = toRule(value);
  }
  return Object.freeze(normalized);
}

function assertTag(tag: string, name: string, uid: Id): void {
  if (tag.length !== 1) {
    throw new PolicyCreationError(`${name} must be a single character, got "${tag}"`, { uid });
  }
}

/**
 * Derive the policy type from its conditions.
 * All strings (or no conditions at all) → string; no strings → rule.
 *
 * @throws PolicyCreationError when strings and rules are mixed
 */
export function derivePolicyType(
  conditions: readonly NormalizedCondition[],
  uid: Id
): PolicyType {
  const strings = conditions.filter((c) => typeof c === 'string').length;
  if (strings === conditions.length) return 'string';
  if (strings === 0) return 'rule';
  throw new PolicyCreationError('string-based and rule-based conditions can not be mixed', {
    uid,
  });
}

/**
 * Create a Policy.
 *
 * @example
 * ```typescript
 * const policy = createPolicy({
 *   uid: '1',
 *   effect: 'allow',
 *   subjects: ['Max', 'Nina', '<Ben|Henry>'],
 *   actions: ['<create|delete>', 'get'],
 *   resources: ['myrn:example.com:resource:123', 'myrn:something:foo:<.+>'],
 *   context: { ip: cidr('127.0.0.1/32'), owner: subjectEqual() },
 * });
 * ```
 *
 * @throws PolicyCreationError if conditions are mixed or malformed
 */
export function createPolicy(input: CreatePolicyInput): Policy {
  const { uid } = input;
  if (!uid) {
    throw new PolicyCreationError('uid is required');
  }

  const startTag = input.startTag ?? DEFAULT_START_TAG;
  const endTag = input.endTag ?? DEFAULT_END_TAG;
  assertTag(startTag, 'startTag', uid);
  assertTag(endTag, 'endTag', uid);

  const fields = {
    subjects: (input.subjects ?? []).map((c) => normalizeCondition(c, uid, 'subjects')),
    resources: (input.resources ?? []).map((c) => normalizeCondition(c, uid, 'resources')),
    actions: (input.actions ?? []).map((c) => normalizeCondition(c, uid, 'actions')),
  };

  const base = {
    uid,
    ...(input.description !== undefined ? { description: input.description } : {}),
    effect: input.effect ?? 'deny',
    context: normalizeContext(input.context),
    startTag,
    endTag,
  };

  const type = derivePolicyType(
    POLICY_FIELDS.flatMap((field) => fields[field]),
    uid
  );

  if (type === 'string') {
    return Object.freeze({
      ...base,
      type,
      subjects: Object.freeze(fields.subjects.filter(isString)),
      resources: Object.freeze(fields.resources.filter(isString)),
      actions: Object.freeze(fields.actions.filter(isString)),
    });
  }

  return Object.freeze({
    ...base,
    type,
    subjects: Object.freeze(fields.subjects.filter(isRuleCondition)),
    resources: Object.freeze(fields.resources.filter(isRuleCondition)),
    actions: Object.freeze(fields.actions.filter(isRuleCondition)),
  });
}

function isString(condition: NormalizedCondition): condition is string {
  return typeof condition === 'string';
}

function isRuleCondition(condition: NormalizedCondition): condition is RuleCondition {
  return typeof condition !== 'string';
}

/**
 * Check if a rule condition is a field map rather than a bare rule.
 */
export function isFieldMap(condition: RuleCondition): condition is RuleFieldMap {
  return !isRule(condition);
}

// --- Documents ---

/**
 * Convert a policy to its structured-document form.
 */
export function policyToDocument(policy: Policy): PolicyDocument {
  return {
    uid: policy.uid,
    ...(policy.description !== undefined ? { description: policy.description } : {}),
    effect: policy.effect,
    type: policy.type,
    subjects: [...policy.subjects],
    resources: [...policy.resources],
    actions: [...policy.actions],
    context: { ...policy.context },
    startTag: policy.startTag,
    endTag: policy.endTag,
  };
}

/**
 * Build a policy from its structured-document form.
 *
 * @throws PolicyCreationError if the document is malformed or its declared
 * type does not match its conditions
 */
export function policyFromDocument(document: unknown): Policy {
  const result = validatePolicyDocument(document);
  if (!result.valid) {
    throw new PolicyCreationError('malformed policy document', {
      details: { errors: result.errors },
    });
  }

  const { type, ...input } = result.value;
  const policy = createPolicy(input);
  if (policy.type !== type) {
    throw new PolicyCreationError(
      `document declares type "${type}" but its conditions are ${policy.type}-based`,
      { uid: policy.uid }
    );
  }
  return policy;
}

/**
 * Map a checker kind to the policy type it can match.
 *
 * @throws UnknownCheckerTypeError for an unrecognized kind
 */
export function policyTypeForChecker(kind: string): PolicyType {
  switch (kind) {
    case 'exact':
    case 'fuzzy':
    case 'regex':
      return 'string';
    case 'rules':
      return 'rule';
    default:
      throw new UnknownCheckerTypeError(kind);
  }
}
