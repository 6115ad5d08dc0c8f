// Structured-document schemas for rules and policies
//
// Rules and policies are persisted and transported as plain JSON documents.
// These schemas validate documents on the way in; a valid rule document is
// the rule itself, so nothing is lost in a round trip. Parsed rules are
// marked as rules, so createPolicy does not mistake them for literals.

import { z } from 'zod';
import type { RuleValue } from '../types/common.js';
import type { Rule } from '../types/rules.js';
import { parseCidr } from '../rules/net.js';
import { markRule } from '../rules/brand.js';

export const ruleValueSchema: z.ZodType<RuleValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(ruleValueSchema),
    z.record(ruleValueSchema),
  ])
);

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

export const ruleSchema: z.ZodType<Rule> = z.lazy(() =>
  z.union([
    z.object({
      type: z.enum(['eq', 'not_eq', 'greater', 'less', 'greater_or_equal', 'less_or_equal']),
      value: ruleValueSchema,
    }),
    z.object({ type: z.enum(['is_true', 'is_false']) }),
    z.object({
      type: z.enum(['str_equal', 'starts_with', 'ends_with', 'contains']),
      value: z.string(),
      caseInsensitive: z.boolean().optional(),
    }),
    z.object({
      type: z.literal('regex_match'),
      pattern: z.string().refine(isValidPattern, 'pattern is not a valid regular expression'),
    }),
    z.object({ type: z.literal('pairs_equal') }),
    z.object({
      type: z.enum([
        'in_list',
        'not_in_list',
        'all_in_list',
        'all_not_in_list',
        'any_in_list',
        'any_not_in_list',
      ]),
      values: z.array(ruleValueSchema),
    }),
    z.object({
      type: z.literal('cidr'),
      cidr: z.string().refine((block) => parseCidr(block) !== undefined, 'invalid CIDR block'),
    }),
    z.object({ type: z.enum(['subject_equal', 'action_equal', 'resource_in']) }),
    z.object({ type: z.enum(['and', 'or']), rules: z.array(ruleSchema) }),
    z.object({ type: z.literal('not'), rule: ruleSchema }),
    z.object({ type: z.enum(['any', 'neither']) }),
    z.object({
      type: z.literal('custom'),
      name: z.string().min(1),
      args: z.array(ruleValueSchema),
    }),
  ]).transform((rule) => markRule(rule))
);

/**
 * A policy condition: a string pattern, a bare rule, or a field map of rules.
 */
export const conditionSchema = z.union([z.string(), ruleSchema, z.record(ruleSchema)]);

const tagSchema = z.string().length(1, 'tags must be a single character');

export const policyDocumentSchema = z.object({
  uid: z.string().min(1),
  description: z.string().optional(),
  effect: z.enum(['allow', 'deny']),
  type: z.enum(['string', 'rule']),
  subjects: z.array(conditionSchema),
  resources: z.array(conditionSchema),
  actions: z.array(conditionSchema),
  context: z.record(ruleSchema),
  startTag: tagSchema.default('<'),
  endTag: tagSchema.default('>'),
});

/**
 * A policy in its structured-document form.
 */
export type PolicyDocument = z.output<typeof policyDocumentSchema>;

/**
 * Result of validating a document
 */
export type DocumentValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; errors: DocumentValidationError[] };

export type DocumentValidationError = {
  path: string;
  message: string;
};

function toValidationErrors(error: z.ZodError): DocumentValidationError[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Validate a rule document.
 */
export function validateRule(document: unknown): DocumentValidationResult<Rule> {
  const result = ruleSchema.safeParse(document);
  return result.success
    ? { valid: true, value: result.data }
    : { valid: false, errors: toValidationErrors(result.error) };
}

/**
 * Validate a policy document.
 */
export function validatePolicyDocument(
  document: unknown
): DocumentValidationResult<PolicyDocument> {
  const result = policyDocumentSchema.safeParse(document);
  return result.success
    ? { valid: true, value: result.data }
    : { valid: false, errors: toValidationErrors(result.error) };
}
