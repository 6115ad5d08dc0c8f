// Rule factories - the public way to build rule documents

import type { RuleValue } from '../types/common.js';
import type {
  Rule,
  ComparisonRule,
  BooleanRule,
  StringRule,
  ListRule,
  NetworkRule,
  InquiryRule,
  LogicRule,
  ConstantRule,
  CustomRule,
} from '../types/rules.js';
import { InvalidRuleError } from '../errors.js';
import { parseCidr } from './net.js';
import { markRule } from './brand.js';

// --- Comparison ---

function comparison(type: ComparisonRule['type'], value: RuleValue): ComparisonRule {
  return markRule({ type, value });
}

export const eq = (value: RuleValue): ComparisonRule => comparison('eq', value);
export const notEq = (value: RuleValue): ComparisonRule => comparison('not_eq', value);
export const greater = (value: RuleValue): ComparisonRule => comparison('greater', value);
export const less = (value: RuleValue): ComparisonRule => comparison('less', value);
export const greaterOrEqual = (value: RuleValue): ComparisonRule =>
  comparison('greater_or_equal', value);
export const lessOrEqual = (value: RuleValue): ComparisonRule =>
  comparison('less_or_equal', value);

// --- Boolean ---

export const isTrue = (): BooleanRule => markRule({ type: 'is_true' });
export const isFalse = (): BooleanRule => markRule({ type: 'is_false' });

// --- String ---

type StringRuleOptions = { caseInsensitive?: boolean };

function stringRule(
  type: 'str_equal' | 'starts_with' | 'ends_with' | 'contains',
  value: string,
  options: StringRuleOptions
): StringRule {
  return markRule(
    options.caseInsensitive ? { type, value, caseInsensitive: true } : { type, value }
  );
}

export const strEqual = (value: string, options: StringRuleOptions = {}): StringRule =>
  stringRule('str_equal', value, options);
export const startsWith = (value: string, options: StringRuleOptions = {}): StringRule =>
  stringRule('starts_with', value, options);
export const endsWith = (value: string, options: StringRuleOptions = {}): StringRule =>
  stringRule('ends_with', value, options);
export const contains = (value: string, options: StringRuleOptions = {}): StringRule =>
  stringRule('contains', value, options);

/**
 * Full-match the candidate against a regular expression.
 * @throws InvalidRuleError if the pattern does not compile
 */
export function regexMatch(pattern: string): StringRule {
  assertValidPattern(pattern);
  return markRule({ type: 'regex_match', pattern });
}

/**
 * Satisfied when every pair in the candidate holds two equal elements.
 */
export const pairsEqual = (): StringRule => markRule({ type: 'pairs_equal' });

export function assertValidPattern(pattern: string): void {
  try {
    new RegExp(pattern);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InvalidRuleError('regex_match', message);
  }
}

// --- List ---

function list(type: ListRule['type'], values: RuleValue[]): ListRule {
  return markRule({ type, values });
}

export const inList = (...values: RuleValue[]): ListRule => list('in_list', values);
export const notInList = (...values: RuleValue[]): ListRule => list('not_in_list', values);
export const allInList = (...values: RuleValue[]): ListRule => list('all_in_list', values);
export const allNotInList = (...values: RuleValue[]): ListRule => list('all_not_in_list', values);
export const anyInList = (...values: RuleValue[]): ListRule => list('any_in_list', values);
export const anyNotInList = (...values: RuleValue[]): ListRule => list('any_not_in_list', values);

// --- Network ---

/**
 * @throws InvalidRuleError if the block is not valid CIDR notation
 */
export function cidr(block: string): NetworkRule {
  assertValidCidr(block);
  return markRule({ type: 'cidr', cidr: block });
}

export function assertValidCidr(block: string): void {
  if (!parseCidr(block)) {
    throw new InvalidRuleError('cidr', `"${block}" is not a valid CIDR block`);
  }
}

// --- Inquiry ---

export const subjectEqual = (): InquiryRule => markRule({ type: 'subject_equal' });
export const actionEqual = (): InquiryRule => markRule({ type: 'action_equal' });
export const resourceIn = (): InquiryRule => markRule({ type: 'resource_in' });

// --- Logic ---

export const and = (...rules: Rule[]): LogicRule => markRule({ type: 'and', rules });
export const or = (...rules: Rule[]): LogicRule => markRule({ type: 'or', rules });
export const not = (rule: Rule): LogicRule => markRule({ type: 'not', rule });

// --- Constants ---

export const any = (): ConstantRule => markRule({ type: 'any' });
export const neither = (): ConstantRule => markRule({ type: 'neither' });

// --- Custom ---

/**
 * Reference a predicate registered in the custom rule registry.
 */
export const custom = (name: string, ...args: RuleValue[]): CustomRule =>
  markRule({ type: 'custom', name, args });
