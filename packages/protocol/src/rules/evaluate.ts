// Rule evaluation - decides whether a value satisfies a rule

import type { Inquiry } from '../types/inquiry.js';
import type { Rule, StringRule } from '../types/rules.js';
import { RuleEvaluationError } from '../errors.js';
import { compareValues, includesValue, isPlainObject, isTruthy, valuesEqual } from './values.js';
import { parseCidr, type CidrBlock } from './net.js';
import { customRuleRegistry } from './registry.js';

// Compiled forms of regex_match and cidr rules. Rule documents are immutable,
// so the compiled value can live as long as the document does.
const compiledPatterns = new WeakMap<Rule, RegExp>();
const parsedBlocks = new WeakMap<Rule, CidrBlock | null>();

function anchoredPattern(rule: Rule & { type: 'regex_match' }): RegExp {
  let regex = compiledPatterns.get(rule);
  if (!regex) {
    regex = new RegExp(`^(?:${rule.pattern})$`);
    compiledPatterns.set(rule, regex);
  }
  return regex;
}

function cidrBlock(rule: Rule & { type: 'cidr' }): CidrBlock | null {
  let block = parsedBlocks.get(rule);
  if (block === undefined) {
    block = parseCidr(rule.cidr) ?? null;
    parsedBlocks.set(rule, block);
  }
  return block;
}

type SubstringRule = Extract<StringRule, { value: string }>;

function stringSatisfied(rule: SubstringRule, what: string): boolean {
  const candidate = rule.caseInsensitive ? what.toLowerCase() : what;
  const value = rule.caseInsensitive ? rule.value.toLowerCase() : rule.value;

  switch (rule.type) {
    case 'str_equal':
      return candidate === value;
    case 'starts_with':
      return candidate.startsWith(value);
    case 'ends_with':
      return candidate.endsWith(value);
    case 'contains':
      return candidate.includes(value);
  }
}

function pairsEqual(what: unknown): boolean {
  if (!Array.isArray(what)) return false;
  return what.every(
    (pair: unknown) => Array.isArray(pair) && pair.length === 2 && valuesEqual(pair[0], pair[1])
  );
}

// Membership of the inquiry resource in a candidate: an element of a
// sequence, a substring of a string, or a key of a mapping.
function containsResource(what: unknown, resource: unknown): boolean {
  if (Array.isArray(what)) return includesValue(what, resource);
  if (typeof resource !== 'string') return false;
  if (typeof what === 'string') return what.includes(resource);
  return isPlainObject(what) && Object.hasOwn(what, resource);
}

/**
 * Evaluate a rule against a value.
 *
 * Evaluation is pure: the result depends only on the rule, the value and
 * the inquiry. Rules that need the inquiry (subject_equal, action_equal,
 * resource_in) are not satisfied without one.
 *
 * @param rule - The rule to evaluate
 * @param what - The candidate value (a context value or an inquiry field)
 * @param inquiry - The inquiry being authorized
 * @throws RuleEvaluationError for an unregistered custom rule
 */
export function satisfied(rule: Rule, what: unknown, inquiry?: Inquiry): boolean {
  switch (rule.type) {
    case 'eq':
      return valuesEqual(what, rule.value);
    case 'not_eq':
      return !valuesEqual(what, rule.value);
    case 'greater': {
      const order = compareValues(what, rule.value);
      return order !== undefined && order > 0;
    }
    case 'less': {
      const order = compareValues(what, rule.value);
      return order !== undefined && order < 0;
    }
    case 'greater_or_equal': {
      const order = compareValues(what, rule.value);
      return order !== undefined && order >= 0;
    }
    case 'less_or_equal': {
      const order = compareValues(what, rule.value);
      return order !== undefined && order <= 0;
    }

    case 'is_true':
    case 'is_false': {
      const value: unknown = typeof what === 'function' ? what() : what;
      return isTruthy(value) === (rule.type === 'is_true');
    }

    case 'str_equal':
    case 'starts_with':
    case 'ends_with':
    case 'contains':
      return typeof what === 'string' && stringSatisfied(rule, what);
    case 'regex_match':
      return typeof what === 'string' && anchoredPattern(rule).test(what);
    case 'pairs_equal':
      return pairsEqual(what);

    case 'in_list':
      return includesValue(rule.values, what);
    case 'not_in_list':
      return !includesValue(rule.values, what);
    case 'all_in_list':
      return Array.isArray(what) && what.every((item: unknown) => includesValue(rule.values, item));
    case 'all_not_in_list':
      return (
        Array.isArray(what) && what.every((item: unknown) => !includesValue(rule.values, item))
      );
    case 'any_in_list':
      return Array.isArray(what) && what.some((item: unknown) => includesValue(rule.values, item));
    case 'any_not_in_list':
      return (
        Array.isArray(what) && what.some((item: unknown) => !includesValue(rule.values, item))
      );

    case 'cidr': {
      const block = cidrBlock(rule);
      return block !== null && typeof what === 'string' && block.contains(what);
    }

    case 'subject_equal':
      return inquiry !== undefined && valuesEqual(what, inquiry.subject);
    case 'action_equal':
      return inquiry !== undefined && valuesEqual(what, inquiry.action);
    case 'resource_in':
      return inquiry !== undefined && containsResource(what, inquiry.resource);

    case 'and':
      return rule.rules.every((sub) => satisfied(sub, what, inquiry));
    case 'or':
      return rule.rules.some((sub) => satisfied(sub, what, inquiry));
    case 'not':
      return !satisfied(rule.rule, what, inquiry);

    case 'any':
      return true;
    case 'neither':
      return false;

    case 'custom': {
      const predicate = customRuleRegistry.get(rule.name);
      if (!predicate) {
        throw new RuleEvaluationError(`custom:${rule.name}`, 'no predicate registered');
      }
      return predicate(what, rule.args, inquiry);
    }
  }
}
