// String-based checkers: exact, fuzzy and regex matching of string patterns

import type { Inquiry, InquiryField, Policy, StringPolicy } from '@tessera/protocol';
import type { PatternCompiler } from '../compiler/index.js';
import { contextFits, type Checker } from './checker.js';

/**
 * Base for checkers of string-based policies.
 *
 * A policy fits when, for each of subject, resource and action, the inquiry
 * value matches at least one of the policy's patterns, and every context
 * rule is satisfied. Subclasses decide what "matches" means.
 */
export abstract class StringChecker implements Checker {
  abstract readonly kind: 'exact' | 'fuzzy' | 'regex';

  fits(policy: Policy, inquiry: Inquiry): boolean {
    if (policy.type !== 'string') return false;

    return (
      this.fieldFits(policy, policy.subjects, inquiry.subject) &&
      this.fieldFits(policy, policy.resources, inquiry.resource) &&
      this.fieldFits(policy, policy.actions, inquiry.action) &&
      contextFits(policy.context, inquiry)
    );
  }

  protected abstract matches(pattern: string, value: string, policy: StringPolicy): boolean;

  private fieldFits(
    policy: StringPolicy,
    patterns: readonly string[],
    value: InquiryField
  ): boolean {
    if (typeof value !== 'string') return false;
    return patterns.some((pattern) => this.matches(pattern, value, policy));
  }
}

/**
 * Literal string equality.
 */
export class ExactChecker extends StringChecker {
  readonly kind = 'exact';

  protected matches(pattern: string, value: string): boolean {
    return pattern === value;
  }
}

/**
 * The inquiry value contains the pattern as a substring.
 */
export class FuzzyChecker extends StringChecker {
  readonly kind = 'fuzzy';

  protected matches(pattern: string, value: string): boolean {
    return value.includes(pattern);
  }
}

/**
 * The inquiry value fully matches the tagged pattern, compiled with the
 * policy's start and end tags.
 *
 * A malformed pattern raises MalformedTemplateError; the Guard turns it
 * into a denial.
 */
export class RegexChecker extends StringChecker {
  readonly kind = 'regex';

  constructor(private compiler: PatternCompiler) {
    super();
  }

  protected matches(pattern: string, value: string, policy: StringPolicy): boolean {
    return this.compiler.matches(pattern, value, policy.startTag, policy.endTag);
  }
}
