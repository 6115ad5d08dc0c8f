// Custom rule registry - maps custom rule names to predicates

import type { Inquiry } from '../types/inquiry.js';
import type { RuleValue } from '../types/common.js';

/**
 * A host-defined predicate.
 * Receives the candidate value, the rule's arguments and the inquiry.
 * Must be pure: the same inputs always give the same answer.
 */
export type CustomRulePredicate = (
  what: unknown,
  args: readonly RuleValue[],
  inquiry?: Inquiry
) => boolean;

/**
 * Registry for custom rule predicates.
 *
 * Custom rules are stored as `{ type: 'custom', name, args }` documents, so
 * they survive serialization as long as the reading process registers the
 * same name.
 */
class CustomRuleRegistry {
  private predicates = new Map<string, CustomRulePredicate>();

  /**
   * Register a predicate under a name.
   * @throws Error if the name is already registered
   */
  register(name: string, predicate: CustomRulePredicate): void {
    if (this.predicates.has(name)) {
      throw new Error(`Custom rule already registered: ${name}`);
    }
    this.predicates.set(name, predicate);
  }

  /**
   * Remove a predicate.
   * @returns true if a predicate was removed
   */
  unregister(name: string): boolean {
    return this.predicates.delete(name);
  }

  get(name: string): CustomRulePredicate | undefined {
    return this.predicates.get(name);
  }

  has(name: string): boolean {
    return this.predicates.has(name);
  }

  getRegisteredNames(): string[] {
    return Array.from(this.predicates.keys());
  }

  /**
   * Clear all predicates. Primarily for testing.
   */
  clear(): void {
    this.predicates.clear();
  }
}

/**
 * Process-wide custom rule registry.
 */
export const customRuleRegistry = new CustomRuleRegistry();
