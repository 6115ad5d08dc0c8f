// Checker descriptors - what a Storage needs to know about a checker

/**
 * Built-in matching strategies:
 * - exact: literal string equality
 * - fuzzy: substring containment
 * - regex: tagged patterns compiled to anchored regular expressions
 * - rules: rule-based policies
 */
export type CheckerKind = 'exact' | 'fuzzy' | 'regex' | 'rules';

export const CHECKER_KINDS: readonly CheckerKind[] = ['exact', 'fuzzy', 'regex', 'rules'];

/**
 * The part of a checker a Storage may use to pre-filter candidates.
 * Host-defined checkers carry their own kind; storages that push filters
 * down reject kinds they do not know.
 */
export type CheckerDescriptor = {
  readonly kind: string;
};

export function isCheckerKind(kind: string): kind is CheckerKind {
  return CHECKER_KINDS.some((known) => known === kind);
}
