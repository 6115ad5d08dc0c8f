import { UnknownCheckerTypeError } from '@tessera/protocol';
import { PatternCompiler } from '../compiler/index.js';
import type { Checker } from './checker.js';
import { ExactChecker, FuzzyChecker, RegexChecker } from './string-checkers.js';
import { RulesChecker } from './rules-checker.js';

export type CreateCheckerOptions = {
  /**
   * Compiler shared by regex checkers. A new one is created when omitted.
   */
  compiler?: PatternCompiler;
};

/**
 * Create a built-in checker by kind.
 *
 * @throws UnknownCheckerTypeError for any other kind
 */
export function createChecker(kind: string, options: CreateCheckerOptions = {}): Checker {
  switch (kind) {
    case 'exact':
      return new ExactChecker();
    case 'fuzzy':
      return new FuzzyChecker();
    case 'regex':
      return new RegexChecker(options.compiler ?? new PatternCompiler());
    case 'rules':
      return new RulesChecker();
    default:
      throw new UnknownCheckerTypeError(kind);
  }
}
