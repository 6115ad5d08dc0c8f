export { contextFits, type Checker } from './checker.js';
export { StringChecker, ExactChecker, FuzzyChecker, RegexChecker } from './string-checkers.js';
export { RulesChecker } from './rules-checker.js';
export { createChecker, type CreateCheckerOptions } from './factory.js';
