// Rules - construction, evaluation and custom rule registration

export * from './factories.js';
export { satisfied } from './evaluate.js';
export { isRule } from './brand.js';
export { customRuleRegistry, type CustomRulePredicate } from './registry.js';
export { valuesEqual, compareValues, isTruthy, isPlainObject } from './values.js';
export { parseCidr, type CidrBlock } from './net.js';
