// @tessera/protocol
// Policy, rule and inquiry model of the decision engine.
//
// Everything in this package is a plain value or a pure function:
// - Rules are immutable documents evaluated by `satisfied`
// - Policies are frozen value objects built by `createPolicy`
// - Documents are validated with zod on the way in

export * from './types/index.js';
export * from './errors.js';
export * from './rules/index.js';
export * from './policy/index.js';
export {
  ruleSchema,
  ruleValueSchema,
  conditionSchema,
  policyDocumentSchema,
  validateRule,
  validatePolicyDocument,
  type PolicyDocument,
  type DocumentValidationResult,
  type DocumentValidationError,
} from './validation/documents.js';
