// Policy and inquiry construction

export {
  createPolicy,
  derivePolicyType,
  isFieldMap,
  policyToDocument,
  policyFromDocument,
  policyTypeForChecker,
  DEFAULT_START_TAG,
  DEFAULT_END_TAG,
  type CreatePolicyInput,
  type PolicyConditionInput,
} from './policy.js';
export { createInquiry, inquiryKey, type CreateInquiryInput } from './inquiry.js';
