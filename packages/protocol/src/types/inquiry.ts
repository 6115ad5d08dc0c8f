// Inquiry types - the ephemeral request being authorized

/**
 * Structured inquiry field, matched by rule-based policies.
 */
export type FieldMap = { readonly [field: string]: unknown };

/**
 * A string for string-based evaluation, a field map for rule-based evaluation.
 */
export type InquiryField = string | FieldMap;

/**
 * An Inquiry describes who wants to do what with which resource.
 * It is never persisted. Equality is defined over its full content.
 */
export type Inquiry = {
  readonly subject: InquiryField;
  readonly resource: InquiryField;
  readonly action: InquiryField;

  /**
   * Named values checked by a policy's context rules
   */
  readonly context: { readonly [name: string]: unknown };
};
