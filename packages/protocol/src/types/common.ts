// Common types used across the protocol

/**
 * Policy identifier. Unique within a storage.
 */
export type Id = string;

/**
 * JSON-compatible value carried by rule arguments and documents.
 */
export type RuleValue =
  | string
  | number
  | boolean
  | null
  | readonly RuleValue[]
  | { readonly [key: string]: RuleValue };

/**
 * Pagination window for listing policies.
 *
 * Storages MUST reject a non-positive limit or a negative offset.
 */
export type Page = {
  limit: number;
  offset: number;
};
