// Inquiry construction and canonical keys

import type { Inquiry, InquiryField } from '../types/inquiry.js';
import { isPlainObject } from '../rules/values.js';

/**
 * Input for creating an Inquiry. Missing fields default to empty strings
 * and an empty context.
 */
export type CreateInquiryInput = {
  subject?: InquiryField;
  resource?: InquiryField;
  action?: InquiryField;
  context?: { readonly [name: string]: unknown };
};

/**
 * Create an Inquiry.
 *
 * @example
 * ```typescript
 * const inquiry = createInquiry({
 *   subject: 'Henry',
 *   action: 'get',
 *   resource: 'myrn:example.com:resource:123',
 *   context: { ip: '127.0.0.1', owner: 'Henry' },
 * });
 * ```
 */
export function createInquiry(input: CreateInquiryInput = {}): Inquiry {
  return Object.freeze({
    subject: input.subject ?? '',
    resource: input.resource ?? '',
    action: input.action ?? '',
    context: Object.freeze({ ...input.context }),
  });
}

/**
 * Produce a canonical representation of a value: object keys sorted,
 * numbers and strings tagged so that 1 and '1' differ.
 * Returns undefined for values without a canonical form.
 */
function canonicalize(value: unknown): string | undefined {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';

  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'number':
      return Number.isFinite(value) ? String(value) : `#${String(value)}`;
    case 'boolean':
      return value ? 'true' : 'false';
    case 'bigint':
      return `${value.toString()}n`;
    default:
      break;
  }

  if (Array.isArray(value)) {
    const parts: string[] = [];
    for (const item of value) {
      const part = canonicalize(item);
      if (part === undefined) return undefined;
      parts.push(part);
    }
    return `[${parts.join(',')}]`;
  }

  if (isPlainObject(value)) {
    const parts: string[] = [];
    for (const key of Object.keys(value).sort()) {
      const part = canonicalize(value[key]);
      if (part === undefined) return undefined;
      parts.push(`${JSON.stringify(key)}:${part}`);
    }
    return `{${parts.join(',')}}`;
  }

  // functions, symbols, class instances
  return undefined;
}

/**
 * Canonical key of an inquiry, equal for inquiries with equal content.
 *
 * @returns The key, or undefined if the inquiry holds values (such as
 * functions) that cannot be compared by content
 */
export function inquiryKey(inquiry: Inquiry): string | undefined {
  return canonicalize({
    subject: inquiry.subject,
    resource: inquiry.resource,
    action: inquiry.action,
    context: inquiry.context,
  });
}
