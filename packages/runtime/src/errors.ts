// Runtime error types

import { TesseraError } from '@tessera/protocol';

/**
 * Error when a tagged pattern cannot be compiled: unbalanced delimiters or
 * a hole that is not a valid regular expression.
 */
export class MalformedTemplateError extends TesseraError {
  readonly template: string;

  constructor(template: string, reason: string) {
    super('MALFORMED_TEMPLATE', `Pattern ${template} is malformed: ${reason}`);
    this.name = 'MalformedTemplateError';
    this.template = template;
  }
}

/**
 * Error when the engine configuration is invalid.
 */
export class ConfigurationError extends TesseraError {
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', message);
    this.name = 'ConfigurationError';
    this.details = details;
  }
}
