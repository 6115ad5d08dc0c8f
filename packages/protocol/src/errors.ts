// Error types shared by storages and the decision engine

import type { Id } from './types/common.js';

/**
 * Base class for all engine errors.
 * Provides structured error information for debugging and logging.
 */
export class TesseraError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'TesseraError';
    this.code = code;
  }
}

// --- Policy lifecycle ---

/**
 * Error when adding a policy whose uid is already stored.
 */
export class PolicyExistsError extends TesseraError {
  readonly uid: Id;

  constructor(uid: Id) {
    super('POLICY_EXISTS', `Conflicting UID = ${uid}`);
    this.name = 'PolicyExistsError';
    this.uid = uid;
  }
}

/**
 * Error when a referenced policy does not exist.
 */
export class PolicyNotFoundError extends TesseraError {
  readonly uid: Id;

  constructor(uid: Id) {
    super('POLICY_NOT_FOUND', `Policy not found: ${uid}`);
    this.name = 'PolicyNotFoundError';
    this.uid = uid;
  }
}

/**
 * Error when a policy cannot be updated.
 */
export class PolicyUpdateError extends TesseraError {
  readonly uid: Id;

  constructor(uid: Id, reason: string) {
    super('POLICY_UPDATE_ERROR', `Policy ${uid} could not be updated: ${reason}`);
    this.name = 'PolicyUpdateError';
    this.uid = uid;
  }
}

/**
 * Error when a policy (or its document) is malformed.
 */
export class PolicyCreationError extends TesseraError {
  readonly uid?: Id;
  readonly details?: Record<string, unknown>;

  constructor(reason: string, options?: { uid?: Id; details?: Record<string, unknown> }) {
    super(
      'POLICY_CREATION_ERROR',
      options?.uid === undefined
        ? `Policy could not be created: ${reason}`
        : `Policy ${options.uid} could not be created: ${reason}`
    );
    this.name = 'PolicyCreationError';
    this.uid = options?.uid;
    this.details = options?.details;
  }
}

/**
 * Error when a policy cannot be deleted.
 */
export class PolicyDeletionError extends TesseraError {
  readonly uid: Id;

  constructor(uid: Id, reason: string) {
    super('POLICY_DELETION_ERROR', `Policy ${uid} could not be deleted: ${reason}`);
    this.name = 'PolicyDeletionError';
    this.uid = uid;
  }
}

// --- Storage contract ---

/**
 * Error when getAll receives a non-positive limit or a negative offset.
 */
export class InvalidPaginationError extends TesseraError {
  readonly limit: number;
  readonly offset: number;

  constructor(limit: number, offset: number) {
    super(
      'INVALID_PAGINATION',
      `Limit must be > 0 and offset must be >= 0 (got limit=${limit}, offset=${offset})`
    );
    this.name = 'InvalidPaginationError';
    this.limit = limit;
    this.offset = offset;
  }
}

/**
 * Error when a storage cannot reconcile the checker it was given.
 */
export class UnknownCheckerTypeError extends TesseraError {
  readonly checkerKind: unknown;

  constructor(checkerKind: unknown) {
    super('UNKNOWN_CHECKER_TYPE', `Can't determine Checker type: ${String(checkerKind)}`);
    this.name = 'UnknownCheckerTypeError';
    this.checkerKind = checkerKind;
  }
}

// --- Rules ---

/**
 * Error when a rule is built with invalid arguments.
 */
export class InvalidRuleError extends TesseraError {
  readonly ruleType: string;

  constructor(ruleType: string, reason: string) {
    super('INVALID_RULE', `Invalid ${ruleType} rule: ${reason}`);
    this.name = 'InvalidRuleError';
    this.ruleType = ruleType;
  }
}

/**
 * Error when a rule cannot be evaluated (e.g. an unregistered custom rule).
 */
export class RuleEvaluationError extends TesseraError {
  readonly ruleType: string;

  constructor(ruleType: string, reason: string) {
    super('RULE_EVALUATION_ERROR', `Rule ${ruleType} could not be evaluated: ${reason}`);
    this.name = 'RuleEvaluationError';
    this.ruleType = ruleType;
  }
}
