// Guard - the decision engine
//
// Answers "is this inquiry allowed?" from the policies of a storage and a
// checker:
// - deny overrides: any matching deny policy denies
// - default deny: no matching policy denies
// - fail closed: any error while retrieving or checking policies denies

import type { Id, Inquiry, Policy } from '@tessera/protocol';
import type { Storage } from '@tessera/repositories';
import type { Checker } from '../checkers/index.js';
import type { GuardCache } from '../cache/index.js';
import { silentLogger, type Logger } from '../logging/index.js';

// --- Types ---

export type DecisionReason =
  | 'no-policies'
  | 'matched-allow'
  | 'matched-deny'
  | 'no-matching-policies'
  | 'error';

/**
 * Outcome of a decision
 */
export type Decision = {
  allowed: boolean;
  reason: DecisionReason;

  /**
   * Policies that decided the outcome: the matching deny policies for a
   * denial, the matching allow policies for an approval
   */
  policies: Id[];
};

/**
 * What the audit logger receives for every decision
 */
export type DecisionRecord = Decision & {
  inquiry: Inquiry;
};

export type AuditLogger = (record: DecisionRecord) => void;

export type GuardOptions = {
  /**
   * Diagnostics. Errors turned into denials are logged at error level.
   */
  logger?: Logger;

  /**
   * Memoizes candidate retrieval. Must front the same storage.
   */
  cache?: GuardCache;

  auditLogger?: AuditLogger;
};

// --- Guard ---

/**
 * Decision engine over a (storage, checker) pair.
 *
 * @example
 * ```typescript
 * const guard = new Guard(storage, new RegexChecker(new PatternCompiler()));
 * const allowed = await guard.isAllowed(createInquiry({
 *   subject: 'Henry',
 *   action: 'get',
 *   resource: 'myrn:example.com:resource:123',
 *   context: { owner: 'Henry', ip: '127.0.0.1' },
 * }));
 * ```
 */
export class Guard {
  private logger: Logger;
  private cache?: GuardCache;
  private auditLogger?: AuditLogger;

  constructor(
    readonly storage: Storage,
    readonly checker: Checker,
    options: GuardOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.cache = options.cache;
    this.auditLogger = options.auditLogger;
  }

  /**
   * Check if an inquiry is allowed. Never throws.
   */
  async isAllowed(inquiry: Inquiry): Promise<boolean> {
    const decision = await this.decide(inquiry);
    return decision.allowed;
  }

  /**
   * Decide on an inquiry and explain the outcome. Never throws.
   */
  async decide(inquiry: Inquiry): Promise<Decision> {
    let decision: Decision;

    try {
      const candidates = await this.candidates(inquiry);
      decision = this.aggregate(candidates, inquiry);
    } catch (error) {
      this.logger.error('Policy evaluation failed, access denied', {
        error: error instanceof Error ? error.message : String(error),
        errorName: error instanceof Error ? error.name : undefined,
        checker: this.checker.kind,
      });
      decision = { allowed: false, reason: 'error', policies: [] };
    }

    this.logger.debug('Inquiry decided', {
      allowed: decision.allowed,
      reason: decision.reason,
      policies: decision.policies,
    });
    this.audit(inquiry, decision);

    return decision;
  }

  private candidates(inquiry: Inquiry): Promise<Policy[]> {
    return this.cache
      ? this.cache.findForInquiry(inquiry, this.checker)
      : this.storage.findForInquiry(inquiry, this.checker);
  }

  private aggregate(candidates: readonly Policy[], inquiry: Inquiry): Decision {
    if (candidates.length === 0) {
      return { allowed: false, reason: 'no-policies', policies: [] };
    }

    const matched = candidates.filter((policy) => this.checker.fits(policy, inquiry));
    if (matched.length === 0) {
      return { allowed: false, reason: 'no-matching-policies', policies: [] };
    }

    const denying = matched.filter((policy) => policy.effect === 'deny');
    if (denying.length > 0) {
      return { allowed: false, reason: 'matched-deny', policies: denying.map((p) => p.uid) };
    }

    return { allowed: true, reason: 'matched-allow', policies: matched.map((p) => p.uid) };
  }

  private audit(inquiry: Inquiry, decision: Decision): void {
    if (!this.auditLogger) return;
    try {
      this.auditLogger({ ...decision, inquiry });
    } catch (error) {
      this.logger.error('Audit logger failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
