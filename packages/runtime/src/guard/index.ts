export {
  Guard,
  type Decision,
  type DecisionReason,
  type DecisionRecord,
  type AuditLogger,
  type GuardOptions,
} from './guard.js';
