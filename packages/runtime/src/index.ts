// @tessera/runtime
// Pattern compilation, checkers, caches and the decision engine

// Error types
export { MalformedTemplateError, ConfigurationError } from './errors.js';

// Logging
export {
  createPinoLogger,
  createCapturingLogger,
  silentLogger,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogEntry,
  type PinoLoggerOptions,
} from './logging/index.js';

// Configuration
export { loadConfig, type EngineConfig, type Environment } from './config.js';

// Pattern compilation
export {
  PatternCompiler,
  compilePattern,
  DEFAULT_PATTERN_CACHE_SIZE,
  type CompiledPattern,
  type PatternCompilerOptions,
} from './compiler/index.js';

// Checkers
export {
  contextFits,
  StringChecker,
  ExactChecker,
  FuzzyChecker,
  RegexChecker,
  RulesChecker,
  createChecker,
  type Checker,
  type CreateCheckerOptions,
} from './checkers/index.js';

// Caches
export {
  EnfoldCache,
  GuardCache,
  DEFAULT_GUARD_CACHE_SIZE,
  type EnfoldCacheOptions,
  type GuardCacheOptions,
} from './cache/index.js';

// Decisions
export {
  Guard,
  type Decision,
  type DecisionReason,
  type DecisionRecord,
  type AuditLogger,
  type GuardOptions,
} from './guard/index.js';

// Engine
export { createEngine, type CreateEngineOptions, type Engine } from './engine.js';
