export {
  PatternCompiler,
  compilePattern,
  DEFAULT_PATTERN_CACHE_SIZE,
  type CompiledPattern,
  type PatternCompilerOptions,
} from './pattern-compiler.js';
