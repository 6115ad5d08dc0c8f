// Pattern Compiler - turns tagged string patterns into anchored regular expressions
//
// A tagged pattern mixes literal text with regular-expression "holes"
// delimited by a start and an end tag:
//
//   myrn:something:foo:<.+>      → ^myrn:something:foo:(.+)$
//   <Ben|Henry>                  → ^(Ben|Henry)$
//
// Literal text is escaped; hole interiors are inserted as regular
// expressions, one capturing group per top-level hole.

import { LRUCache } from 'lru-cache';
import { MalformedTemplateError } from '../errors.js';

export const DEFAULT_PATTERN_CACHE_SIZE = 512;

// --- Types ---

/**
 * A compiled tagged pattern. Immutable once built.
 */
export type CompiledPattern = {
  readonly template: string;

  /**
   * The whole pattern, anchored at both ends
   */
  readonly regex: RegExp;

  /**
   * One anchored expression per hole, in order
   */
  readonly holes: readonly RegExp[];
};

type Segment = { kind: 'literal' | 'hole'; text: string };

// --- Compilation ---

function escapeLiteral(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Split a template into literal and hole segments.
 *
 * Holes nest: a start tag inside a hole opens a nested level whose tags are
 * kept as part of the hole text. When the start and end tags are the same
 * character, each occurrence toggles between literal text and a hole.
 *
 * @throws MalformedTemplateError on unbalanced tags
 */
function splitTemplate(template: string, startTag: string, endTag: string): Segment[] {
  const segments: Segment[] = [];
  let depth = 0;
  let text = '';

  const flush = (kind: Segment['kind']) => {
    if (kind === 'hole' || text.length > 0) {
      segments.push({ kind, text });
    }
    text = '';
  };

  for (const char of template) {
    if (startTag === endTag && char === startTag) {
      flush(depth === 0 ? 'literal' : 'hole');
      depth = depth === 0 ? 1 : 0;
    } else if (char === startTag) {
      if (depth === 0) {
        flush('literal');
      } else {
        text += char;
      }
      depth++;
    } else if (char === endTag) {
      if (depth === 0) {
        throw new MalformedTemplateError(template, `"${endTag}" without a matching "${startTag}"`);
      }
      depth--;
      if (depth === 0) {
        flush('hole');
      } else {
        text += char;
      }
    } else {
      text += char;
    }
  }

  if (depth !== 0) {
    throw new MalformedTemplateError(template, `"${startTag}" without a matching "${endTag}"`);
  }
  flush('literal');

  return segments;
}

function compileRegex(template: string, source: string): RegExp {
  try {
    return new RegExp(source);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedTemplateError(template, reason);
  }
}

function assertTag(template: string, tag: string): void {
  if (tag.length !== 1) {
    throw new MalformedTemplateError(template, `tag "${tag}" must be a single character`);
  }
}

/**
 * Compile a tagged pattern without caching.
 *
 * @throws MalformedTemplateError on unbalanced tags, invalid tags or a hole
 * that is not a valid regular expression
 */
export function compilePattern(template: string, startTag = '<', endTag = '>'): CompiledPattern {
  assertTag(template, startTag);
  assertTag(template, endTag);

  const segments = splitTemplate(template, startTag, endTag);
  const holes: RegExp[] = [];
  let source = '^';

  for (const segment of segments) {
    if (segment.kind === 'literal') {
      source += escapeLiteral(segment.text);
    } else {
      holes.push(compileRegex(template, `^(?:${segment.text})$`));
      source += `(${segment.text})`;
    }
  }

  return Object.freeze({
    template,
    regex: compileRegex(template, `${source}$`),
    holes: Object.freeze(holes),
  });
}

// --- Compiler ---

export type PatternCompilerOptions = {
  /**
   * Maximum number of compiled patterns kept (default 512)
   */
  maxSize?: number;
};

/**
 * Compiles tagged patterns and memoizes the results per
 * (template, startTag, endTag) in a bounded LRU.
 *
 * One compiler is meant to be shared by every checker in a process.
 *
 * @example
 * ```typescript
 * const compiler = new PatternCompiler();
 * compiler.matches('myrn:something:foo:<.+>', 'myrn:something:foo:bar'); // true
 * ```
 */
export class PatternCompiler {
  private cache: LRUCache<string, CompiledPattern>;

  constructor(options: PatternCompilerOptions = {}) {
    this.cache = new LRUCache({ max: options.maxSize ?? DEFAULT_PATTERN_CACHE_SIZE });
  }

  /**
   * @throws MalformedTemplateError
   */
  compile(template: string, startTag = '<', endTag = '>'): CompiledPattern {
    const key = JSON.stringify([template, startTag, endTag]);
    let compiled = this.cache.get(key);
    if (!compiled) {
      compiled = compilePattern(template, startTag, endTag);
      this.cache.set(key, compiled);
    }
    return compiled;
  }

  /**
   * Check if a value fully matches a tagged pattern.
   * @throws MalformedTemplateError
   */
  matches(template: string, value: string, startTag = '<', endTag = '>'): boolean {
    return this.compile(template, startTag, endTag).regex.test(value);
  }

  /**
   * Number of compiled patterns held
   */
  get size(): number {
    return this.cache.size;
  }

  clear(): void {
    this.cache.clear();
  }
}
