/**
 * Pattern compiler: turns a route pattern into an anchored regular expression.
 *
 * Typed placeholders (`<int:id>`) take precedence over untyped ones
 * (`<slug>`). A pattern with at least one typed placeholder compiles in
 * typed mode and any `<name>` token in it stays literal text (a known
 * limitation of mixed patterns).
 */

import { InvalidPatternError, UnknownConverterKindError } from "~/errors/mod.ts";
import {
  isConverterKind,
  lookupConverter,
  stringConverter,
} from "~/router/converters.ts";
import type {
  CompiledPattern,
  ConverterKind,
  PatternMode,
} from "~/router/types.ts";

const TYPED_PLACEHOLDER = /<(\w+):(\w+)>/;
const UNTYPED_PLACEHOLDER = /<(\w+)>/;
const IDENTIFIER = /^[A-Za-z_]\w*$/;
const REGEX_SPECIALS = /[.*+?^${}()|[\]\\]/g;

export function escapeRegExp(text: string): string {
  return text.replace(REGEX_SPECIALS, "\\$&");
}

interface Placeholder {
  start: number;
  end: number;
  name: string;
  kind: ConverterKind;
}

function scan(pattern: string, placeholder: RegExp): RegExpExecArray[] {
  const re = new RegExp(placeholder.source, "g");
  const found: RegExpExecArray[] = [];
  let m: RegExpExecArray | null;
  while ((m = re.exec(pattern)) !== null) {
    found.push(m);
  }
  return found;
}

function typedPlaceholders(pattern: string): Placeholder[] {
  return scan(pattern, TYPED_PLACEHOLDER).map((m) => {
    const [token, kind, name] = m;
    if (!isConverterKind(kind)) {
      throw new UnknownConverterKindError(kind, pattern);
    }
    return { start: m.index, end: m.index + token.length, name, kind };
  });
}

function untypedPlaceholders(pattern: string): Placeholder[] {
  return scan(pattern, UNTYPED_PLACEHOLDER).map((m) => {
    const [token, name] = m;
    return {
      start: m.index,
      end: m.index + token.length,
      name,
      kind: stringConverter.name,
    };
  });
}

function buildRegex(
  pattern: string,
  placeholders: Placeholder[],
): RegExp {
  const seen = new Set<string>();
  let source = "^";
  let last = 0;

  for (const p of placeholders) {
    if (!IDENTIFIER.test(p.name)) {
      throw new InvalidPatternError(
        pattern,
        `"${p.name}" is not a valid parameter name`,
      );
    }
    if (seen.has(p.name)) {
      throw new InvalidPatternError(
        pattern,
        `parameter "${p.name}" appears more than once`,
      );
    }
    seen.add(p.name);

    source += escapeRegExp(pattern.slice(last, p.start));
    source += `(?<${p.name}>${lookupConverter(p.kind).regex})`;
    last = p.end;
  }

  source += escapeRegExp(pattern.slice(last)) + "$";
  return new RegExp(source);
}

/**
 * Compile a normalized pattern. Pure: the result depends only on the
 * pattern text and the converter registry.
 */
export function compilePattern(pattern: string): CompiledPattern {
  let mode: PatternMode = "typed";
  let placeholders = typedPlaceholders(pattern);

  if (placeholders.length === 0) {
    placeholders = untypedPlaceholders(pattern);
    mode = placeholders.length > 0 ? "untyped" : "literal";
  }

  return {
    pattern,
    mode,
    regex: buildRegex(pattern, placeholders),
    kinds: placeholders.map((p) => p.kind),
    names: placeholders.map((p) => p.name),
  };
}

export interface PatternCompilerOptions {
  /** Memoize compiled patterns by pattern text (default: true). */
  cache?: boolean;
}

/**
 * Compiles patterns on demand, optionally memoizing the result.
 * Failed compilations are never cached.
 */
export class PatternCompiler {
  private cache: Map<string, CompiledPattern> | null;

  constructor(options: PatternCompilerOptions = {}) {
    this.cache = options.cache === false ? null : new Map();
  }

  compile(pattern: string): CompiledPattern {
    if (!this.cache) return compilePattern(pattern);

    let compiled = this.cache.get(pattern);
    if (!compiled) {
      compiled = compilePattern(pattern);
      this.cache.set(pattern, compiled);
    }
    return compiled;
  }

  getCacheSize(): number {
    return this.cache?.size ?? 0;
  }

  clear(): void {
    this.cache?.clear();
  }
}
