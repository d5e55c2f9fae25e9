import { type TextLocation, START_OF_TEXT, advanceLocation, formatLocation } from './TextLocation.js';

// ─── Public API ────────────────────────────────────────────────────────────────

/** Regular-expression source, or a `RegExp` whose `i`, `m`, `s` and `u` flags are kept. */
export type TokenPattern = RegExp | string;

export type TokenDefinition<T> = readonly [kind: T, pattern: TokenPattern];

export interface TokenizerOptions {
  /** Code points of unmatched input quoted by a NoMatchError. Defaults to 10. */
  diagnosticLength?: number;
}

export interface Token<T> {
  readonly kind: T;
  readonly lexeme: string;
  readonly start: TextLocation;
  readonly end: TextLocation;
}

export class PatternCompileError extends Error {
  readonly pattern: string;
  readonly kind: string;

  constructor(pattern: string, kind: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Invalid pattern for ${kind}: /${pattern}/ (${reason})`, { cause });
    this.name = 'PatternCompileError';
    this.pattern = pattern;
    this.kind = kind;
  }
}

export class NoMatchError extends Error {
  readonly remainder: string;
  readonly location: TextLocation;

  constructor(remainder: string, location: TextLocation) {
    super(`No token pattern matches at ${formatLocation(location)}: ${JSON.stringify(remainder)}`);
    this.name = 'NoMatchError';
    this.remainder = remainder;
    this.location = location;
  }
}

/**
 * Tokens produced by one `tokenize` call. Position `length` is the implicit
 * End sentinel; positions past it are exhausted.
 */
export class TokenStream<T> {
  readonly tokens: readonly Token<T>[];
  /** Location of the End sentinel, i.e. the end of the input. */
  readonly end: TextLocation;

  constructor(tokens: readonly Token<T>[], end: TextLocation) {
    this.tokens = Object.freeze([...tokens]);
    this.end = end;
    Object.freeze(this);
  }

  get length(): number {
    return this.tokens.length;
  }

  /** The token at `position`, or undefined at the End sentinel and beyond. */
  at(position: number): Token<T> | undefined {
    return position >= 0 && position < this.tokens.length ? this.tokens[position] : undefined;
  }

  isEnd(position: number): boolean {
    return position === this.tokens.length;
  }

  isExhausted(position: number): boolean {
    return position > this.tokens.length;
  }

  locationAt(position: number): TextLocation {
    return this.at(position)?.start ?? this.end;
  }

  kinds(): T[] {
    return this.tokens.map(t => t.kind);
  }
}

export class Tokenizer<T> {
  readonly diagnosticLength: number;
  private readonly patterns: readonly { kind: T; regex: RegExp }[];
  private readonly whitespace: readonly RegExp[];

  constructor(
    tokenPatterns: readonly TokenDefinition<T>[],
    whitespacePatterns: readonly TokenPattern[] = [],
    options?: TokenizerOptions,
  ) {
    const diagnosticLength = options?.diagnosticLength ?? 10;
    if (!Number.isInteger(diagnosticLength) || diagnosticLength < 0) {
      throw new Error(`diagnosticLength must be a non-negative integer, got ${diagnosticLength}`);
    }
    this.diagnosticLength = diagnosticLength;
    this.patterns = tokenPatterns.map(([kind, pattern]) => ({
      kind,
      regex: compilePattern(pattern, String(kind)),
    }));
    this.whitespace = whitespacePatterns.map(pattern => compilePattern(pattern, 'whitespace'));
  }

  tokenize(text: string): TokenStream<T> {
    const tokens: Token<T>[] = [];
    let offset = 0;
    let location = START_OF_TEXT;

    while (offset < text.length) {
      const next = this.skipWhitespace(text, offset);
      location = advanceLocation(location, text.slice(offset, next));
      offset = next;
      if (offset >= text.length) break;

      const match = this.matchToken(text, offset);
      if (!match) {
        throw new NoMatchError(this.excerpt(text, offset), location);
      }
      const end = advanceLocation(location, match.lexeme);
      tokens.push(Object.freeze({ kind: match.kind, lexeme: match.lexeme, start: location, end }));
      offset += match.lexeme.length;
      location = end;
    }

    return new TokenStream(tokens, location);
  }

  /** At most `diagnosticLength` code points, so a surrogate pair is never split. */
  private excerpt(text: string, offset: number): string {
    const window = text.slice(offset, offset + 2 * this.diagnosticLength);
    return Array.from(window).slice(0, this.diagnosticLength).join('');
  }

  // ─── Matching ─────────────────────────────────────────────────────────

  /** Restarts from the first whitespace pattern after every skip. */
  private skipWhitespace(text: string, offset: number): number {
    let pos = offset;
    let skipped = true;
    while (skipped && pos < text.length) {
      skipped = false;
      for (const pattern of this.whitespace) {
        const lexeme = matchAt(pattern, text, pos);
        if (lexeme !== null) {
          pos += lexeme.length;
          skipped = true;
          break;
        }
      }
    }
    return pos;
  }

  private matchToken(text: string, offset: number): { kind: T; lexeme: string } | null {
    for (const { kind, regex } of this.patterns) {
      const lexeme = matchAt(regex, text, offset);
      if (lexeme !== null) {
        return { kind, lexeme };
      }
    }
    return null;
  }
}

// ─── Utility ────────────────────────────────────────────────────────────────

function compilePattern(pattern: TokenPattern, kind: string): RegExp {
  const source = typeof pattern === 'string' ? pattern : pattern.source;
  const flags = typeof pattern === 'string' ? '' : pattern.flags.replace(/[gy]/g, '');
  try {
    return new RegExp(source, `${flags}y`);
  } catch (error: unknown) {
    throw new PatternCompileError(source, kind, error);
  }
}

/** Sticky match at `offset`; empty matches count as no match. */
function matchAt(regex: RegExp, text: string, offset: number): string | null {
  regex.lastIndex = offset;
  const m = regex.exec(text);
  return m && m[0].length > 0 ? m[0] : null;
}
