import type { Grammar, Production } from './Grammar.js';
import { type BodyElement, Terminal, Nonterminal } from './GrammarElement.js';
import type { Token, TokenStream } from './Tokenizer.js';
import { type TextLocation, formatLocation } from './TextLocation.js';

// ─── Public API ────────────────────────────────────────────────────────────────

export type TokenToValue<T, R> = (kind: T, lexeme: string, token: Token<T>) => R;

export interface TraceEvent<S> {
  type: 'rule.enter' | 'rule.match' | 'rule.fail';
  symbol: S;
  /** Token position at which the symbol is being resolved. */
  position: number;
  /** Index of the production that matched, on `rule.match`. */
  production?: number;
}

export interface ParserTracer<S> {
  trace(event: TraceEvent<S>): void;
}

export interface EngineOptions<S> {
  tracer?: ParserTracer<S>;
}

export class SymbolNotFoundError<T, S> extends Error {
  readonly symbol: S;
  readonly expected: string[];
  /** Token at the furthest position reached, or null at the end of input. */
  readonly found: Token<T> | null;
  readonly location: TextLocation;

  constructor(symbol: S, expected: string[], found: Token<T> | null, location: TextLocation) {
    super(describeFailure(symbol, expected, found, location));
    this.name = 'SymbolNotFoundError';
    this.symbol = symbol;
    this.expected = expected;
    this.found = found;
    this.location = location;
  }
}

/**
 * Ordered-choice recursive-descent matcher. Alternatives of a symbol are
 * tried in declaration order and the first that matches wins; a production
 * that starts with its own head cannot be reselected for that immediate call
 * until a token has been consumed.
 *
 * Resolution recurses on the JavaScript call stack. Inputs nested deeply
 * enough to exceed it fail with the engine's `RangeError`, which is not caught.
 */
export class GrammarEngine<T, S, R> {
  private readonly alternatives: ReadonlyMap<S, readonly Production<T, S, R>[]>;
  private readonly tokenToValue: TokenToValue<T, R>;
  private readonly tracer: ParserTracer<S> | null;

  constructor(grammar: Grammar<T, S, R>, tokenToValue: TokenToValue<T, R>, options?: EngineOptions<S>) {
    const alternatives = new Map<S, readonly Production<T, S, R>[]>();
    for (const head of grammar.symbols()) {
      alternatives.set(head, grammar.productionsFor(head));
    }
    this.alternatives = alternatives;
    this.tokenToValue = tokenToValue;
    this.tracer = options?.tracer ?? null;
  }

  analyze(tokens: TokenStream<T>, start: S): R {
    const analysis = new Analysis(this.alternatives, this.tokenToValue, this.tracer, tokens);
    const result = analysis.resolveSymbol(start, new Set());
    if (result.matched) {
      return result.value;
    }
    throw analysis.failure(start);
  }
}

// ─── Internal: Match outcome ───────────────────────────────────────────────────

type FailureKind = 'SymbolNotFound' | 'UnexpectedEnd';

type Match<V> = { matched: true; value: V } | { matched: false; failure: FailureKind };

const SYMBOL_NOT_FOUND = { matched: false, failure: 'SymbolNotFound' } as const;
const UNEXPECTED_END = { matched: false, failure: 'UnexpectedEnd' } as const;

// ─── Internal: Analysis ────────────────────────────────────────────────────────

/** State of one `analyze` call: the cursor and the furthest-failure diagnostics. */
class Analysis<T, S, R> {
  private readonly alternatives: ReadonlyMap<S, readonly Production<T, S, R>[]>;
  private readonly tokenToValue: TokenToValue<T, R>;
  private readonly tracer: ParserTracer<S> | null;
  private readonly tokens: TokenStream<T>;

  private cursor = 0;

  private furthestPos = -1;
  private expectedAtFurthest: Set<string> = new Set();

  constructor(
    alternatives: ReadonlyMap<S, readonly Production<T, S, R>[]>,
    tokenToValue: TokenToValue<T, R>,
    tracer: ParserTracer<S> | null,
    tokens: TokenStream<T>,
  ) {
    this.alternatives = alternatives;
    this.tokenToValue = tokenToValue;
    this.tracer = tracer;
    this.tokens = tokens;
  }

  /**
   * `exclusions` holds production indices barred at this position. The set
   * is shared with every candidate tried here: a clear made while matching a
   * failed candidate is not undone for the next one.
   */
  resolveSymbol(symbol: S, exclusions: Set<number>): Match<R> {
    const entry = this.cursor;
    this.tracer?.trace({ type: 'rule.enter', symbol, position: entry });

    const candidates = (this.alternatives.get(symbol) ?? []).filter(p => !exclusions.has(p.index));
    for (const candidate of candidates) {
      this.cursor = entry;
      const body = this.matchBody(candidate, exclusions);
      if (!body.matched) {
        continue;
      }
      const value = candidate.reducer(body.value);
      this.tracer?.trace({ type: 'rule.match', symbol, position: entry, production: candidate.index });
      return { matched: true, value };
    }

    this.cursor = entry;
    this.tracer?.trace({ type: 'rule.fail', symbol, position: entry });
    return SYMBOL_NOT_FOUND;
  }

  private matchBody(production: Production<T, S, R>, exclusions: Set<number>): Match<R[]> {
    const values: R[] = [];

    for (const [index, element] of production.body.entries()) {
      if (element instanceof Terminal) {
        if (this.tokens.isExhausted(this.cursor)) {
          return this.fail(UNEXPECTED_END, element);
        }
        const token = this.tokens.at(this.cursor);
        if (token === undefined || token.kind !== element.kind) {
          return this.fail(SYMBOL_NOT_FOUND, element);
        }
        this.cursor++;
        exclusions.clear();
        values.push(this.tokenToValue(element.kind, token.lexeme, token));
      } else if (element instanceof Nonterminal) {
        if (this.tokens.isExhausted(this.cursor)) {
          return UNEXPECTED_END;
        }
        const derived = new Set(exclusions);
        if (index === 0) {
          derived.add(production.index);
        }
        const result = this.resolveSymbol(element.symbol, derived);
        if (!result.matched) {
          return result;
        }
        values.push(result.value);
      } else {
        // The sentinel is checked, not consumed: End may match any number of times.
        if (!this.tokens.isEnd(this.cursor)) {
          return this.fail(SYMBOL_NOT_FOUND, element);
        }
        exclusions.clear();
      }
    }

    return { matched: true, value: values };
  }

  // ─── Diagnostics ──────────────────────────────────────────────────────

  private fail<F extends Match<never>>(outcome: F, expected: BodyElement<T, S>): F {
    if (this.cursor > this.furthestPos) {
      this.furthestPos = this.cursor;
      this.expectedAtFurthest = new Set();
    }
    if (this.cursor === this.furthestPos) {
      this.expectedAtFurthest.add(expected.describe());
    }
    return outcome;
  }

  failure(symbol: S): SymbolNotFoundError<T, S> {
    const position = Math.max(this.furthestPos, 0);
    return new SymbolNotFoundError<T, S>(
      symbol,
      [...this.expectedAtFurthest],
      this.tokens.at(position) ?? null,
      this.tokens.locationAt(position),
    );
  }
}

// ─── Utility ────────────────────────────────────────────────────────────────

function describeFailure<T, S>(
  symbol: S,
  expected: string[],
  found: Token<T> | null,
  location: TextLocation,
): string {
  const where = found ? `at ${formatLocation(location)}` : `at end of input (${formatLocation(location)})`;
  if (expected.length === 0) {
    return `No production of '${String(symbol)}' matched ${where}`;
  }
  return `Expected ${expected.join(' or ')} ${where}`;
}
