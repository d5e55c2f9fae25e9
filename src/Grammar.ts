import { type BodyElement, Terminal, Nonterminal, End, bodiesEqual } from './GrammarElement.js';

/**
 * Combines the values matched for a production body (one per terminal or
 * nonterminal, in order) into the parent value. Throwing aborts the whole
 * analysis; it is never treated as a mismatch.
 */
export type Reducer<R> = (values: readonly R[]) => R;

export interface Production<T, S, R> {
  /** Position in the grammar; doubles as the production's identity. */
  readonly index: number;
  readonly head: S;
  readonly body: readonly BodyElement<T, S>[];
  readonly reducer: Reducer<R>;
}

export class Grammar<T, S, R> {
  readonly end = End;
  private readonly declared: Production<T, S, R>[] = [];
  private readonly byHead: Map<S, Production<T, S, R>[]> = new Map();
  private readonly terminals: Map<T, Terminal<T>> = new Map();
  private readonly nonterminals: Map<S, Nonterminal<S>> = new Map();

  /** Terminal element for `kind`; instances are cached per kind. */
  token(kind: T): Terminal<T> {
    let t = this.terminals.get(kind);
    if (!t) {
      t = new Terminal(kind);
      this.terminals.set(kind, t);
    }
    return t;
  }

  /** Nonterminal element for `symbol`; instances are cached per symbol. */
  symbol(symbol: S): Nonterminal<S> {
    let n = this.nonterminals.get(symbol);
    if (!n) {
      n = new Nonterminal(symbol);
      this.nonterminals.set(symbol, n);
    }
    return n;
  }

  /** Append a production. Alternatives of one head are tried in the order they are added. */
  production(head: S, body: readonly BodyElement<T, S>[], reducer: Reducer<R>): this {
    if (body.length === 0) {
      throw new Error(`Production for '${String(head)}' has an empty body`);
    }
    const production: Production<T, S, R> = Object.freeze({
      index: this.declared.length,
      head,
      body: Object.freeze([...body]),
      reducer,
    });
    this.declared.push(production);

    let alternatives = this.byHead.get(head);
    if (!alternatives) {
      alternatives = [];
      this.byHead.set(head, alternatives);
    }
    alternatives.push(production);
    return this;
  }

  get productions(): readonly Production<T, S, R>[] {
    return [...this.declared];
  }

  productionsFor(head: S): readonly Production<T, S, R>[] {
    return [...(this.byHead.get(head) ?? [])];
  }

  /** Heads in order of their first production. */
  symbols(): S[] {
    return [...this.byHead.keys()];
  }

  /** First production of `head` whose body is structurally equal to `body`. */
  find(head: S, body: readonly BodyElement<T, S>[]): Production<T, S, R> | undefined {
    return this.byHead.get(head)?.find(p => bodiesEqual(p.body, body));
  }
}
