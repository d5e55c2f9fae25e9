export abstract class GrammarElement {
  abstract describe(): string;
  abstract equals(other: GrammarElement): boolean;
}

/** Matches one token of the given kind. */
export class Terminal<T> extends GrammarElement {
  readonly kind: T;

  constructor(kind: T) {
    super();
    this.kind = kind;
  }

  describe(): string {
    return String(this.kind);
  }

  equals(other: GrammarElement): boolean {
    return other instanceof Terminal && Object.is(other.kind, this.kind);
  }
}

/** Expands through the productions whose head is `symbol`. */
export class Nonterminal<S> extends GrammarElement {
  readonly symbol: S;

  constructor(symbol: S) {
    super();
    this.symbol = symbol;
  }

  describe(): string {
    return String(this.symbol);
  }

  equals(other: GrammarElement): boolean {
    return other instanceof Nonterminal && Object.is(other.symbol, this.symbol);
  }
}

/** Matches only the End sentinel of a token stream and contributes no value. */
export class EndMarker extends GrammarElement {
  private static instance: EndMarker | null = null;

  private constructor() {
    super();
  }

  static of(): EndMarker {
    if (!EndMarker.instance) {
      EndMarker.instance = new EndMarker();
    }
    return EndMarker.instance;
  }

  describe(): string {
    return 'end of input';
  }

  equals(other: GrammarElement): boolean {
    return other === this;
  }
}

export const End = EndMarker.of();

export type BodyElement<T, S> = Terminal<T> | Nonterminal<S> | EndMarker;

export function bodiesEqual<T, S>(a: readonly BodyElement<T, S>[], b: readonly BodyElement<T, S>[]): boolean {
  return a.length === b.length && a.every((element, i) => element.equals(b[i]));
}
