import { describe, it, expect } from 'vitest';
import {
  Grammar,
  Terminal,
  Nonterminal,
  EndMarker,
  End,
  bodiesEqual,
} from '../src/index.js';

type Tok = 'NUM' | 'PLUS' | 'LPAREN' | 'RPAREN';
type Sym = 'Expr' | 'Term';

const first = (values: readonly string[]) => values[0];

describe('Grammar elements', () => {
  it('caches terminals and nonterminals per grammar', () => {
    const g = new Grammar<Tok, Sym, string>();
    expect(g.token('NUM')).toBe(g.token('NUM'));
    expect(g.symbol('Expr')).toBe(g.symbol('Expr'));
    expect(g.token('NUM')).toBeInstanceOf(Terminal);
    expect(g.symbol('Expr')).toBeInstanceOf(Nonterminal);
    expect(g.token('NUM').kind).toBe('NUM');
    expect(g.symbol('Term').symbol).toBe('Term');
  });

  it('compares elements structurally', () => {
    const g = new Grammar<Tok, Sym, string>();
    expect(new Terminal('NUM').equals(g.token('NUM'))).toBe(true);
    expect(new Terminal('NUM').equals(g.token('PLUS'))).toBe(false);
    expect(new Nonterminal('NUM').equals(new Terminal('NUM'))).toBe(false);
    expect(End.equals(EndMarker.of())).toBe(true);
    expect(End.equals(g.token('NUM'))).toBe(false);
  });

  it('shares one End marker', () => {
    expect(EndMarker.of()).toBe(End);
    expect(new Grammar<Tok, Sym, string>().end).toBe(End);
  });

  it('describes elements for diagnostics', () => {
    const g = new Grammar<Tok, Sym, string>();
    expect(g.token('PLUS').describe()).toBe('PLUS');
    expect(g.symbol('Term').describe()).toBe('Term');
    expect(End.describe()).toBe('end of input');
  });

  it('compares bodies element by element', () => {
    const g = new Grammar<Tok, Sym, string>();
    const body = [g.symbol('Expr'), g.token('PLUS'), g.symbol('Term')];
    expect(bodiesEqual(body, [new Nonterminal<Sym>('Expr'), new Terminal<Tok>('PLUS'), new Nonterminal<Sym>('Term')])).toBe(true);
    expect(bodiesEqual(body, [g.symbol('Expr'), g.token('PLUS')])).toBe(false);
    expect(bodiesEqual([g.token('NUM'), End], [g.token('NUM'), End])).toBe(true);
  });
});

describe('Grammar productions', () => {
  function arithmetic(): Grammar<Tok, Sym, string> {
    const g = new Grammar<Tok, Sym, string>();
    return g
      .production('Expr', [g.symbol('Expr'), g.token('PLUS'), g.symbol('Term')], v => `${v[0]}+${v[2]}`)
      .production('Term', [g.token('LPAREN'), g.symbol('Expr'), g.token('RPAREN')], v => v[1])
      .production('Expr', [g.symbol('Term')], first)
      .production('Term', [g.token('NUM')], first);
  }

  it('numbers productions in declaration order', () => {
    const g = arithmetic();
    expect(g.productions.map(p => [p.index, p.head])).toEqual([
      [0, 'Expr'],
      [1, 'Term'],
      [2, 'Expr'],
      [3, 'Term'],
    ]);
  });

  it('groups alternatives by head, keeping their order', () => {
    const g = arithmetic();
    expect(g.productionsFor('Expr').map(p => p.index)).toEqual([0, 2]);
    expect(g.productionsFor('Term').map(p => p.index)).toEqual([1, 3]);
    expect(g.symbols()).toEqual(['Expr', 'Term']);
  });

  it('returns an empty list for a head with no productions', () => {
    const g = new Grammar<Tok, Sym, string>();
    expect(g.productionsFor('Expr')).toEqual([]);
    expect(g.symbols()).toEqual([]);
  });

  it('finds a production by head and body', () => {
    const g = arithmetic();
    expect(g.find('Term', [g.token('NUM')])?.index).toBe(3);
    expect(g.find('Expr', [g.token('NUM')])).toBeUndefined();
  });

  it('freezes productions and hands out copies', () => {
    const g = arithmetic();
    const production = g.productions[0];
    expect(Object.isFrozen(production)).toBe(true);
    expect(Object.isFrozen(production.body)).toBe(true);
    expect(g.productions).not.toBe(g.productions);
    expect(production.reducer(['1', '+', '2'])).toBe('1+2');
  });

  it('copies the body it is given', () => {
    const g = new Grammar<Tok, Sym, string>();
    const body = [g.token('NUM')];
    g.production('Term', body, first);
    body.push(g.token('PLUS'));
    expect(g.productions[0].body).toHaveLength(1);
  });

  it('rejects an empty body', () => {
    const g = new Grammar<Tok, Sym, string>();
    expect(() => g.production('Expr', [], first)).toThrow("Production for 'Expr' has an empty body");
  });
});
