import type { Grammar } from './Grammar.js';
import { GrammarEngine, type EngineOptions, type TokenToValue } from './GrammarEngine.js';
import { Tokenizer, type TokenDefinition, type TokenPattern, type TokenizerOptions } from './Tokenizer.js';

export interface CompilerConfig<T, S, R> {
  tokens: readonly TokenDefinition<T>[];
  whitespace?: readonly TokenPattern[];
  grammar: Grammar<T, S, R>;
  start: S;
  tokenToValue: TokenToValue<T, R>;
  tokenizer?: TokenizerOptions;
  engine?: EngineOptions<S>;
}

/** Tokenizes and analyzes text in one call. */
export class Compiler<T, S, R> {
  readonly tokenizer: Tokenizer<T>;
  readonly engine: GrammarEngine<T, S, R>;
  readonly start: S;

  constructor(config: CompilerConfig<T, S, R>) {
    this.tokenizer = new Tokenizer(config.tokens, config.whitespace ?? [], config.tokenizer);
    this.engine = new GrammarEngine(config.grammar, config.tokenToValue, config.engine);
    this.start = config.start;
  }

  compile(text: string, start: S = this.start): R {
    return this.engine.analyze(this.tokenizer.tokenize(text), start);
  }
}
