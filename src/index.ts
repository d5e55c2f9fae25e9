export { Grammar } from './Grammar.js';
export type { Production, Reducer } from './Grammar.js';

export {
  GrammarElement,
  Terminal,
  Nonterminal,
  EndMarker,
  End,
  bodiesEqual,
} from './GrammarElement.js';
export type { BodyElement } from './GrammarElement.js';

export { Tokenizer, TokenStream, PatternCompileError, NoMatchError } from './Tokenizer.js';
export type { Token, TokenDefinition, TokenPattern, TokenizerOptions } from './Tokenizer.js';

export { GrammarEngine, SymbolNotFoundError } from './GrammarEngine.js';
export type { EngineOptions, ParserTracer, TokenToValue, TraceEvent } from './GrammarEngine.js';

export { Compiler } from './Compiler.js';
export type { CompilerConfig } from './Compiler.js';

export { START_OF_TEXT, advanceLocation, formatLocation } from './TextLocation.js';
export type { TextLocation } from './TextLocation.js';
