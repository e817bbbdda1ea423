export { closure } from "./closure.js";
export { ChartParser, createChartParser } from "./chart-parser.js";
export { GrammarConfigurationError } from "./errors.js";
export { deriveGrammar, GrammarDerivation } from "./grammar.js";
export { findAmbiguousLiteral, LiteralTokenizer } from "./lexer.js";
export { createParsable, Parsable, showTree } from "./parsable.js";
export type { Logger, ParsableOptions, ParseOutcome } from "./parsable.js";
export { reconstruct, tagOf } from "./reconstruct.js";
export {
  EMPTY,
  constituents,
  deriveProductions,
  lexicalCategory,
  nonterminal,
  production,
  productionKey,
  terminal,
} from "./symbols.js";
export type { NonterminalOptions } from "./symbols.js";
export type {
  DerivedProduction,
  EmptySymbol,
  Grammar,
  GrammarSymbol,
  LexicalCategory,
  NonterminalSymbol,
  ParseTree,
  Parser,
  ParserFactory,
  ParserOptions,
  Production,
  SynchronousProduction,
  Tokenizer,
  ValueOf,
  ValuesOf,
} from "./types.js";
export * from "./lfg/index.js";
