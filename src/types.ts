/**
 * A grammar symbol. Symbols are compared by identity: two nonterminals with
 * identical productions are still different symbols.
 *
 * The three variants are the capabilities a symbol can have:
 *   nonterminal: owns synchronous productions and builds a typed value
 *   lexical: a terminal class defined by a membership predicate
 *   empty: matches nothing, never yields a value
 */
export type GrammarSymbol = NonterminalSymbol<unknown> | LexicalCategory | EmptySymbol;

/**
 * A nonterminal that doubles as a reconstruction target for values of type `A`.
 *
 * Declared through `nonterminal()`; productions are resolved lazily so that
 * symbols may reference themselves and each other.
 */
export interface NonterminalSymbol<A> {
  readonly kind: "nonterminal";
  /** Process-unique handle, used to build production keys */
  readonly id: number;
  readonly name: string;
  /** Extra literal tokens owned by this symbol */
  readonly tokens: ReadonlySet<string>;
  /** The declared (constituents → constructor) pairs, in declaration order */
  readonly synchronousProductions: readonly SynchronousProduction<A>[];
  /** Declared productions keyed by `productionKey(head, rhs)`, derived once */
  readonly processedProductions: ReadonlyMap<string, DerivedProduction<A>>;
}

/**
 * A terminal class. Terminals for literal strings (`terminal("AND")`) are
 * lexical categories whose predicate is string equality and which own the
 * literal as a token.
 */
export interface LexicalCategory {
  readonly kind: "lexical";
  readonly id: number;
  readonly name: string;
  readonly tokens: ReadonlySet<string>;
  member(token: string): boolean;
}

/** The explicit "no value" symbol. */
export interface EmptySymbol {
  readonly kind: "empty";
  readonly id: number;
  readonly name: string;
  readonly tokens: ReadonlySet<string>;
}

/**
 * A declared production paired with its constructor.
 *
 * `construct` receives the reconstructed values of the constituents in order
 * and returns the value, or `undefined` to decline the derivation.
 */
export type SynchronousProduction<A> = {
  rhs: readonly GrammarSymbol[];
  construct: (values: readonly unknown[]) => A | undefined;
};

/** A production as handed to a parsing engine: head plus ordered child tags. */
export type Production = {
  head: NonterminalSymbol<unknown>;
  rhs: readonly GrammarSymbol[];
  /** Stable identity of the (head, rhs) pair */
  key: string;
};

/** A production together with the constructor it was declared with. */
export type DerivedProduction<A> = {
  production: Production;
  construct: (values: readonly unknown[]) => A | undefined;
};

/** Value type carried by a symbol: `A` for nonterminals, the token for lexical categories. */
export type ValueOf<S> = S extends NonterminalSymbol<infer A>
  ? A
  : S extends LexicalCategory
    ? string
    : never;

/** Per-position value types for a constituent sequence. */
export type ValuesOf<S extends readonly GrammarSymbol[]> = {
  readonly [K in keyof S]: ValueOf<S[K]>;
};

/**
 * A parse tree node.
 *
 * The tag of a node is the symbol it was derived from: `symbol` for
 * terminals, `head` for nonterminals, `EMPTY` for empty nodes.
 */
export type ParseTree =
  | { kind: "terminal"; symbol: LexicalCategory; token: string }
  | { kind: "nonterminal"; head: NonterminalSymbol<unknown>; children: readonly ParseTree[] }
  | { kind: "empty" };

/**
 * Closed grammar description consumed by a parsing engine.
 */
export type Grammar = {
  productions: readonly Production[];
  lexicalCategories: readonly LexicalCategory[];
  startSymbols: readonly GrammarSymbol[];
};

/** Splits a string into tokens by longest match over a fixed literal set. */
export interface Tokenizer {
  tokenize(input: string): string[];
}

/** Produces every parse tree of a token sequence under a fixed grammar. */
export interface Parser {
  parse(tokens: readonly string[]): ParseTree[];
}

/** Engine settings shared by every parser factory. */
export type ParserOptions = {
  /** Upper bound on trees kept per chart cell (and returned). Default 256. */
  maxTrees?: number;
};

/** Builds a parser for a grammar. The default is `createChartParser`. */
export type ParserFactory = (grammar: Grammar, options: ParserOptions) => Parser;
