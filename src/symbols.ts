import { GrammarConfigurationError } from "./errors.js";
import type {
  DerivedProduction,
  EmptySymbol,
  GrammarSymbol,
  LexicalCategory,
  NonterminalSymbol,
  SynchronousProduction,
  ValuesOf,
} from "./types.js";

let nextId = 0;

function allocateId(): number {
  return nextId++;
}

/** Stable string key for a (head, child tags) pair */
export function productionKey(head: GrammarSymbol, rhs: readonly GrammarSymbol[]): string {
  return `${head.id}:${rhs.map((s) => s.id).join(",")}`;
}

export type NonterminalOptions = {
  /** Literal tokens owned by this symbol in addition to its terminals */
  tokens?: Iterable<string>;
};

/**
 * Declare a nonterminal. `declare` runs once, the first time the productions
 * are needed, so it may mention the symbol being declared:
 *
 * ```ts
 * const List: NonterminalSymbol<string[]> = nonterminal("List", () => [
 *   production([Word], (w) => [w]),
 *   production([Word, terminal(","), List], (w, _comma, rest) => [w, ...rest]),
 * ]);
 * ```
 */
export function nonterminal<A>(
  name: string,
  declare: () => readonly SynchronousProduction<A>[],
  options: NonterminalOptions = {},
): NonterminalSymbol<A> {
  let declared: readonly SynchronousProduction<A>[] | undefined;
  let processed: ReadonlyMap<string, DerivedProduction<A>> | undefined;

  const symbol: NonterminalSymbol<A> = {
    kind: "nonterminal",
    id: allocateId(),
    name,
    tokens: new Set(options.tokens ?? []),
    get synchronousProductions() {
      if (declared === undefined) declared = declare();
      return declared;
    },
    get processedProductions() {
      if (processed === undefined) processed = deriveProductions(symbol);
      return processed;
    },
  };
  return symbol;
}

/**
 * Turn a nonterminal's declared productions into engine productions headed by
 * that symbol, keyed by `productionKey`.
 *
 * Throws `GrammarConfigurationError` when the same constituent sequence is
 * declared twice.
 */
export function deriveProductions<A>(
  head: NonterminalSymbol<A>,
): ReadonlyMap<string, DerivedProduction<A>> {
  const derived = new Map<string, DerivedProduction<A>>();
  for (const { rhs, construct } of head.synchronousProductions) {
    const key = productionKey(head, rhs);
    if (derived.has(key)) {
      throw new GrammarConfigurationError(
        `"${head.name}" declares the production ${head.name} -> ${rhs.map((s) => s.name).join(" ")} more than once`,
      );
    }
    derived.set(key, { production: { head, rhs, key }, construct });
  }
  return derived;
}

function hasArity<S extends readonly GrammarSymbol[]>(
  rhs: S,
  values: readonly unknown[],
): values is ValuesOf<S> {
  return values.length === rhs.length;
}

/**
 * Pair a constituent sequence with a constructor. The constructor sees one
 * argument per constituent: the token for lexical categories, the
 * reconstructed value for nonterminals.
 */
export function production<const S extends readonly GrammarSymbol[], A>(
  rhs: S,
  construct: (...values: ValuesOf<S>) => A | undefined,
): SynchronousProduction<A> {
  return {
    rhs,
    construct: (values) => (hasArity(rhs, values) ? construct(...values) : undefined),
  };
}

/** Declare a terminal class by a membership predicate. Owns no tokens. */
export function lexicalCategory(name: string, member: (token: string) => boolean): LexicalCategory {
  return { kind: "lexical", id: allocateId(), name, tokens: new Set<string>(), member };
}

const terminals = new Map<string, LexicalCategory>();

/**
 * The terminal for a literal string. Interned: every call with the same
 * literal returns the same symbol.
 */
export function terminal(literal: string): LexicalCategory {
  const known = terminals.get(literal);
  if (known) return known;
  if (literal.length === 0 || /\s/.test(literal)) {
    throw new GrammarConfigurationError(
      `Terminal literal ${JSON.stringify(literal)} must be non-empty and contain no whitespace`,
      [literal],
    );
  }
  const symbol: LexicalCategory = {
    kind: "lexical",
    id: allocateId(),
    name: JSON.stringify(literal),
    tokens: new Set([literal]),
    member: (token) => token === literal,
  };
  terminals.set(literal, symbol);
  return symbol;
}

/** Matches nothing; reconstruction of an empty node always fails. */
export const EMPTY: EmptySymbol = {
  kind: "empty",
  id: allocateId(),
  name: "ε",
  tokens: new Set<string>(),
};

/** Direct constituents of a symbol across all of its declared productions. */
export function constituents(symbol: GrammarSymbol): GrammarSymbol[] {
  if (symbol.kind !== "nonterminal") return [];
  return symbol.synchronousProductions.flatMap((p) => p.rhs);
}
