import { EMPTY, productionKey } from "./symbols.js";
import type {
  EmptySymbol,
  GrammarSymbol,
  LexicalCategory,
  NonterminalSymbol,
  ParseTree,
} from "./types.js";

/** The symbol a parse tree node was derived from. */
export function tagOf(tree: ParseTree): GrammarSymbol {
  switch (tree.kind) {
    case "terminal":
      return tree.symbol;
    case "nonterminal":
      return tree.head;
    case "empty":
      return EMPTY;
  }
}

/**
 * Rebuild the value a parse tree stands for, as seen from `symbol`.
 *
 * Returns `undefined` (a reconstruction mismatch, not an error) when:
 *   - a nonterminal node's exact (head, child tags) key was not declared by `symbol`
 *   - any child fails to reconstruct
 *   - the matching constructor declines
 *   - a terminal's token is not a member of `symbol`'s category
 *   - the node is empty
 */
export function reconstruct<A>(symbol: NonterminalSymbol<A>, tree: ParseTree): A | undefined;
export function reconstruct(symbol: LexicalCategory, tree: ParseTree): string | undefined;
export function reconstruct(symbol: EmptySymbol, tree: ParseTree): undefined;
export function reconstruct(symbol: GrammarSymbol, tree: ParseTree): unknown;
export function reconstruct(symbol: GrammarSymbol, tree: ParseTree): unknown {
  switch (symbol.kind) {
    case "nonterminal":
      return reconstructNonterminal(symbol, tree);
    case "lexical":
      return tree.kind === "terminal" && tree.symbol === symbol && symbol.member(tree.token)
        ? tree.token
        : undefined;
    case "empty":
      return undefined;
  }
}

function reconstructNonterminal<A>(symbol: NonterminalSymbol<A>, tree: ParseTree): A | undefined {
  if (tree.kind !== "nonterminal") return undefined;

  const derived = symbol.processedProductions.get(
    productionKey(tree.head, tree.children.map(tagOf)),
  );
  if (!derived) return undefined;

  const values: unknown[] = [];
  for (const child of tree.children) {
    const value = reconstruct(tagOf(child), child);
    if (value === undefined) return undefined;
    values.push(value);
  }
  return derived.construct(values);
}
