import { closure } from "./closure.js";
import { LiteralTokenizer } from "./lexer.js";
import type { Grammar, GrammarSymbol, LexicalCategory, Production } from "./types.js";

/**
 * Everything derived from a root symbol: its closure, the productions of
 * every nonterminal in `closure ∪ {root}`, the lexical categories, the
 * literal tokens, the tokenizer and the grammar description.
 *
 * Each member is computed on first access and kept.
 */
export class GrammarDerivation {
  private cachedProductions: readonly Production[] | undefined;
  private cachedLexicalCategories: readonly LexicalCategory[] | undefined;
  private cachedTokens: ReadonlySet<string> | undefined;
  private cachedTokenizer: LiteralTokenizer | undefined;
  private cachedGrammar: Grammar | undefined;

  constructor(readonly root: GrammarSymbol) {}

  get closure(): ReadonlySet<GrammarSymbol> {
    return closure(this.root);
  }

  /** `closure ∪ {root}`, root first */
  get symbols(): GrammarSymbol[] {
    return [this.root, ...this.closure];
  }

  get productions(): readonly Production[] {
    if (this.cachedProductions === undefined) {
      const productions: Production[] = [];
      for (const symbol of this.symbols) {
        if (symbol.kind !== "nonterminal") continue;
        for (const derived of symbol.processedProductions.values()) {
          productions.push(derived.production);
        }
      }
      this.cachedProductions = productions;
    }
    return this.cachedProductions;
  }

  get lexicalCategories(): readonly LexicalCategory[] {
    if (this.cachedLexicalCategories === undefined) {
      this.cachedLexicalCategories = this.symbols.filter(
        (s): s is LexicalCategory => s.kind === "lexical",
      );
    }
    return this.cachedLexicalCategories;
  }

  get tokens(): ReadonlySet<string> {
    if (this.cachedTokens === undefined) {
      this.cachedTokens = new Set(this.symbols.flatMap((s) => [...s.tokens]));
    }
    return this.cachedTokens;
  }

  /** Throws `GrammarConfigurationError` when the token set is ambiguous. */
  get tokenizer(): LiteralTokenizer {
    if (this.cachedTokenizer === undefined) {
      this.cachedTokenizer = new LiteralTokenizer(this.tokens);
    }
    return this.cachedTokenizer;
  }

  get grammar(): Grammar {
    if (this.cachedGrammar === undefined) {
      this.cachedGrammar = {
        productions: this.productions,
        lexicalCategories: this.lexicalCategories,
        startSymbols: [this.root],
      };
    }
    return this.cachedGrammar;
  }
}

const derivations = new WeakMap<GrammarSymbol, GrammarDerivation>();

/** The (cached) derivation for a root symbol. */
export function deriveGrammar(root: GrammarSymbol): GrammarDerivation {
  let derivation = derivations.get(root);
  if (!derivation) {
    derivation = new GrammarDerivation(root);
    derivations.set(root, derivation);
  }
  return derivation;
}
