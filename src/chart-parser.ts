/**
 * Default parsing engine: a memoized span parser over arbitrary productions.
 *
 * `trees(symbol, i, j)` is every derivation of `symbol` covering tokens
 * `[i, j)`. Lexical categories match single tokens, the empty symbol matches
 * empty spans, and nonterminals split the span across each production's
 * constituents, guided by the minimum length each symbol can cover.
 *
 * Unary and empty cycles (A -> B -> A over one span) are cut on re-entry, so
 * only finite trees are produced.
 */
import type {
  Grammar,
  GrammarSymbol,
  ParseTree,
  Parser,
  ParserOptions,
  Production,
} from "./types.js";

const DEFAULT_MAX_TREES = 256;

/** Minimum number of tokens each symbol can cover (Infinity when underivable). */
function minimumLengths(grammar: Grammar): Map<GrammarSymbol, number> {
  const lengths = new Map<GrammarSymbol, number>();
  const lengthOf = (symbol: GrammarSymbol): number => {
    if (symbol.kind === "lexical") return 1;
    if (symbol.kind === "empty") return 0;
    return lengths.get(symbol) ?? Infinity;
  };

  let changed = true;
  while (changed) {
    changed = false;
    for (const { head, rhs } of grammar.productions) {
      const length = rhs.reduce((sum, s) => sum + lengthOf(s), 0);
      if (length < lengthOf(head)) {
        lengths.set(head, length);
        changed = true;
      }
    }
  }
  return lengths;
}

export class ChartParser implements Parser {
  private readonly byHead = new Map<GrammarSymbol, Production[]>();
  private readonly minLength: Map<GrammarSymbol, number>;
  private readonly maxTrees: number;

  constructor(
    readonly grammar: Grammar,
    options: ParserOptions = {},
  ) {
    this.maxTrees = Math.max(1, options.maxTrees ?? DEFAULT_MAX_TREES);
    for (const production of grammar.productions) {
      const rows = this.byHead.get(production.head) ?? [];
      rows.push(production);
      this.byHead.set(production.head, rows);
    }
    this.minLength = minimumLengths(grammar);
  }

  parse(tokens: readonly string[]): ParseTree[] {
    const memo = new Map<string, ParseTree[]>();
    const inProgress = new Set<string>();
    // Bumped whenever a cycle is cut; results computed across a cut are not memoized.
    let cuts = 0;

    const lengthOf = (symbol: GrammarSymbol): number => {
      if (symbol.kind === "lexical") return 1;
      if (symbol.kind === "empty") return 0;
      return this.minLength.get(symbol) ?? Infinity;
    };

    const trees = (symbol: GrammarSymbol, i: number, j: number): ParseTree[] => {
      if (symbol.kind === "lexical") {
        return j === i + 1 && symbol.member(tokens[i])
          ? [{ kind: "terminal", symbol, token: tokens[i] }]
          : [];
      }
      if (symbol.kind === "empty") {
        return i === j ? [{ kind: "empty" }] : [];
      }
      if (j - i < lengthOf(symbol)) return [];

      const key = `${symbol.id}@${i}:${j}`;
      const cached = memo.get(key);
      if (cached) return cached;
      if (inProgress.has(key)) {
        cuts++;
        return [];
      }
      inProgress.add(key);
      const cutsBefore = cuts;

      const out: ParseTree[] = [];
      for (const production of this.byHead.get(symbol) ?? []) {
        for (const children of sequences(production.rhs, 0, i, j)) {
          if (out.length >= this.maxTrees) break;
          out.push({ kind: "nonterminal", head: production.head, children });
        }
      }

      inProgress.delete(key);
      if (cuts === cutsBefore) memo.set(key, out);
      return out;
    };

    const sequences = (
      rhs: readonly GrammarSymbol[],
      k: number,
      i: number,
      j: number,
    ): (readonly ParseTree[])[] => {
      if (k === rhs.length) return i === j ? [[]] : [];
      let rest = 0;
      for (let r = k + 1; r < rhs.length; r++) rest += lengthOf(rhs[r]);

      const out: (readonly ParseTree[])[] = [];
      for (let m = i + lengthOf(rhs[k]); m <= j - rest; m++) {
        const heads = trees(rhs[k], i, m);
        if (heads.length === 0) continue;
        const tails = sequences(rhs, k + 1, m, j);
        for (const head of heads) {
          for (const tail of tails) {
            if (out.length >= this.maxTrees) return out;
            out.push([head, ...tail]);
          }
        }
      }
      return out;
    };

    const results: ParseTree[] = [];
    for (const start of this.grammar.startSymbols) {
      for (const tree of trees(start, 0, tokens.length)) {
        if (results.length >= this.maxTrees) return results;
        results.push(tree);
      }
    }
    return results;
  }
}

/** `ParserFactory` for the built-in engine. */
export function createChartParser(grammar: Grammar, options: ParserOptions = {}): ChartParser {
  return new ChartParser(grammar, options);
}
