import { SpanStatusCode, metrics, trace } from "@opentelemetry/api";
import { createChartParser } from "./chart-parser.js";
import { deriveGrammar, type GrammarDerivation } from "./grammar.js";
import { reconstruct } from "./reconstruct.js";
import type {
  Grammar,
  GrammarSymbol,
  LexicalCategory,
  NonterminalSymbol,
  ParseTree,
  Parser,
  ParserFactory,
  Production,
  Tokenizer,
} from "./types.js";

const otelTracer = trace.getTracer("synchro-grammar");

const otelMeter = metrics.getMeter("synchro-grammar");
const parseCallCounter = otelMeter.createCounter("synchro.parse.calls", {
  description: "Total number of parse calls",
});
const parseFailureCounter = otelMeter.createCounter("synchro.parse.failures", {
  description: "Parse calls that produced no tree or no reconstructable value",
});
const parseDurationHistogram = otelMeter.createHistogram("synchro.parse.duration", {
  description: "Tokenize + parse + reconstruct duration in milliseconds",
  unit: "ms",
});

/** Round milliseconds to 2 decimal places */
function roundMs(ms: number): number {
  return Math.round(ms * 100) / 100;
}

/**
 * Structured logger interface for grammar and parse events.
 * Accepts any compatible logger: pino, winston, `console`, etc.
 */
export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

const noop = () => {};
const defaultLogger: Logger = { debug: noop, info: noop, warn: noop, error: noop };

export type ParsableOptions = {
  /**
   * Structured logger for derivation and parse events.
   * Defaults to silent no-ops so there is zero output unless you opt in.
   */
  logger?: Logger;
  /** Parsing engine. Defaults to the built-in chart parser. */
  engine?: ParserFactory;
  /** Upper bound on parse trees considered per input. Default 256. */
  maxTrees?: number;
};

/**
 * Outcome of `Parsable.parse`.
 *   - `"ok"`: at least one tree reconstructs; `value` is the first
 *   - `"no-parse"`: the engine found no tree at all
 *   - `"no-interpretation"`: trees exist but none reconstructs to a value
 *
 * Only the trees the engine kept are tried: past `maxTrees`, a reading that
 * would reconstruct can be dropped, and the outcome is then
 * `"no-interpretation"`.
 */
export type ParseOutcome<A> =
  | { status: "ok"; value: A; values: A[]; trees: ParseTree[] }
  | { status: "no-parse"; tokens: string[] }
  | { status: "no-interpretation"; tokens: string[]; trees: ParseTree[] };

/**
 * A root nonterminal bound to its derived grammar, tokenizer and parser.
 *
 * The tokenizer is built on construction, so an ambiguous token set throws
 * `GrammarConfigurationError` here rather than on the first parse.
 */
export class Parsable<A> {
  private readonly derivation: GrammarDerivation;
  private readonly logger: Logger;
  private readonly engine: ParserFactory;
  private readonly maxTrees: number | undefined;
  private cachedParser: Parser | undefined;

  constructor(
    readonly symbol: NonterminalSymbol<A>,
    options: ParsableOptions = {},
  ) {
    this.logger = options.logger ?? defaultLogger;
    this.engine = options.engine ?? createChartParser;
    this.maxTrees = options.maxTrees;
    this.derivation = deriveGrammar(symbol);
    const { productions, tokenizer } = this.derivation;
    this.logger.debug(
      "[synchro] derived grammar for %s: %d symbols, %d productions, %d tokens",
      symbol.name,
      this.derivation.closure.size + 1,
      productions.length,
      tokenizer.literals.length,
    );
  }

  get closure(): ReadonlySet<GrammarSymbol> {
    return this.derivation.closure;
  }

  get productions(): readonly Production[] {
    return this.derivation.productions;
  }

  get lexicalCategories(): readonly LexicalCategory[] {
    return this.derivation.lexicalCategories;
  }

  get tokens(): ReadonlySet<string> {
    return this.derivation.tokens;
  }

  get tokenizer(): Tokenizer {
    return this.derivation.tokenizer;
  }

  get grammar(): Grammar {
    return this.derivation.grammar;
  }

  get parser(): Parser {
    if (this.cachedParser === undefined) {
      this.cachedParser = this.engine(this.grammar, { maxTrees: this.maxTrees });
    }
    return this.cachedParser;
  }

  tokenize(input: string): string[] {
    return this.tokenizer.tokenize(input);
  }

  parseTrees(input: string): ParseTree[] {
    return this.parser.parse(this.tokenize(input));
  }

  /** Rebuild a value from a tree; `undefined` when the tree has no interpretation. */
  fromTree(tree: ParseTree): A | undefined {
    return reconstruct(this.symbol, tree);
  }

  /** Every value reconstructable from some parse of `input`, in tree order. */
  parseValues(input: string): A[] {
    const outcome = this.parse(input);
    return outcome.status === "ok" ? outcome.values : [];
  }

  parse(input: string): ParseOutcome<A> {
    const metricAttrs = { "synchro.symbol": this.symbol.name };
    return otelTracer.startActiveSpan("synchro.parse", { attributes: metricAttrs }, (span): ParseOutcome<A> => {
      const wallStart = performance.now();
      try {
        parseCallCounter.add(1, metricAttrs);
        const tokens = this.tokenize(input);
        const trees = this.parser.parse(tokens);
        span.setAttribute("synchro.tokens", tokens.length);
        span.setAttribute("synchro.trees", trees.length);

        if (trees.length === 0) {
          parseFailureCounter.add(1, { ...metricAttrs, "synchro.failure": "no-parse" });
          this.logger.warn("[synchro] no parse of %s for input %j", this.symbol.name, input);
          return { status: "no-parse", tokens };
        }

        const values: A[] = [];
        for (const tree of trees) {
          const value = this.fromTree(tree);
          if (value !== undefined) values.push(value);
        }
        if (values.length === 0) {
          parseFailureCounter.add(1, { ...metricAttrs, "synchro.failure": "no-interpretation" });
          this.logger.warn(
            "[synchro] %d parse(s) of %s but no valid interpretation for input %j",
            trees.length,
            this.symbol.name,
            input,
          );
          return { status: "no-interpretation", tokens, trees };
        }

        this.logger.debug(
          "[synchro] parsed %s: %d tree(s), %d value(s) in %dms",
          this.symbol.name,
          trees.length,
          values.length,
          roundMs(performance.now() - wallStart),
        );
        return { status: "ok", value: values[0], values, trees };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        if (err instanceof Error) span.recordException(err);
        span.setStatus({ code: SpanStatusCode.ERROR, message });
        this.logger.error("[synchro] parse of %s failed: %s", this.symbol.name, message);
        throw err;
      } finally {
        parseDurationHistogram.record(roundMs(performance.now() - wallStart), metricAttrs);
        span.end();
      }
    });
  }
}

export function createParsable<A>(symbol: NonterminalSymbol<A>, options?: ParsableOptions): Parsable<A> {
  return new Parsable(symbol, options);
}

/** Bracketed rendering of a tree: `Sum(Num "3", "+", Num "4")`. */
export function showTree(tree: ParseTree): string {
  switch (tree.kind) {
    case "terminal":
      return tree.symbol.name === JSON.stringify(tree.token)
        ? tree.symbol.name
        : `${tree.symbol.name} ${JSON.stringify(tree.token)}`;
    case "nonterminal":
      return `${tree.head.name}(${tree.children.map(showTree).join(", ")})`;
    case "empty":
      return "ε";
  }
}
