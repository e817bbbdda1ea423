/**
 * Chevrotain lexer built from the literal tokens of a derived grammar.
 *
 * Literals are tried longest first, so the first literal that matches is the
 * longest one. Everything between whitespace and literals becomes a `Word`.
 * Whitespace is skipped.
 */
import { createToken, Lexer, type TokenType } from "chevrotain";
import { GrammarConfigurationError } from "./errors.js";
import type { Tokenizer } from "./types.js";

const WORD_LITERAL = /^\w+$/;

function escapeRegExp(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}

const WS = createToken({
  name: "WS",
  pattern: /\s+/,
  group: Lexer.SKIPPED,
  line_breaks: true,
});

/**
 * A literal that is a concatenation of two or more other literals can be
 * tokenized in more than one way. Returns the decomposition when one exists.
 */
export function findAmbiguousLiteral(
  literals: ReadonlySet<string>,
): { literal: string; parts: string[] } | undefined {
  for (const literal of literals) {
    // splits[i]: a decomposition of literal.slice(0, i) into other literals
    const splits: (string[] | undefined)[] = [[]];
    for (let end = 1; end <= literal.length; end++) {
      for (let start = 0; start < end; start++) {
        const prefix = splits[start];
        if (prefix === undefined) continue;
        const piece = literal.slice(start, end);
        if (piece === literal || !literals.has(piece)) continue;
        splits[end] = [...prefix, piece];
        break;
      }
    }
    const parts = splits[literal.length];
    if (parts !== undefined) return { literal, parts };
  }
  return undefined;
}

/**
 * Longest-match tokenizer over a fixed literal set.
 *
 * Throws `GrammarConfigurationError` on construction when a literal is empty,
 * contains whitespace, or is ambiguous (see `findAmbiguousLiteral`).
 */
export class LiteralTokenizer implements Tokenizer {
  readonly literals: readonly string[];
  private readonly lexer: Lexer;

  constructor(literals: Iterable<string>) {
    const unique = new Set(literals);
    for (const literal of unique) {
      if (literal.length === 0 || /\s/.test(literal)) {
        throw new GrammarConfigurationError(
          `Token ${JSON.stringify(literal)} must be non-empty and contain no whitespace`,
          [literal],
        );
      }
    }
    const ambiguous = findAmbiguousLiteral(unique);
    if (ambiguous) {
      throw new GrammarConfigurationError(
        `Token "${ambiguous.literal}" can also be read as ${ambiguous.parts.map((p) => `"${p}"`).join(" ")}`,
        [ambiguous.literal, ...ambiguous.parts],
      );
    }

    // Longest first; ties broken alphabetically so the order is stable.
    this.literals = [...unique].sort((a, b) => b.length - a.length || (a < b ? -1 : a > b ? 1 : 0));
    const breakers = this.literals.filter((l) => !WORD_LITERAL.test(l)).map(escapeRegExp);
    const wordPattern = new RegExp(
      breakers.length > 0 ? `(?:(?!${breakers.join("|")})\\S)+` : "\\S+",
      "y",
    );
    const Word = createToken({
      name: "Word",
      pattern: (text: string, offset: number) => {
        wordPattern.lastIndex = offset;
        return wordPattern.exec(text);
      },
      line_breaks: false,
    });

    const literalTypes: TokenType[] = this.literals.map((literal, index) =>
      createToken({
        name: `Literal${index}`,
        pattern: literal,
        line_breaks: false,
        ...(WORD_LITERAL.test(literal) ? { longer_alt: Word } : {}),
      }),
    );

    this.lexer = new Lexer([WS, ...literalTypes, Word], {
      positionTracking: "onlyOffset",
      ensureOptimizations: false,
    });
  }

  tokenize(input: string): string[] {
    const result = this.lexer.tokenize(input);
    if (result.errors.length > 0) {
      const e = result.errors[0];
      throw new GrammarConfigurationError(
        `Literal set ${JSON.stringify(this.literals)} does not cover the character at offset ${e.offset}: ${e.message}`,
        [...this.literals],
      );
    }
    return result.tokens.map((t) => t.image);
  }
}
