/**
 * A grammar that cannot be used at all: ambiguous literal tokens, malformed
 * terminals, or a production declared twice. Raised while the grammar or its
 * tokenizer is being derived, never while parsing a particular input.
 */
export class GrammarConfigurationError extends Error {
  /** The literal tokens involved, when the problem is lexical */
  readonly tokens: readonly string[];

  constructor(message: string, tokens: readonly string[] = []) {
    super(message);
    this.name = "GrammarConfigurationError";
    this.tokens = tokens;
  }
}
