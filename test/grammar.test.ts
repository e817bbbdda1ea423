import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { GrammarConfigurationError } from "../src/errors.js";
import { deriveGrammar } from "../src/grammar.js";
import { EMPTY, lexicalCategory, nonterminal, production, terminal } from "../src/symbols.js";
import type { NonterminalSymbol } from "../src/types.js";

const Name = lexicalCategory("Name", (t) => /^[a-z]+$/.test(t));

const Greeting: NonterminalSymbol<string> = nonterminal(
  "Greeting",
  () => [
    production([terminal("hello"), Name], (_hello, name) => name),
    production([terminal("hi"), Target], (_hi, target) => target),
  ],
  { tokens: ["!"] },
);
const Target: NonterminalSymbol<string> = nonterminal("Target", () => [
  production([Name], (name) => name),
  production([EMPTY], () => "world"),
]);

describe("deriveGrammar", () => {
  test("is cached per root", () => {
    assert.equal(deriveGrammar(Greeting), deriveGrammar(Greeting));
  });

  test("symbols lead with the root", () => {
    const derivation = deriveGrammar(Greeting);
    assert.equal(derivation.symbols[0], Greeting);
    assert.equal(derivation.symbols.length, derivation.closure.size + 1);
  });

  test("collects productions of every reachable nonterminal", () => {
    const { productions } = deriveGrammar(Greeting);
    assert.deepStrictEqual(
      productions.map((p) => `${p.head.name} -> ${p.rhs.map((s) => s.name).join(" ")}`).sort(),
      ['Greeting -> "hello" Name', 'Greeting -> "hi" Target', "Target -> Name", "Target -> ε"],
    );
  });

  test("lexical categories include terminals", () => {
    const names = deriveGrammar(Greeting)
      .lexicalCategories.map((c) => c.name)
      .sort();
    assert.deepStrictEqual(names, ['"hello"', '"hi"', "Name"]);
  });

  test("tokens are the union of every symbol's tokens", () => {
    assert.deepStrictEqual([...deriveGrammar(Greeting).tokens].sort(), ["!", "hello", "hi"]);
  });

  test("the grammar starts from the root", () => {
    const { grammar, productions } = deriveGrammar(Greeting);
    assert.deepStrictEqual(grammar.startSymbols, [Greeting]);
    assert.equal(grammar.productions, productions);
  });

  test("the tokenizer uses the collected tokens", () => {
    assert.deepStrictEqual(deriveGrammar(Greeting).tokenizer.tokenize("hi bob!"), ["hi", "bob", "!"]);
  });

  test("an ambiguous token set fails when the tokenizer is built", () => {
    const Clash: NonterminalSymbol<string> = nonterminal("Clash", () => [
      production([terminal("<"), terminal("-"), terminal("<-")], () => "arrow"),
    ]);
    const derivation = deriveGrammar(Clash);
    assert.equal(derivation.productions.length, 1);
    assert.throws(() => derivation.tokenizer, GrammarConfigurationError);
  });
});
