import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { createChartParser } from "../src/chart-parser.js";
import { GrammarConfigurationError } from "../src/errors.js";
import { createParsable, showTree } from "../src/parsable.js";
import { EMPTY, lexicalCategory, nonterminal, production, terminal } from "../src/symbols.js";
import type { Grammar, NonterminalSymbol, ParserOptions } from "../src/types.js";

const Num = lexicalCategory("Num", (t) => /^\d+$/.test(t));

const Sum: NonterminalSymbol<number> = nonterminal("Sum", () => [
  production([Num, terminal("+"), Num], (a, _plus, b) => Number(a) + Number(b)),
]);

const Expr: NonterminalSymbol<number> = nonterminal("Expr", () => [
  production([Expr, terminal("-"), Expr], (a, _minus, b) => a - b),
  production([Num], (n) => Number(n)),
]);

// ── Sum ─────────────────────────────────────────────────────────────────────

describe("Parsable: a single production", () => {
  const sum = createParsable(Sum);

  test("exposes the derived grammar", () => {
    assert.deepStrictEqual([...sum.tokens], ["+"]);
    assert.equal(sum.productions.length, 1);
    assert.deepStrictEqual(
      sum.lexicalCategories.map((c) => c.name).sort(),
      ['"+"', "Num"],
    );
    assert.deepStrictEqual(sum.grammar.startSymbols, [Sum]);
  });

  test("tokenizes with or without spaces", () => {
    assert.deepStrictEqual(sum.tokenize("3 + 4"), ["3", "+", "4"]);
    assert.deepStrictEqual(sum.tokenize("3+4"), ["3", "+", "4"]);
  });

  test("parses to trees and values", () => {
    assert.deepStrictEqual(sum.parseTrees("3 + 4").map(showTree), ['Sum(Num "3", "+", Num "4")']);
    assert.deepStrictEqual(sum.parseValues("3+4"), [7]);
  });

  test("parse reports the first value", () => {
    const outcome = sum.parse("3 + 4");
    assert.equal(outcome.status, "ok");
    if (outcome.status === "ok") {
      assert.equal(outcome.value, 7);
      assert.equal(outcome.trees.length, 1);
    }
  });

  test("fromTree reconstructs a tree it produced", () => {
    const [tree] = sum.parseTrees("10 + 5");
    assert.equal(sum.fromTree(tree), 15);
  });

  test("an input outside the language is a no-parse", () => {
    assert.deepStrictEqual(sum.parse("3 +"), { status: "no-parse", tokens: ["3", "+"] });
    assert.deepStrictEqual(sum.parseValues("3 +"), []);
  });
});

// ── Ambiguity ───────────────────────────────────────────────────────────────

describe("Parsable: ambiguous grammars", () => {
  test("every reading is returned in tree order", () => {
    assert.deepStrictEqual(createParsable(Expr).parseValues("1 - 2 - 3"), [2, -4]);
  });

  test("maxTrees limits the readings", () => {
    assert.deepStrictEqual(createParsable(Expr, { maxTrees: 1 }).parseValues("1 - 2 - 3"), [2]);
  });

  test("readings past maxTrees are never tried", () => {
    const Diff: NonterminalSymbol<number> = nonterminal("Diff", () => [
      production([Diff, terminal("-"), Diff], (a, _minus, b) => (a - b === 0 ? undefined : a - b)),
      production([Num], (n) => Number(n)),
    ]);
    assert.deepStrictEqual(createParsable(Diff).parseValues("5 - 3 - 3"), [-1]);
    assert.equal(createParsable(Diff, { maxTrees: 1 }).parse("5 - 3 - 3").status, "no-interpretation");
  });

  test("mutually recursive symbols", () => {
    const Even: NonterminalSymbol<number> = nonterminal("Even", () => [
      production([terminal("z")], () => 0),
      production([terminal("s"), Odd], (_s, n) => n + 1),
    ]);
    const Odd: NonterminalSymbol<number> = nonterminal("Odd", () => [
      production([terminal("s"), Even], (_s, n) => n + 1),
    ]);
    const even = createParsable(Even);
    assert.deepStrictEqual(even.parseValues("s s z"), [2]);
    assert.equal(even.parse("s z").status, "no-parse");
    assert.deepStrictEqual(createParsable(Odd).parseValues("s z"), [1]);
  });
});

// ── No interpretation ───────────────────────────────────────────────────────

describe("Parsable: trees without values", () => {
  test("an empty constituent leaves the tree without a value", () => {
    const Opt: NonterminalSymbol<string> = nonterminal("Opt", () => [
      production([EMPTY], () => ""),
      production([terminal("x")], (x) => x),
    ]);
    const S: NonterminalSymbol<string> = nonterminal("S", () => [
      production([terminal("a"), Opt], (a, opt) => a + opt),
    ]);
    const parsable = createParsable(S);

    const outcome = parsable.parse("a");
    assert.equal(outcome.status, "no-interpretation");
    if (outcome.status === "no-interpretation") {
      assert.deepStrictEqual(outcome.trees.map(showTree), ['S("a", Opt(ε))']);
    }
    assert.deepStrictEqual(parsable.parseValues("a x"), ["ax"]);
  });

  test("a declining constructor leaves the tree without a value", () => {
    const Div: NonterminalSymbol<number> = nonterminal("Div", () => [
      production([Num, terminal("/"), Num], (a, _slash, b) =>
        Number(b) === 0 ? undefined : Number(a) / Number(b),
      ),
    ]);
    const div = createParsable(Div);
    assert.equal(div.parse("1 / 0").status, "no-interpretation");
    assert.deepStrictEqual(div.parseValues("9 / 3"), [3]);
  });
});

// ── Configuration ───────────────────────────────────────────────────────────

describe("Parsable: configuration", () => {
  test("a custom engine is built once with the configured options", () => {
    const seen: ParserOptions[] = [];
    const parsable = createParsable(Sum, {
      maxTrees: 5,
      engine: (grammar: Grammar, options: ParserOptions) => {
        seen.push(options);
        return createChartParser(grammar, options);
      },
    });
    assert.deepStrictEqual(parsable.parseValues("1 + 2"), [3]);
    assert.deepStrictEqual(parsable.parseValues("2 + 2"), [4]);
    assert.deepStrictEqual(seen, [{ maxTrees: 5 }]);
  });

  test("an ambiguous token set fails on creation", () => {
    const Arrow: NonterminalSymbol<string> = nonterminal("Arrow", () => [
      production([terminal("<"), terminal("-")], () => "short"),
      production([terminal("<-")], () => "long"),
    ]);
    assert.throws(() => createParsable(Arrow), GrammarConfigurationError);
  });

  test("a duplicate production fails on creation", () => {
    const Twice: NonterminalSymbol<string> = nonterminal("Twice", () => [
      production([Num], (n) => n),
      production([Num], (n) => n),
    ]);
    assert.throws(() => createParsable(Twice), GrammarConfigurationError);
  });
});
