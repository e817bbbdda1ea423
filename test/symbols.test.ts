import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { GrammarConfigurationError } from "../src/errors.js";
import {
  EMPTY,
  constituents,
  lexicalCategory,
  nonterminal,
  production,
  productionKey,
  terminal,
} from "../src/symbols.js";
import type { NonterminalSymbol } from "../src/types.js";

const Num = lexicalCategory("Num", (t) => /^\d+$/.test(t));

// ── terminal ────────────────────────────────────────────────────────────────

describe("terminal", () => {
  test("is interned per literal", () => {
    assert.equal(terminal("AND"), terminal("AND"));
    assert.notEqual(terminal("AND"), terminal("OR"));
  });

  test("owns its literal as a token and matches only it", () => {
    const and = terminal("AND");
    assert.equal(and.kind, "lexical");
    assert.deepStrictEqual([...and.tokens], ["AND"]);
    assert.equal(and.member("AND"), true);
    assert.equal(and.member("and"), false);
  });

  test("rejects empty and whitespace literals", () => {
    assert.throws(() => terminal(""), GrammarConfigurationError);
    assert.throws(() => terminal("a b"), GrammarConfigurationError);
  });
});

// ── lexicalCategory / EMPTY ─────────────────────────────────────────────────

describe("lexicalCategory", () => {
  test("owns no tokens", () => {
    assert.equal(Num.tokens.size, 0);
    assert.equal(Num.member("42"), true);
    assert.equal(Num.member("4x"), false);
  });

  test("symbols with the same predicate are still distinct", () => {
    const Other = lexicalCategory("Num", (t) => /^\d+$/.test(t));
    assert.notEqual(Other, Num);
    assert.notEqual(Other.id, Num.id);
  });

  test("EMPTY has no constituents and no tokens", () => {
    assert.equal(EMPTY.kind, "empty");
    assert.deepStrictEqual(constituents(EMPTY), []);
    assert.equal(EMPTY.tokens.size, 0);
  });
});

// ── nonterminal ─────────────────────────────────────────────────────────────

describe("nonterminal", () => {
  test("declarations are resolved once, on first use", () => {
    let calls = 0;
    const Sum: NonterminalSymbol<number> = nonterminal("Sum", () => {
      calls++;
      return [production([Num, terminal("+"), Num], (a, _plus, b) => Number(a) + Number(b))];
    });
    assert.equal(calls, 0);
    assert.equal(Sum.synchronousProductions.length, 1);
    assert.equal(Sum.synchronousProductions.length, 1);
    assert.equal(calls, 1);
  });

  test("extra tokens are kept on the symbol", () => {
    const Kw = nonterminal("Kw", () => [production([Num], (n) => n)], { tokens: ["@", "#"] });
    assert.deepStrictEqual([...Kw.tokens], ["@", "#"]);
  });

  test("processed productions are keyed by head and child ids", () => {
    const Sum: NonterminalSymbol<number> = nonterminal("Sum", () => [
      production([Num, terminal("+"), Num], (a, _plus, b) => Number(a) + Number(b)),
    ]);
    const key = productionKey(Sum, [Num, terminal("+"), Num]);
    assert.equal(key, `${Sum.id}:${Num.id},${terminal("+").id},${Num.id}`);
    const derived = Sum.processedProductions.get(key);
    assert.ok(derived);
    assert.equal(derived.production.head, Sum);
    assert.equal(derived.production.key, key);
    assert.equal(derived.construct(["3", "+", "4"]), 7);
  });

  test("declaring the same constituents twice is a configuration error", () => {
    const Twice: NonterminalSymbol<string> = nonterminal("Twice", () => [
      production([Num], (n) => n),
      production([Num], (n) => `${n}!`),
    ]);
    assert.throws(() => Twice.processedProductions, GrammarConfigurationError);
  });
});

// ── production ──────────────────────────────────────────────────────────────

describe("production", () => {
  test("passes reconstructed values positionally", () => {
    const pair = production([Num, terminal(","), Num], (a, comma, b) => `${b}${comma}${a}`);
    assert.equal(pair.construct(["1", ",", "2"]), "2,1");
  });

  test("a constructor may decline", () => {
    const nonZero = production([Num], (n) => (n === "0" ? undefined : Number(n)));
    assert.equal(nonZero.construct(["0"]), undefined);
    assert.equal(nonZero.construct(["5"]), 5);
  });

  test("constructor arguments are typed per constituent", () => {
    const Total: NonterminalSymbol<number> = nonterminal("Total", () => [
      production([Num], (n) => Number(n)),
    ]);
    const scaled = production([Num, terminal("*"), Total], (factor: string, _times: string, total: number) =>
      Number(factor) * total,
    );
    assert.equal(scaled.construct(["3", "*", 4]), 12);
  });

  test("a value list of the wrong length yields no value", () => {
    const pair = production([Num, Num], (a, b) => a + b);
    assert.equal(pair.construct(["1"]), undefined);
  });

  test("constituents lists every declared child in order", () => {
    const Pair: NonterminalSymbol<string> = nonterminal("Pair", () => [
      production([Num, terminal(","), Num], (a, _c, b) => a + b),
      production([EMPTY], () => ""),
    ]);
    assert.deepStrictEqual(constituents(Pair), [Num, terminal(","), Num, EMPTY]);
  });
});
