/**
 * Equation grammar: surface syntax for f-structure equations.
 *
 *   NOT e            negation, pushed inward (see `negateEquation`)
 *   e AND e          conjunction
 *   e OR e           disjunction (or conjunction, see `OrSemantics`)
 *   x = y            assignment          x IN y    containment
 *   x =c y           equality check      x INc y   containment check
 *   x                existence check
 *   ( e )            grouping
 */
import { lexicalCategory, nonterminal, production, terminal } from "../symbols.js";
import type { NonterminalSymbol } from "../types.js";
import {
  assignment,
  compound,
  conjunction,
  constraint,
  contains,
  containment,
  defining,
  disjunction,
  equals,
  exists,
  negateEquation,
  type Equation,
} from "./equation.js";
import { apply, atom, ref, type Expression } from "./expression.js";
import { down, up, variable, type RelativeIdentifier } from "./identifier.js";

const RESERVED_KEYWORDS = new Set(["NOT", "AND", "OR", "IN", "INc"]);

/** Local names: `%f`, `X`, `head_1`. Keywords are excluded. */
export const Variable = lexicalCategory(
  "Variable",
  (token) => /^%?[A-Za-z][A-Za-z0-9_]*$/.test(token) && !RESERVED_KEYWORDS.has(token),
);

/** Attribute names: `SUBJ`, `NUM`, `XCOMP`. */
export const Feature = lexicalCategory(
  "Feature",
  (token) => /^[A-Z][A-Z0-9_]*$/.test(token) && !RESERVED_KEYWORDS.has(token),
);

/** Quoted atomic values: `'dog'`, `'SG'`. */
export const Value = lexicalCategory("Value", (token) => /^'[^'\s]+'$/.test(token));

export const ExpressionSymbol: NonterminalSymbol<Expression<RelativeIdentifier>> = nonterminal<
  Expression<RelativeIdentifier>
>("Expression", () => [
  production([terminal("^")], () => ref(up)),
  production([terminal("!")], () => ref(down)),
  production([Variable], (name) => ref(variable(name))),
  production([Value], (quoted) => atom(quoted.slice(1, -1))),
  production([terminal("("), ExpressionSymbol, Feature, terminal(")")], (_open, target, feature) =>
    apply(target, feature),
  ),
]);

/**
 * What `e OR e` builds.
 *   - `"disjunction"` (default): a disjunction
 *   - `"conjunction"`: a conjunction, matching grammars written against the
 *     earlier behaviour where both connectives built conjunctions
 */
export type OrSemantics = "disjunction" | "conjunction";

export type EquationGrammarOptions = {
  or?: OrSemantics;
};

const equationSymbols = new Map<OrSemantics, NonterminalSymbol<Equation<RelativeIdentifier>>>();

/** The equation symbol for a given `OR` reading. Memoized, so identity is stable per mode. */
export function equationSymbol(options: EquationGrammarOptions = {}): NonterminalSymbol<Equation<RelativeIdentifier>> {
  const or = options.or ?? "disjunction";
  const known = equationSymbols.get(or);
  if (known) return known;

  const orConnective = or === "disjunction" ? disjunction : conjunction;
  const symbol: NonterminalSymbol<Equation<RelativeIdentifier>> = nonterminal<Equation<RelativeIdentifier>>(
    or === "disjunction" ? "Equation" : "Equation[or=conjunction]",
    () => [
      production([terminal("NOT"), symbol], (_not, negated) => negateEquation(negated)),
      production([symbol, terminal("AND"), symbol], (left, _and, right) => compound(conjunction(left, right))),
      production([symbol, terminal("OR"), symbol], (left, _or, right) => compound(orConnective(left, right))),
      production([ExpressionSymbol, terminal("="), ExpressionSymbol], (left, _eq, right) =>
        defining(assignment(left, right)),
      ),
      production([ExpressionSymbol, terminal("IN"), ExpressionSymbol], (element, _in, container) =>
        defining(containment(element, container)),
      ),
      production([ExpressionSymbol, terminal("=c"), ExpressionSymbol], (left, _eq, right) =>
        constraint(equals(true, left, right)),
      ),
      production([ExpressionSymbol, terminal("INc"), ExpressionSymbol], (element, _in, container) =>
        constraint(contains(true, element, container)),
      ),
      production([ExpressionSymbol], (expression) => constraint(exists(true, expression))),
      production([terminal("("), symbol, terminal(")")], (_open, equation) => equation),
    ],
  );
  equationSymbols.set(or, symbol);
  return symbol;
}

/** The default equation symbol (`OR` builds disjunctions). */
export const EquationSymbol = equationSymbol();
