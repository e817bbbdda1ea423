export * from "./identifier.js";
export * from "./expression.js";
export * from "./equation.js";
export { equationSymbol, EquationSymbol, ExpressionSymbol, Feature, Value, Variable } from "./grammar.js";
export type { EquationGrammarOptions, OrSemantics } from "./grammar.js";
