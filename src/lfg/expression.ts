import {
  groundIdentifier,
  showIdentifier,
  unionIdentifiers,
  type AbsoluteIdentifier,
  type Identifier,
  type RelativeIdentifier,
} from "./identifier.js";

/**
 * F-structure designator.
 *
 *   ^              identifier reference
 *   (^ SUBJ)       feature application: the SUBJ value of ^
 *   ((^ SUBJ) NUM) applications nest
 *   'dog'          atomic value
 */
export type Expression<ID extends Identifier> =
  | { kind: "identifier"; id: ID }
  | { kind: "application"; target: Expression<ID>; feature: string }
  | { kind: "value"; value: string };

export function ref<ID extends Identifier>(id: ID): Expression<ID> {
  return { kind: "identifier", id };
}

export function apply<ID extends Identifier>(target: Expression<ID>, feature: string): Expression<ID> {
  return { kind: "application", target, feature };
}

export function atom(value: string): Expression<never> {
  return { kind: "value", value };
}

export function expressionIdentifiers<ID extends Identifier>(expression: Expression<ID>): ID[] {
  switch (expression.kind) {
    case "identifier":
      return [expression.id];
    case "application":
      return expressionIdentifiers(expression.target);
    case "value":
      return [];
  }
}

/** Union of the identifiers of several expressions, first occurrence first. */
export function identifiersOf<ID extends Identifier>(...expressions: Expression<ID>[]): ID[] {
  return expressions.reduce<ID[]>((acc, e) => unionIdentifiers(acc, expressionIdentifiers(e)), []);
}

export function groundExpression(
  expression: Expression<RelativeIdentifier>,
  up: AbsoluteIdentifier,
  down: AbsoluteIdentifier,
): Expression<AbsoluteIdentifier> {
  switch (expression.kind) {
    case "identifier":
      return { kind: "identifier", id: groundIdentifier(expression.id, up, down) };
    case "application":
      return { kind: "application", target: groundExpression(expression.target, up, down), feature: expression.feature };
    case "value":
      return expression;
  }
}

export function showExpression(expression: Expression<Identifier>): string {
  switch (expression.kind) {
    case "identifier":
      return showIdentifier(expression.id);
    case "application":
      return `(${showExpression(expression.target)} ${expression.feature})`;
    case "value":
      return `'${expression.value}'`;
  }
}
