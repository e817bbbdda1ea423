import {
  groundExpression,
  identifiersOf,
  showExpression,
  type Expression,
} from "./expression.js";
import {
  unionIdentifiers,
  type AbsoluteIdentifier,
  type Identifier,
  type RelativeIdentifier,
} from "./identifier.js";

/**
 * Functional equation over identifiers of kind `ID`.
 *
 * Three layers under the top-level union:
 *   compound: conjunction / disjunction of equations
 *   defining: assignment (`=`) and containment (`IN`); these build structure
 *   constraint: equality (`=c`), containment (`INc`) and existence checks,
 *     each with a polarity
 */
export type Equation<ID extends Identifier> =
  | { kind: "compound"; equation: CompoundEquation<ID> }
  | { kind: "defining"; equation: DefiningEquation<ID> }
  | { kind: "constraint"; equation: ConstraintEquation<ID> };

export type CompoundEquation<ID extends Identifier> =
  | { kind: "disjunction"; left: Equation<ID>; right: Equation<ID> }
  | { kind: "conjunction"; left: Equation<ID>; right: Equation<ID> };

export type DefiningEquation<ID extends Identifier> =
  | { kind: "assignment"; left: Expression<ID>; right: Expression<ID> }
  | { kind: "containment"; element: Expression<ID>; container: Expression<ID> };

export type ConstraintEquation<ID extends Identifier> =
  | { kind: "equals"; positive: boolean; left: Expression<ID>; right: Expression<ID> }
  | { kind: "contains"; positive: boolean; element: Expression<ID>; container: Expression<ID> }
  | { kind: "exists"; positive: boolean; expression: Expression<ID> };

// ── Constructors ────────────────────────────────────────────────────────────

export function compound<ID extends Identifier>(equation: CompoundEquation<ID>): Equation<ID> {
  return { kind: "compound", equation };
}

export function defining<ID extends Identifier>(equation: DefiningEquation<ID>): Equation<ID> {
  return { kind: "defining", equation };
}

export function constraint<ID extends Identifier>(equation: ConstraintEquation<ID>): Equation<ID> {
  return { kind: "constraint", equation };
}

export function conjunction<ID extends Identifier>(left: Equation<ID>, right: Equation<ID>): CompoundEquation<ID> {
  return { kind: "conjunction", left, right };
}

export function disjunction<ID extends Identifier>(left: Equation<ID>, right: Equation<ID>): CompoundEquation<ID> {
  return { kind: "disjunction", left, right };
}

export function assignment<ID extends Identifier>(left: Expression<ID>, right: Expression<ID>): DefiningEquation<ID> {
  return { kind: "assignment", left, right };
}

export function containment<ID extends Identifier>(
  element: Expression<ID>,
  container: Expression<ID>,
): DefiningEquation<ID> {
  return { kind: "containment", element, container };
}

export function equals<ID extends Identifier>(
  positive: boolean,
  left: Expression<ID>,
  right: Expression<ID>,
): ConstraintEquation<ID> {
  return { kind: "equals", positive, left, right };
}

export function contains<ID extends Identifier>(
  positive: boolean,
  element: Expression<ID>,
  container: Expression<ID>,
): ConstraintEquation<ID> {
  return { kind: "contains", positive, element, container };
}

export function exists<ID extends Identifier>(positive: boolean, expression: Expression<ID>): ConstraintEquation<ID> {
  return { kind: "exists", positive, expression };
}

// ── Negation ────────────────────────────────────────────────────────────────

/**
 * Push a negation inward.
 *
 * Defining equations have no negative form: `NOT (a = b)` is the constraint
 * `a ≠c b`. Negating twice therefore gives back a compound or constraint
 * equation unchanged, but turns a defining equation into its positive
 * constraint counterpart.
 */
export function negateEquation<ID extends Identifier>(equation: Equation<ID>): Equation<ID> {
  switch (equation.kind) {
    case "compound":
      return compound(negateCompound(equation.equation));
    case "defining":
      return constraint(negateDefining(equation.equation));
    case "constraint":
      return constraint(negateConstraint(equation.equation));
  }
}

/** De Morgan: swap the connective and negate both sides. */
export function negateCompound<ID extends Identifier>(equation: CompoundEquation<ID>): CompoundEquation<ID> {
  const left = negateEquation(equation.left);
  const right = negateEquation(equation.right);
  return equation.kind === "conjunction" ? disjunction(left, right) : conjunction(left, right);
}

export function negateDefining<ID extends Identifier>(equation: DefiningEquation<ID>): ConstraintEquation<ID> {
  switch (equation.kind) {
    case "assignment":
      return equals(false, equation.left, equation.right);
    case "containment":
      return contains(false, equation.element, equation.container);
  }
}

export function negateConstraint<ID extends Identifier>(equation: ConstraintEquation<ID>): ConstraintEquation<ID> {
  return { ...equation, positive: !equation.positive };
}

// ── Grounding ───────────────────────────────────────────────────────────────

/**
 * Resolve every relative identifier against the mother's f-structure (`up`)
 * and the node's own (`down`).
 */
export function groundEquation(
  equation: Equation<RelativeIdentifier>,
  up: AbsoluteIdentifier,
  down: AbsoluteIdentifier,
): Equation<AbsoluteIdentifier> {
  switch (equation.kind) {
    case "compound":
      return compound(groundCompound(equation.equation, up, down));
    case "defining":
      return defining(groundDefining(equation.equation, up, down));
    case "constraint":
      return constraint(groundConstraint(equation.equation, up, down));
  }
}

export function groundCompound(
  equation: CompoundEquation<RelativeIdentifier>,
  up: AbsoluteIdentifier,
  down: AbsoluteIdentifier,
): CompoundEquation<AbsoluteIdentifier> {
  return {
    kind: equation.kind,
    left: groundEquation(equation.left, up, down),
    right: groundEquation(equation.right, up, down),
  };
}

export function groundDefining(
  equation: DefiningEquation<RelativeIdentifier>,
  up: AbsoluteIdentifier,
  down: AbsoluteIdentifier,
): DefiningEquation<AbsoluteIdentifier> {
  switch (equation.kind) {
    case "assignment":
      return assignment(groundExpression(equation.left, up, down), groundExpression(equation.right, up, down));
    case "containment":
      return containment(
        groundExpression(equation.element, up, down),
        groundExpression(equation.container, up, down),
      );
  }
}

export function groundConstraint(
  equation: ConstraintEquation<RelativeIdentifier>,
  up: AbsoluteIdentifier,
  down: AbsoluteIdentifier,
): ConstraintEquation<AbsoluteIdentifier> {
  switch (equation.kind) {
    case "equals":
      return equals(
        equation.positive,
        groundExpression(equation.left, up, down),
        groundExpression(equation.right, up, down),
      );
    case "contains":
      return contains(
        equation.positive,
        groundExpression(equation.element, up, down),
        groundExpression(equation.container, up, down),
      );
    case "exists":
      return exists(equation.positive, groundExpression(equation.expression, up, down));
  }
}

// ── Identifiers ─────────────────────────────────────────────────────────────

/** Free identifiers, without duplicates, in order of first occurrence. */
export function equationIdentifiers<ID extends Identifier>(equation: Equation<ID>): ID[] {
  switch (equation.kind) {
    case "compound":
      return unionIdentifiers(
        equationIdentifiers(equation.equation.left),
        equationIdentifiers(equation.equation.right),
      );
    case "defining":
      return definingIdentifiers(equation.equation);
    case "constraint":
      return constraintIdentifiers(equation.equation);
  }
}

function definingIdentifiers<ID extends Identifier>(equation: DefiningEquation<ID>): ID[] {
  switch (equation.kind) {
    case "assignment":
      return identifiersOf(equation.left, equation.right);
    case "containment":
      return identifiersOf(equation.element, equation.container);
  }
}

function constraintIdentifiers<ID extends Identifier>(equation: ConstraintEquation<ID>): ID[] {
  switch (equation.kind) {
    case "equals":
      return identifiersOf(equation.left, equation.right);
    case "contains":
      return identifiersOf(equation.element, equation.container);
    case "exists":
      return identifiersOf(equation.expression);
  }
}

// ── Rendering ───────────────────────────────────────────────────────────────

/**
 * Surface syntax for an equation. Relative equations render to text the
 * equation grammar parses back to the same value.
 */
export function showEquation(equation: Equation<Identifier>): string {
  switch (equation.kind) {
    case "compound": {
      const { kind, left, right } = equation.equation;
      return `(${showEquation(left)} ${kind === "conjunction" ? "AND" : "OR"} ${showEquation(right)})`;
    }
    case "defining": {
      const e = equation.equation;
      return e.kind === "assignment"
        ? `${showExpression(e.left)} = ${showExpression(e.right)}`
        : `${showExpression(e.element)} IN ${showExpression(e.container)}`;
    }
    case "constraint": {
      const e = equation.equation;
      const body =
        e.kind === "equals"
          ? `${showExpression(e.left)} =c ${showExpression(e.right)}`
          : e.kind === "contains"
            ? `${showExpression(e.element)} INc ${showExpression(e.container)}`
            : showExpression(e.expression);
      return e.positive ? body : `(NOT (${body}))`;
    }
  }
}
