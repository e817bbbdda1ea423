/**
 * F-structure identifiers.
 *
 * Relative identifiers are written inside lexical entries and rules: `^` is
 * the f-structure of the mother node (up), `!` the node's own (down), and
 * named variables such as `%f` or `X` are local references. Grounding binds
 * them to absolute f-structure addresses.
 *
 * The `scope` discriminant keeps the two kinds apart in the type system, so
 * an equation over absolute identifiers can never be grounded again.
 */
export type RelativeIdentifier =
  | { scope: "relative"; kind: "up" }
  | { scope: "relative"; kind: "down" }
  | { scope: "relative"; kind: "variable"; name: string };

export type AbsoluteIdentifier =
  | { scope: "absolute"; kind: "address"; address: string }
  | { scope: "absolute"; kind: "variable"; name: string };

export type Identifier = RelativeIdentifier | AbsoluteIdentifier;

export const up: RelativeIdentifier = { scope: "relative", kind: "up" };
export const down: RelativeIdentifier = { scope: "relative", kind: "down" };

export function variable(name: string): RelativeIdentifier {
  return { scope: "relative", kind: "variable", name };
}

export function address(name: string): AbsoluteIdentifier {
  return { scope: "absolute", kind: "address", address: name };
}

export function groundIdentifier(
  id: RelativeIdentifier,
  upAddress: AbsoluteIdentifier,
  downAddress: AbsoluteIdentifier,
): AbsoluteIdentifier {
  switch (id.kind) {
    case "up":
      return upAddress;
    case "down":
      return downAddress;
    case "variable":
      return { scope: "absolute", kind: "variable", name: id.name };
  }
}

export function showIdentifier(id: Identifier): string {
  switch (id.kind) {
    case "up":
      return "^";
    case "down":
      return "!";
    case "variable":
      return id.name;
    case "address":
      return `#${id.address}`;
  }
}

/** Add `ids` to `into`, skipping any already present (compared by rendering). */
export function unionIdentifiers<ID extends Identifier>(into: ID[], ids: readonly ID[]): ID[] {
  const seen = new Set(into.map(showIdentifier));
  const out = [...into];
  for (const id of ids) {
    const key = showIdentifier(id);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(id);
  }
  return out;
}
