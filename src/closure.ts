import { constituents } from "./symbols.js";
import type { GrammarSymbol } from "./types.js";

/** Closures are computed once per symbol; declarations never change after startup. */
const closures = new WeakMap<GrammarSymbol, ReadonlySet<GrammarSymbol>>();

/**
 * Every symbol reachable from `root` through declared production
 * constituents, excluding `root` itself.
 *
 * Walks the declaration graph with a prohibited set seeded with `root`: a
 * symbol is expanded at most once, which is what cuts self- and mutual
 * recursion. When a constituent's own closure is already known it is merged
 * wholesale instead of being walked again.
 */
export function closure(root: GrammarSymbol): ReadonlySet<GrammarSymbol> {
  const cached = closures.get(root);
  if (cached) return cached;

  const prohibited = new Set<GrammarSymbol>([root]);
  const found = new Set<GrammarSymbol>();
  const pending: GrammarSymbol[] = [root];

  const admit = (symbol: GrammarSymbol): boolean => {
    if (prohibited.has(symbol)) return false;
    prohibited.add(symbol);
    found.add(symbol);
    return true;
  };

  while (pending.length > 0) {
    const current = pending.pop();
    if (current === undefined) break;
    for (const child of constituents(current)) {
      if (!admit(child)) continue;
      const known = closures.get(child);
      if (known) {
        // reachable(k) ⊆ closure(child) ∪ {child} for every k in it
        for (const symbol of known) admit(symbol);
      } else {
        pending.push(child);
      }
    }
  }

  closures.set(root, found);
  return found;
}
