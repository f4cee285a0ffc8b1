import type { DecompositionNode } from "./model.js";

export type NamedComponent = {
  character: string;
  keyword: string;
  aliases: readonly string[];
};

/**
 * The components a reader would name: walks down from the root and stops at
 * the first node with a keyword. Unnamed leaves come back with keyword "".
 */
export function namedComponents(tree: DecompositionNode): NamedComponent[] {
  const out: NamedComponent[] = [];
  const walk = (n: DecompositionNode): void => {
    if (n.keyword || n.children.length === 0) {
      out.push({ character: n.character, keyword: n.keyword, aliases: n.aliases });
      return;
    }
    n.children.forEach(walk);
  };
  tree.children.forEach(walk);
  return out;
}

/** "sun + moon"; unnamed components show as their character. Empty for a leaf. */
export function formatDecomposition(tree: DecompositionNode): string {
  return namedComponents(tree)
    .map((c) => c.keyword || c.character)
    .join(" + ");
}

/** "日 = sun, 月 = moon (alias: month)"; each character once, unnamed ones skipped. */
export function formatComponentsDetail(tree: DecompositionNode): string {
  const seen = new Set<string>();
  const parts: string[] = [];
  for (const c of namedComponents(tree)) {
    if (!c.keyword || seen.has(c.character)) continue;
    seen.add(c.character);
    const others = c.aliases.filter((a) => a.toLowerCase() !== c.keyword.toLowerCase());
    parts.push(others.length > 0 ? `${c.character} = ${c.keyword} (alias: ${others.join(", ")})` : `${c.character} = ${c.keyword}`);
  }
  return parts.join(", ");
}

export function formatTree(tree: DecompositionNode): string {
  const lines: string[] = [];
  const walk = (n: DecompositionNode): void => {
    let line = `${"  ".repeat(n.depth)}${n.character} [${n.keyword || "???"}] (${n.tier ?? "none"})`;
    if (n.children.length > 0) line += ` ${n.layout.label}`;
    if (n.truncated) line += ` <${n.truncated}>`;
    lines.push(line);
    n.children.forEach(walk);
  };
  walk(tree);
  return lines.join("\n");
}

export type LeafCount = { resolved: number; unresolved: number };

/** Leaves with a keyword count as resolved. */
export function countLeaves(tree: DecompositionNode): LeafCount {
  if (tree.children.length === 0) {
    return tree.keyword ? { resolved: 1, unresolved: 0 } : { resolved: 0, unresolved: 1 };
  }
  return tree.children.map(countLeaves).reduce(
    (acc, c) => ({ resolved: acc.resolved + c.resolved, unresolved: acc.unresolved + c.unresolved }),
    { resolved: 0, unresolved: 0 },
  );
}
