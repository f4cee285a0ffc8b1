import type { Diagnostics } from "./errors.js";
import { resolveKeywords } from "./keywords.js";
import type { KeywordOverrides } from "./keywords.js";
import { fitLayout, SINGLE_LAYOUT } from "./layout.js";
import type { CharacterTable } from "./mapping.js";
import type { DecompositionNode, Truncation } from "./model.js";
import { DEFAULT_PLACEHOLDER_MARKER, isPlaceholderCharacter } from "./primitives.js";
import { die } from "./util.js";

export const DEFAULT_DEPTH_CEILING = 32;

export type EngineOptions = {
  /** Fixed default for calls that pass no depth. */
  maxDepth?: number;
  /** Caps the table-derived default depth. */
  depthCeiling?: number;
  placeholderMarker?: string;
  diagnostics?: Diagnostics;
};

// The structure of one expansion, without keywords or depths. Shared by the
// cache; never handed to callers.
type Shape = {
  character: string;
  children: readonly Shape[];
  truncated?: Truncation;
  /** Every character in the shape, root included. */
  members: ReadonlySet<string>;
  /** Some branch stopped on an ancestor, so the shape depends on the path. */
  cyclic: boolean;
  /** Some branch was cut by the depth limit. */
  depthCut: boolean;
};

function checkDepth(d: number, what: string): number {
  if (!Number.isInteger(d) || d < 0) die(`${what} must be a non-negative integer, got ${d}`);
  return d;
}

function intersects(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  for (const x of small) {
    if (large.has(x)) return true;
  }
  return false;
}

function leafShape(character: string, truncated?: Truncation): Shape {
  return {
    character,
    children: [],
    truncated,
    members: new Set([character]),
    cyclic: truncated === "cycle",
    depthCut: truncated === "depth",
  };
}

export class DecompositionEngine {
  private readonly cache = new Map<string, Shape>();
  private readonly marker: string;
  private readonly diagnostics?: Diagnostics;
  readonly defaultMaxDepth: number;

  constructor(readonly table: CharacterTable, options: EngineOptions = {}) {
    const ceiling = checkDepth(options.depthCeiling ?? DEFAULT_DEPTH_CEILING, "depthCeiling");
    this.defaultMaxDepth = options.maxDepth !== undefined
      ? checkDepth(options.maxDepth, "maxDepth")
      : Math.min(table.maxNaturalDepth, ceiling);
    this.marker = options.placeholderMarker ?? DEFAULT_PLACEHOLDER_MARKER;
    this.diagnostics = options.diagnostics;
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  clearCache(): void {
    this.cache.clear();
  }

  /**
   * Expands `character` depth-first into a fresh tree. The root has depth 0 and
   * no path is longer than `maxDepth`. Components that repeat an ancestor and
   * nodes cut off by the depth limit become leaves marked with `truncated`.
   */
  decompose(character: string, maxDepth?: number): DecompositionNode {
    if (character === "") die("decompose: empty character");
    const limit = maxDepth === undefined ? this.defaultMaxDepth : checkDepth(maxDepth, "maxDepth");
    const shape = this.shapeOf(character, limit, new Set());
    return this.materialize(shape, 0);
  }

  decomposeMany(characters: Iterable<string>, maxDepth?: number): DecompositionNode[] {
    const out: DecompositionNode[] = [];
    for (const c of characters) out.push(this.decompose(c, maxDepth));
    return out;
  }

  decomposeAndResolve(character: string, overrides?: KeywordOverrides, maxDepth?: number): DecompositionNode {
    return resolveKeywords(this.decompose(character, maxDepth), overrides);
  }

  private shapeOf(character: string, remaining: number, ancestors: Set<string>): Shape {
    const key = `${remaining}\u0000${character}`;
    const cached = this.cache.get(key);
    if (cached && !intersects(cached.members, ancestors)) {
      // Each cut-off node in the returned tree is reported, cached or not.
      if (cached.depthCut) this.reportDepthCuts(cached);
      return cached;
    }

    const entry = this.table.get(character);
    if (!entry || entry.components.length === 0) {
      const leaf = leafShape(character);
      this.cache.set(key, leaf);
      return leaf;
    }
    if (remaining === 0) {
      this.reportDepth(character);
      const leaf = leafShape(character, "depth");
      this.cache.set(key, leaf);
      return leaf;
    }

    ancestors.add(character);
    const children: Shape[] = [];
    const members = new Set<string>([character]);
    let cyclic = false;
    let depthCut = false;
    for (const component of entry.components) {
      let child: Shape;
      if (ancestors.has(component)) {
        this.diagnostics?.report({
          kind: "cycle",
          character,
          detail: `component '${component}' is already on the path; left unexpanded`,
        });
        child = leafShape(component, "cycle");
      } else {
        child = this.shapeOf(component, remaining - 1, ancestors);
      }
      children.push(child);
      cyclic = cyclic || child.cyclic;
      depthCut = depthCut || child.depthCut;
      for (const m of child.members) members.add(m);
    }
    ancestors.delete(character);

    const shape: Shape = { character, children, members, cyclic, depthCut };
    if (!cyclic) this.cache.set(key, shape);
    return shape;
  }

  private reportDepth(character: string): void {
    const count = this.table.get(character)?.components.length ?? 0;
    this.diagnostics?.report({
      kind: "depth",
      character,
      detail: `depth limit reached; ${count} component(s) not expanded`,
    });
  }

  private reportDepthCuts(shape: Shape): void {
    if (shape.truncated === "depth") this.reportDepth(shape.character);
    for (const c of shape.children) {
      if (c.depthCut) this.reportDepthCuts(c);
    }
  }

  private materialize(shape: Shape, depth: number): DecompositionNode {
    const entry = this.table.get(shape.character);
    const children = shape.children.map((c) => this.materialize(c, depth + 1));
    const keyword = entry?.keyword ?? "";
    return {
      character: shape.character,
      keyword,
      keywordSource: keyword ? "table" : "none",
      aliases: entry ? [...entry.aliases] : [],
      reading: entry?.reading,
      tier: entry?.tier,
      layout: entry ? fitLayout(entry.layout, children.length) : SINGLE_LAYOUT,
      depth,
      children,
      isPrimitivePlaceholder: isPlaceholderCharacter(shape.character, this.marker),
      truncated: shape.truncated,
    };
  }
}
