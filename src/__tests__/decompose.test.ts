import { describe, expect, it } from "vitest";
import { DecompositionEngine } from "../decompose.js";
import { Diagnostics } from "../errors.js";
import { interpretLayout, SINGLE_LAYOUT } from "../layout.js";
import { buildMapping, CharacterTable } from "../mapping.js";
import type { AuthoritativeEntry, DecompositionNode } from "../model.js";
import { primary, secondary, tertiary } from "./helpers.js";

function entry(character: string, keyword: string, components: string[], code?: string): AuthoritativeEntry {
  return {
    character,
    keyword,
    components,
    layout: interpretLayout(code, components.length),
    tier: "secondary",
    aliases: [],
    isPlaceholder: false,
  };
}

function nodes(tree: DecompositionNode): DecompositionNode[] {
  return [tree, ...tree.children.flatMap(nodes)];
}

function height(tree: DecompositionNode): number {
  return tree.children.length === 0 ? 0 : 1 + Math.max(...tree.children.map(height));
}

// A -> B -> C -> D, with D named "dee"
const chain = buildMapping([
  secondary("A", ["B"], "⿱"),
  secondary("B", ["C"], "⿱"),
  secondary("C", ["D"], "⿱"),
  tertiary("D", "dee"),
]);

describe("DecompositionEngine.decompose", () => {
  it("expands a left-right character into its named parts", () => {
    const table = buildMapping([
      primary("A", "", ["B", "C"], "left-right"),
      primary("B", "sun"),
      primary("C", "moon"),
    ]);
    const tree = new DecompositionEngine(table).decompose("A");
    expect(tree.layout.tag).toBe("LEFT_RIGHT");
    expect(tree.layout.slots).toEqual(["left", "right"]);
    expect(tree.children.map((c) => [c.character, c.keyword, c.children.length, c.depth])).toEqual([
      ["B", "sun", 0, 1],
      ["C", "moon", 0, 1],
    ]);
  });

  it("returns a bare leaf for a character with no entry", () => {
    const tree = new DecompositionEngine(chain).decompose("Q");
    expect(tree).toEqual({
      character: "Q",
      keyword: "",
      keywordSource: "none",
      aliases: [],
      layout: SINGLE_LAYOUT,
      depth: 0,
      children: [],
      isPrimitivePlaceholder: false,
    });
  });

  it("stops a self-referencing entry after one step", () => {
    const diagnostics = new Diagnostics();
    const table = new CharacterTable([entry("A", "ay", ["A"])]);
    const tree = new DecompositionEngine(table, { diagnostics }).decompose("A");
    expect(tree.children).toHaveLength(1);
    expect(tree.children[0].character).toBe("A");
    expect(tree.children[0].children).toEqual([]);
    expect(tree.children[0].truncated).toBe("cycle");
    expect(diagnostics.count("cycle")).toBe(1);
  });

  it("stops a two-step cycle at the repeated character", () => {
    const table = new CharacterTable([entry("A", "ay", ["B"], "⿱"), entry("B", "bee", ["A"], "⿱")]);
    const engine = new DecompositionEngine(table);
    const a = engine.decompose("A");
    expect(nodes(a).map((n) => [n.character, n.depth, n.truncated])).toEqual([
      ["A", 0, undefined],
      ["B", 1, undefined],
      ["A", 2, "cycle"],
    ]);
    const b = engine.decompose("B");
    expect(nodes(b).map((n) => n.character)).toEqual(["B", "A", "B"]);
    expect(b.children[0].children[0].truncated).toBe("cycle");
  });

  it("never lets a cached subtree repeat an ancestor", () => {
    const table = new CharacterTable([entry("K", "kay", ["M"], "⿱"), entry("M", "em", ["K"], "⿱")]);
    const engine = new DecompositionEngine(table);
    const shallow = engine.decompose("K", 1);
    expect(shallow.children[0].truncated).toBe("depth");
    const deep = engine.decompose("M", 2);
    expect(nodes(deep).map((n) => [n.character, n.truncated])).toEqual([
      ["M", undefined],
      ["K", undefined],
      ["M", "cycle"],
    ]);
  });

  it("cuts expansion at maxDepth", () => {
    const diagnostics = new Diagnostics();
    const engine = new DecompositionEngine(chain, { diagnostics });
    const tree = engine.decompose("A", 2);
    expect(nodes(tree).map((n) => [n.character, n.depth, n.truncated])).toEqual([
      ["A", 0, undefined],
      ["B", 1, undefined],
      ["C", 2, "depth"],
    ]);
    expect(diagnostics.count("depth")).toBe(1);
    expect(engine.decompose("A", 0).truncated).toBe("depth");
  });

  it("reports a depth cut for every tree that contains one, cached or not", () => {
    const table = buildMapping([
      secondary("A", ["B"], "⿱"),
      secondary("X", ["B"], "⿱"),
      secondary("B", ["C"], "⿱"),
      secondary("C", ["D"], "⿱"),
    ]);
    const diagnostics = new Diagnostics();
    const engine = new DecompositionEngine(table, { diagnostics });
    engine.decompose("A", 2);
    const tree = engine.decompose("X", 2);
    expect(tree.children[0].children[0].truncated).toBe("depth");
    expect(diagnostics.count("depth")).toBe(2);
    engine.decompose("A", 2);
    expect(diagnostics.count("depth")).toBe(3);
    expect(diagnostics.anomalies.map((a) => a.character)).toEqual(["C", "C", "C"]);
  });

  it("keeps every path within the depth limit", () => {
    const engine = new DecompositionEngine(chain);
    for (let d = 0; d <= 4; d += 1) {
      for (const c of ["A", "B", "C", "D"]) {
        expect(height(engine.decompose(c, d))).toBeLessThanOrEqual(d);
      }
    }
  });

  it("defaults to the table's natural depth, capped by the ceiling", () => {
    expect(new DecompositionEngine(chain).defaultMaxDepth).toBe(3);
    expect(height(new DecompositionEngine(chain).decompose("A"))).toBe(3);
    expect(new DecompositionEngine(chain, { depthCeiling: 1 }).defaultMaxDepth).toBe(1);
    expect(new DecompositionEngine(chain, { maxDepth: 5 }).defaultMaxDepth).toBe(5);
  });

  it("rejects bad input", () => {
    const engine = new DecompositionEngine(chain);
    expect(() => engine.decompose("")).toThrow(/empty character/);
    expect(() => engine.decompose("A", -1)).toThrow(/non-negative integer/);
    expect(() => engine.decompose("A", 1.5)).toThrow(/non-negative integer/);
    expect(() => new DecompositionEngine(chain, { depthCeiling: -2 })).toThrow(/depthCeiling/);
  });

  it("is deterministic and hands out fresh trees", () => {
    const engine = new DecompositionEngine(chain);
    const first = engine.decompose("A");
    const second = engine.decompose("A");
    expect(second).toEqual(first);
    expect(second).not.toBe(first);
    expect(second.children[0]).not.toBe(first.children[0]);
  });

  it("gives every node a layout that fits its children", () => {
    const table = buildMapping([
      secondary("A", ["B", "C"], "⿰"),
      secondary("B", ["C", "D", "E"], "⿰"),
      secondary("C", ["D"], "⿱"),
    ]);
    for (const n of nodes(new DecompositionEngine(table).decompose("A"))) {
      expect(n.layout.tag === "UNKNOWN" || n.layout.slots.length === n.children.length).toBe(true);
    }
  });

  it("marks placeholder nodes", () => {
    const table = buildMapping([secondary("A", ["囧5", "日"], "⿱")]);
    const tree = new DecompositionEngine(table).decompose("A");
    expect(tree.children.map((c) => c.isPrimitivePlaceholder)).toEqual([true, false]);
  });

  it("decomposes batches in input order", () => {
    const engine = new DecompositionEngine(chain);
    expect(engine.decomposeMany(["C", "A", "Q"]).map((t) => t.character)).toEqual(["C", "A", "Q"]);
  });

  it("caches shapes until cleared", () => {
    const engine = new DecompositionEngine(chain);
    engine.decompose("A");
    expect(engine.cacheSize).toBeGreaterThan(0);
    engine.clearCache();
    expect(engine.cacheSize).toBe(0);
  });
});

describe("DecompositionEngine.decomposeAndResolve", () => {
  it("overrides a node at depth 3 without touching the table", () => {
    const engine = new DecompositionEngine(chain);
    const tree = engine.decomposeAndResolve("A", { D: "override" });
    const all = nodes(tree);
    expect(all.map((n) => [n.character, n.keyword, n.keywordSource])).toEqual([
      ["A", "", "none"],
      ["B", "", "none"],
      ["C", "", "none"],
      ["D", "override", "override"],
    ]);
    expect(all[3].depth).toBe(3);
    expect(chain.get("D")?.keyword).toBe("dee");
    expect(nodes(engine.decompose("A"))[3].keyword).toBe("dee");
  });

  it("applies overrides given as a Map", () => {
    const engine = new DecompositionEngine(chain);
    const tree = engine.decomposeAndResolve("A", new Map([["A", "top"]]), 1);
    expect(tree.keyword).toBe("top");
    expect(tree.children[0].truncated).toBe("depth");
  });
});
