import { fileURLToPath } from "url";
import { describe, expect, it } from "vitest";
import { MissingSourceError } from "../errors.js";
import { loadOverrides, normalizeOverrides, parseOverrides, resolveKeywords } from "../keywords.js";
import { SINGLE_LAYOUT, interpretLayout } from "../layout.js";
import type { DecompositionNode } from "../model.js";

function leaf(character: string, keyword: string, depth: number): DecompositionNode {
  return {
    character,
    keyword,
    keywordSource: keyword ? "table" : "none",
    aliases: [],
    layout: SINGLE_LAYOUT,
    depth,
    children: [],
    isPrimitivePlaceholder: false,
  };
}

const tree: DecompositionNode = {
  ...leaf("明", "bright", 0),
  layout: interpretLayout("⿰", 2),
  children: [leaf("日", "sun", 1), leaf("月", "moon", 1)],
};

describe("normalizeOverrides", () => {
  it("trims values and drops blank ones", () => {
    expect(normalizeOverrides({ 日: " day ", 月: "  " })).toEqual(new Map([["日", "day"]]));
    expect(normalizeOverrides(new Map([["月", "month"]]))).toEqual(new Map([["月", "month"]]));
    expect(normalizeOverrides(undefined).size).toBe(0);
  });
});

describe("resolveKeywords", () => {
  it("replaces keywords at any depth and marks their source", () => {
    const out = resolveKeywords(tree, { 月: "month" });
    expect(out.keyword).toBe("bright");
    expect(out.keywordSource).toBe("table");
    expect(out.children[1].keyword).toBe("month");
    expect(out.children[1].keywordSource).toBe("override");
  });

  it("leaves the input tree as it was", () => {
    resolveKeywords(tree, { 明: "clear", 日: "day" });
    expect(tree.keyword).toBe("bright");
    expect(tree.children[0].keyword).toBe("sun");
    expect(tree.children[0].keywordSource).toBe("table");
  });

  it("ignores blank overrides", () => {
    expect(resolveKeywords(tree, { 日: "" }).children[0].keyword).toBe("sun");
  });
});

describe("parseOverrides", () => {
  it("reads a YAML mapping", () => {
    expect(parseOverrides("京: capital\n一: 1\n日: ''\n")).toEqual(
      new Map([
        ["京", "capital"],
        ["一", "1"],
      ]),
    );
  });

  it("accepts an empty document", () => {
    expect(parseOverrides("").size).toBe(0);
  });

  it("rejects documents that are not mappings", () => {
    expect(() => parseOverrides("- a\n- b\n")).toThrow(MissingSourceError);
    expect(() => parseOverrides("a: [")).toThrow(/invalid YAML/);
  });
});

describe("loadOverrides", () => {
  it("loads the override file", () => {
    const path = fileURLToPath(new URL("./fixtures/overrides.yaml", import.meta.url));
    expect(loadOverrides(path)).toEqual(new Map([["京", "capital"]]));
  });

  it("fails for a missing file", () => {
    expect(() => loadOverrides("/nonexistent/overrides.yaml")).toThrow(MissingSourceError);
  });
});
