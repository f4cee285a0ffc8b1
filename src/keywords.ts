import fs from "fs";
import yaml from "js-yaml";
import { MissingSourceError } from "./errors.js";
import type { DecompositionNode } from "./model.js";
import { asStr, errorMessage, isRecord } from "./util.js";

export type KeywordOverrides = ReadonlyMap<string, string> | Readonly<Record<string, string>>;

function isMapLike(o: KeywordOverrides): o is ReadonlyMap<string, string> {
  return o instanceof Map;
}

/** Drops blank overrides and trims the rest. */
export function normalizeOverrides(overrides?: KeywordOverrides): Map<string, string> {
  const out = new Map<string, string>();
  if (!overrides) return out;
  const pairs = isMapLike(overrides) ? overrides.entries() : Object.entries(overrides);
  for (const [character, keyword] of pairs) {
    const k = keyword.trim();
    if (k) out.set(character, k);
  }
  return out;
}

/**
 * Returns a copy of `node` with overrides applied at every depth. The input
 * tree and the character table are left untouched.
 */
export function resolveKeywords(node: DecompositionNode, overrides?: KeywordOverrides): DecompositionNode {
  const table = normalizeOverrides(overrides);
  const apply = (n: DecompositionNode): DecompositionNode => {
    const children = n.children.map(apply);
    const keyword = table.get(n.character);
    return keyword === undefined
      ? { ...n, children }
      : { ...n, keyword, keywordSource: "override", children };
  };
  return apply(node);
}

/** Reads a YAML mapping `character: keyword`. Non-string values are skipped. */
export function parseOverrides(text: string, path?: string): Map<string, string> {
  let doc: unknown;
  try {
    doc = yaml.load(text);
  } catch (e) {
    throw new MissingSourceError("overrides", `invalid YAML (${errorMessage(e)})`, path);
  }
  if (doc === undefined || doc === null) return new Map();
  if (!isRecord(doc)) throw new MissingSourceError("overrides", "top level must be a mapping", path);
  const raw: Record<string, string> = {};
  for (const [character, v] of Object.entries(doc)) {
    const keyword = asStr(v);
    if (keyword !== undefined) raw[character] = keyword;
  }
  return normalizeOverrides(raw);
}

export function loadOverrides(path: string): Map<string, string> {
  let text: string;
  try {
    text = fs.readFileSync(path, "utf8");
  } catch (e) {
    throw new MissingSourceError("overrides", errorMessage(e), path);
  }
  return parseOverrides(text, path);
}
