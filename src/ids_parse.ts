import fs from "fs";
import { pathToFileURL } from "url";
import { MissingSourceError } from "./errors.js";
import type { LoadIssue, LoadResult, SecondaryRecord } from "./model.js";
import { codePoints } from "./util.js";

export type IdsNode =
  | { kind: "op"; op: string; operands: IdsNode[] }
  | { kind: "char"; char: string }
  | { kind: "numbered"; n: number };

type Token = { kind: "char"; value: string } | { kind: "numbered"; n: number };

type NumberedComponent = {
  description: string;
  expansion?: string;
};

const ARITY: Record<string, number> = {
  "⿰": 2, "⿱": 2, "⿲": 3, "⿳": 3, "⿴": 2, "⿵": 2, "⿶": 2, "⿷": 2,
  "⿸": 2, "⿹": 2, "⿺": 2, "⿻": 2, "⿼": 2, "⿽": 2, "⿾": 1, "⿿": 1, "〾": 1,
};

/** Drops source annotations: `$(...)` sets, `[...]` region tags and `^` marks. */
export function cleanIds(raw: string): string {
  return raw
    .replace(/\$\([^)]*\)/g, "")
    .replace(/\[[^\]]*\]/g, "")
    .replace(/\^/g, "")
    .trim();
}

function tokenize(ids: string): Token[] | undefined {
  const cps = codePoints(ids);
  const tokens: Token[] = [];
  let i = 0;
  while (i < cps.length) {
    const ch = cps[i];
    if (ch === "{") {
      const close = cps.indexOf("}", i);
      if (close < 0) return undefined;
      const n = Number(cps.slice(i + 1, close).join(""));
      if (!Number.isInteger(n)) return undefined;
      tokens.push({ kind: "numbered", n });
      i = close + 1;
      continue;
    }
    if (!/[\s()]/.test(ch)) tokens.push({ kind: "char", value: ch });
    i += 1;
  }
  return tokens;
}

/** Returns undefined when an operator is missing operands. Trailing tokens are ignored. */
export function parseIds(ids: string): IdsNode | undefined {
  const tokens = tokenize(cleanIds(ids));
  if (!tokens) return undefined;
  let pos = 0;
  const next = (): IdsNode | undefined => {
    const tok = tokens[pos];
    if (tok === undefined) return undefined;
    pos += 1;
    if (tok.kind === "numbered") return { kind: "numbered", n: tok.n };
    const arity = ARITY[tok.value];
    if (arity === undefined) return { kind: "char", char: tok.value };
    const operands: IdsNode[] = [];
    for (let k = 0; k < arity; k += 1) {
      const child = next();
      if (!child) return undefined;
      operands.push(child);
    }
    return { kind: "op", op: tok.value, operands };
  };
  return next();
}

export function serializeIds(node: IdsNode): string {
  if (node.kind === "char") return node.char;
  if (node.kind === "numbered") return `{${node.n}}`;
  return node.op + node.operands.map(serializeIds).join("");
}

function expandNumbered(node: IdsNode, defs: Map<number, NumberedComponent>, visiting: Set<number>): IdsNode {
  if (node.kind === "char") return node;
  if (node.kind === "op") {
    return { ...node, operands: node.operands.map((o) => expandNumbered(o, defs, visiting)) };
  }
  const expansion = defs.get(node.n)?.expansion;
  if (!expansion || visiting.has(node.n)) return node;
  const parsed = parseIds(expansion);
  if (!parsed) return node;
  visiting.add(node.n);
  const out = expandNumbered(parsed, defs, visiting);
  visiting.delete(node.n);
  return out;
}

function parseNumberedDefinition(line: string): [number, NumberedComponent] | undefined {
  const m = line.match(/^#\s+\{(\d+)\}\s+(.+)$/);
  if (!m) return undefined;
  const parts = m[2].split("\t").map((p) => p.trim());
  const last = parts.length > 1 ? parts[parts.length - 1] : undefined;
  const expansion = last && last !== "？" && last !== "?" ? last : undefined;
  return [Number(m[1]), { description: parts[0], expansion }];
}

/**
 * Turns one parsed IDS tree into records. Nested operator operands have no
 * character of their own, so each gets a synthetic record keyed by its IDS text.
 */
function recordsFor(character: string, tree: IdsNode, ids: string, minted: Set<string>): SecondaryRecord[] {
  const out: SecondaryRecord[] = [];
  const operandKey = (o: IdsNode): string => {
    if (o.kind !== "op") return serializeIds(o);
    const key = serializeIds(o);
    if (!minted.has(key)) {
      minted.add(key);
      out.push({
        tier: "secondary",
        character: key,
        keyword: "",
        components: o.operands.map(operandKey),
        layoutCode: o.op,
        ids: key,
        synthetic: true,
      });
    }
    return key;
  };

  if (tree.kind === "op") {
    const components = tree.operands.map(operandKey);
    out.unshift({ tier: "secondary", character, keyword: "", components, layoutCode: tree.op, ids, synthetic: false });
    return out;
  }
  // No operator at the top (the character itself, a bare variant or an
  // unexpanded {n}): the table has no structure for it.
  return [{ tier: "secondary", character, keyword: "", components: [], ids, synthetic: false }];
}

/** Parses a tab-separated IDS table: `U+XXXX<TAB>char<TAB>ids[<TAB>alt...]`. */
export function parseIdsTable(text: string): LoadResult<SecondaryRecord> {
  const lines = text.replace(/^\uFEFF/, "").split(/\r?\n/);
  const defs = new Map<number, NumberedComponent>();
  for (const line of lines) {
    const def = line.startsWith("#") ? parseNumberedDefinition(line) : undefined;
    if (def) defs.set(def[0], def[1]);
  }

  const records: SecondaryRecord[] = [];
  const issues: LoadIssue[] = [];
  const minted = new Set<string>();
  let dataLines = 0;
  lines.forEach((line, i) => {
    if (line.startsWith("#") || line.trim() === "") return;
    dataLines += 1;
    const at = `line ${i + 1}`;
    const parts = line.trim().split("\t");
    if (parts.length < 3) {
      issues.push({ kind: "malformed-record", at, detail: `expected 3 tab-separated fields, got ${parts.length}` });
      return;
    }
    const character = parts[1].trim();
    const ids = cleanIds(parts[2]);
    const tree = character ? parseIds(ids) : undefined;
    if (!tree) {
      issues.push({ kind: "malformed-record", at, character, detail: `unparseable IDS '${parts[2]}'` });
      return;
    }
    records.push(...recordsFor(character, expandNumbered(tree, defs, new Set()), ids, minted));
  });

  if (records.length === 0) {
    throw new MissingSourceError("secondary", dataLines === 0 ? "no IDS lines" : "no parseable IDS lines");
  }
  return { records, issues };
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 4) {
  const input = process.argv[2];
  const output = process.argv[3];
  const result = parseIdsTable(fs.readFileSync(input, "utf8"));
  fs.writeFileSync(output, JSON.stringify(result, null, 2), "utf8");
  console.error(`ids_parse: records=${result.records.length} issues=${result.issues.length}`);
}
