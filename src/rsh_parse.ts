import fs from "fs";
import { pathToFileURL } from "url";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import { MissingSourceError } from "./errors.js";
import type { LoadIssue, LoadResult, PrimaryRecord } from "./model.js";
import { asNum, asStr, codePoints, isRecord } from "./util.js";

type XmlElement = {
  tag: string;
  attrs: Record<string, string>;
  children: unknown[];
};

type RawFrame = {
  at: string;
  character: string;
  keyword: string;
  frameType: "character" | "primitive";
  number?: number;
  layout?: string;
  aliases: string[];
  cites: string[];
};

function readAttrs(raw: unknown): Record<string, string> {
  const attrs: Record<string, string> = {};
  if (!isRecord(raw)) return attrs;
  for (const [k, v] of Object.entries(raw)) {
    const value = asStr(v);
    if (value !== undefined) attrs[k.replace(/^@_/, "")] = value;
  }
  return attrs;
}

// Ordered-mode nodes look like { tag: [children], ":@": { "@_attr": "v" } }.
function toElement(n: unknown): XmlElement | undefined {
  if (!isRecord(n)) return undefined;
  for (const [key, value] of Object.entries(n)) {
    if (key === ":@" || key === "#text" || !Array.isArray(value)) continue;
    return { tag: key, attrs: readAttrs(n[":@"]), children: value };
  }
  return undefined;
}

function childElements(children: unknown[]): XmlElement[] {
  const out: XmlElement[] = [];
  for (const c of children) {
    const el = toElement(c);
    if (el) out.push(el);
  }
  return out;
}

function descendants(children: unknown[], tag: string): XmlElement[] {
  const out: XmlElement[] = [];
  const walk = (nodes: unknown[]): void => {
    for (const el of childElements(nodes)) {
      if (el.tag === tag) out.push(el);
      walk(el.children);
    }
  };
  walk(children);
  return out;
}

function textOf(children: unknown[]): string {
  let out = "";
  for (const c of children) {
    if (isRecord(c) && "#text" in c) {
      out += asStr(c["#text"]) ?? "";
      continue;
    }
    const el = toElement(c);
    if (el) out += textOf(el.children);
  }
  return out.trim();
}

function readFrame(el: XmlElement, index: number): RawFrame {
  const type = el.attrs["xsi:type"] ?? el.attrs.type ?? "character";
  const number = asNum(el.attrs.number);
  const aliases: string[] = [];
  for (const prim of childElements(el.children).filter((c) => c.tag === "primitive")) {
    for (const ps of descendants(prim.children, "pself")) {
      const t = textOf(ps.children);
      if (t) aliases.push(t);
    }
  }
  const cites: string[] = [];
  for (const p of childElements(el.children).filter((c) => c.tag === "p")) {
    for (const cite of descendants(p.children, "cite")) {
      const t = textOf(cite.children);
      if (t) cites.push(t);
    }
  }
  return {
    at: `frame ${index + 1}`,
    character: (el.attrs.character ?? "").trim(),
    keyword: (el.attrs.keyword ?? "").trim(),
    frameType: type === "primitive" ? "primitive" : "character",
    number: number !== undefined && Number.isInteger(number) ? number : undefined,
    layout: el.attrs.layout?.trim() || undefined,
    aliases,
    cites,
  };
}

function looksLikeCharacter(name: string): boolean {
  return codePoints(name).length === 1 && /[^\x00-\x7f]/.test(name);
}

/**
 * Parses Heisig frame XML. Components are cited by keyword, so every cite is
 * resolved against the keywords of the whole file, aliases taking precedence.
 */
export function parseRsh(text: string): LoadResult<PrimaryRecord> {
  const valid = XMLValidator.validate(text);
  if (valid !== true) {
    throw new MissingSourceError("primary", `not well-formed XML (${valid.err.msg} at line ${valid.err.line})`);
  }
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    preserveOrder: true,
    parseTagValue: false,
    trimValues: true,
  });
  const doc: unknown = parser.parse(text);
  const frameEls = descendants(Array.isArray(doc) ? doc : [], "frame");
  if (frameEls.length === 0) {
    throw new MissingSourceError("primary", "document contains no <frame> elements");
  }

  const issues: LoadIssue[] = [];
  const frames: RawFrame[] = [];
  frameEls.forEach((el, i) => {
    const f = readFrame(el, i);
    if (!f.character) {
      issues.push({ kind: "malformed-record", at: f.at, detail: "frame has no character attribute" });
      return;
    }
    frames.push(f);
  });

  const byKeyword = new Map<string, string>();
  const byAlias = new Map<string, string>();
  for (const f of frames) {
    if (f.keyword && !byKeyword.has(f.keyword)) byKeyword.set(f.keyword, f.character);
  }
  for (const f of frames) {
    for (const a of f.aliases) {
      if (!byAlias.has(a)) byAlias.set(a, f.character);
    }
  }

  const records: PrimaryRecord[] = frames.map((f) => {
    const components: string[] = [];
    for (const name of f.cites) {
      const ch = byAlias.get(name) ?? byKeyword.get(name) ?? (looksLikeCharacter(name) ? name : undefined);
      if (ch === undefined) {
        issues.push({
          kind: "unresolved-component",
          at: f.at,
          character: f.character,
          detail: `cite '${name}' matches no keyword or alias`,
        });
        continue;
      }
      components.push(ch);
    }
    return {
      tier: "primary",
      character: f.character,
      keyword: f.keyword,
      components,
      layoutCode: f.layout,
      aliases: f.aliases,
      frameType: f.frameType,
      number: f.number,
    };
  });
  return { records, issues };
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 4) {
  const input = process.argv[2];
  const output = process.argv[3];
  if (!input || !output) {
    console.error("Usage: node dist/src/rsh_parse.js <rsh.xml> <out.json>");
    process.exit(1);
  }
  const result = parseRsh(fs.readFileSync(input, "utf8"));
  fs.writeFileSync(output, JSON.stringify(result, null, 2), "utf8");
  console.error(`rsh_parse: records=${result.records.length} issues=${result.issues.length}`);
}
