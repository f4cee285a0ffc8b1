import fs from "fs";
import { pathToFileURL } from "url";
import { MissingSourceError } from "./errors.js";
import type { LoadIssue, LoadResult, TertiaryRecord } from "./model.js";
import { codePoints } from "./util.js";

const LINE = /^(\S+)\s+(\S+)\s+\[(.+?)\]\s+\/(.+)\/$/;

// Definitions that say nothing about meaning make poor keywords.
const NOT_A_GLOSS = /^(surname\b|(old |archaic )?variant of\b|see\b|CL:|used in\b|abbr\. (for|of)\b)/i;

export function pickGloss(definitions: readonly string[]): string {
  const chosen = definitions.find((d) => !NOT_A_GLOSS.test(d.trim())) ?? definitions[0] ?? "";
  return chosen
    .replace(/\([^)]*\)/g, " ")
    .replace(/\[[^\]]*\]/g, " ")
    .split(";")[0]
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Parses CC-CEDICT text. Only single-character headwords become records; both
 * the simplified and, when it differs, the traditional form get one.
 */
export function parseCedict(text: string): LoadResult<TertiaryRecord> {
  const records: TertiaryRecord[] = [];
  const issues: LoadIssue[] = [];
  let matched = 0;
  text.split(/\r?\n/).forEach((line, i) => {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) return;
    const at = `line ${i + 1}`;
    const m = trimmed.match(LINE);
    if (!m) {
      issues.push({ kind: "malformed-record", at, detail: "not a 'trad simp [pinyin] /defs/' line" });
      return;
    }
    matched += 1;
    const [, traditional, simplified, pinyin, defsRaw] = m;
    if (codePoints(simplified).length !== 1) return;
    const definitions = defsRaw
      .split("/")
      .map((d) => d.trim())
      .filter(Boolean);
    if (definitions.length === 0) {
      issues.push({ kind: "malformed-record", at, character: simplified, detail: "no definitions" });
      return;
    }
    const keyword = pickGloss(definitions);
    const forms = traditional === simplified ? [simplified] : [simplified, traditional];
    for (const character of forms) {
      records.push({ tier: "tertiary", character, keyword, components: [], reading: pinyin.trim(), definitions });
    }
  });
  if (matched === 0) {
    throw new MissingSourceError("tertiary", "no dictionary lines in CC-CEDICT format");
  }
  return { records, issues };
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 4) {
  const input = process.argv[2];
  const output = process.argv[3];
  const result = parseCedict(fs.readFileSync(input, "utf8"));
  fs.writeFileSync(output, JSON.stringify(result, null, 2), "utf8");
  console.error(`cedict_parse: records=${result.records.length} issues=${result.issues.length}`);
}
