import fs from "fs";
import { pathToFileURL } from "url";
import { loadConfig } from "./config.js";
import type { DecompositionEngine } from "./decompose.js";
import { Diagnostics } from "./errors.js";
import type { DecompositionNode } from "./model.js";
import { loadPipeline } from "./sources.js";
import { countLeaves } from "./summary.js";
import { codePoints } from "./util.js";

export type CoverageReport = {
  total: number;
  fullyResolved: number;
  partiallyResolved: number;
  unresolved: string[];
  /** Unnamed leaf characters, most frequent first. */
  unresolvedLeaves: { character: string; count: number }[];
};

function unnamedLeaves(n: DecompositionNode, into: string[]): void {
  if (n.children.length === 0) {
    if (!n.keyword) into.push(n.character);
    return;
  }
  for (const c of n.children) unnamedLeaves(c, into);
}

export function coverageReport(engine: DecompositionEngine, characters: Iterable<string>): CoverageReport {
  const report: CoverageReport = { total: 0, fullyResolved: 0, partiallyResolved: 0, unresolved: [], unresolvedLeaves: [] };
  const freq = new Map<string, number>();
  for (const character of new Set(characters)) {
    report.total += 1;
    const tree = engine.decompose(character);
    const { resolved, unresolved } = countLeaves(tree);
    if (unresolved === 0) {
      report.fullyResolved += 1;
      continue;
    }
    if (resolved > 0) report.partiallyResolved += 1;
    else report.unresolved.push(character);
    const leaves: string[] = [];
    unnamedLeaves(tree, leaves);
    for (const l of leaves) freq.set(l, (freq.get(l) ?? 0) + 1);
  }
  report.unresolvedLeaves = Array.from(freq, ([character, count]) => ({ character, count }))
    .sort((a, b) => b.count - a.count || (a.character < b.character ? -1 : a.character > b.character ? 1 : 0));
  return report;
}

export function formatCoverage(r: CoverageReport, top = 20): string {
  const lines = [
    `characters:         ${r.total}`,
    `fully resolved:     ${r.fullyResolved}`,
    `partially resolved: ${r.partiallyResolved}`,
    `unresolved:         ${r.unresolved.length}`,
    `unresolved leaf components: ${r.unresolvedLeaves.length}`,
  ];
  for (const { character, count } of r.unresolvedLeaves.slice(0, top)) {
    lines.push(`  ${character} appears ${count} time(s)`);
  }
  return lines.join("\n");
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 3) {
  const configPath = process.argv[2];
  const listPath = process.argv[3];
  const diagnostics = new Diagnostics();
  const { table, engine } = loadPipeline(loadConfig(configPath), diagnostics, (m) => console.error(m));
  // Without a list: every single-character table entry that has components.
  const characters = listPath
    ? codePoints(fs.readFileSync(listPath, "utf8")).filter((c) => c.trim() !== "")
    : Array.from(table.values())
        .filter((e) => e.components.length > 0 && codePoints(e.character).length === 1)
        .map((e) => e.character);
  process.stdout.write(formatCoverage(coverageReport(engine, characters)) + "\n");
  console.error(`coverage: ${diagnostics.summary()}`);
}
