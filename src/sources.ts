import fs from "fs";
import { parseCedict } from "./cedict_parse.js";
import { parseStringMap } from "./config.js";
import type { Config } from "./config.js";
import { DecompositionEngine } from "./decompose.js";
import { Diagnostics, MissingSourceError } from "./errors.js";
import type { Logger, SourceName } from "./errors.js";
import { parseIdsTable } from "./ids_parse.js";
import { loadOverrides } from "./keywords.js";
import { buildMapping } from "./mapping.js";
import type { CharacterTable } from "./mapping.js";
import { TIER_ORDER } from "./model.js";
import type { LoadResult, SourceRecord, Tier } from "./model.js";
import { PrimitiveManifest } from "./primitives.js";
import { parseRsh } from "./rsh_parse.js";
import { errorMessage } from "./util.js";

const PARSERS: Record<Tier, (text: string) => LoadResult<SourceRecord>> = {
  primary: parseRsh,
  secondary: parseIdsTable,
  tertiary: parseCedict,
};

const quiet: Logger = () => undefined;

function readSource(source: SourceName, file: string): string {
  try {
    return fs.readFileSync(file, "utf8");
  } catch (e) {
    throw new MissingSourceError(source, errorMessage(e), file);
  }
}

/** Runs one loader; a structural failure is re-raised with the file it came from. */
function parseSource(tier: Tier, file: string): LoadResult<SourceRecord> {
  const text = readSource(tier, file);
  try {
    return PARSERS[tier](text);
  } catch (e) {
    if (e instanceof MissingSourceError && e.path === undefined) {
      throw new MissingSourceError(e.source, e.reason, file);
    }
    throw e;
  }
}

/**
 * Loads PRIMARY, SECONDARY and TERTIARY in that order and returns their records
 * concatenated. Malformed entries become anomalies. An optional source whose
 * file is absent is skipped.
 */
export function loadSources(config: Config, diagnostics = new Diagnostics(), log: Logger = quiet): SourceRecord[] {
  const records: SourceRecord[] = [];
  for (const tier of TIER_ORDER) {
    const sc = config.sources[tier];
    if (!sc.path) {
      if (sc.required) throw new MissingSourceError(tier, "no path configured");
      log(`sources: ${tier} not configured, skipped`);
      continue;
    }
    if (!sc.required && !fs.existsSync(sc.path)) {
      log(`sources: ${tier} '${sc.path}' not found, skipped`);
      continue;
    }
    const result = parseSource(tier, sc.path);
    for (const issue of result.issues) {
      diagnostics.report({ kind: issue.kind, source: tier, character: issue.character, detail: `${issue.at}: ${issue.detail}` });
    }
    records.push(...result.records);
    log(`sources: ${tier} records=${result.records.length} issues=${result.issues.length}`);
  }
  return records;
}

export function loadRadicalVariants(config: Config): Record<string, string> {
  const { path, inline } = config.radical_variants;
  if (!path) return { ...inline };
  const text = readSource("radical-variants", path);
  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch (e) {
    throw new MissingSourceError("radical-variants", `invalid JSON (${errorMessage(e)})`, path);
  }
  return { ...parseStringMap(doc, "radical variants"), ...inline };
}

export function loadManifest(config: Config): PrimitiveManifest {
  const marker = config.primitives.placeholder_marker;
  const file = config.primitives.manifest;
  if (!file) return new PrimitiveManifest([], marker);
  return PrimitiveManifest.fromJson(readSource("manifest", file), marker, file);
}

export function buildTableFromConfig(config: Config, diagnostics = new Diagnostics(), log: Logger = quiet): CharacterTable {
  const records = loadSources(config, diagnostics, log);
  const table = buildMapping(records, {
    radicalVariants: loadRadicalVariants(config),
    placeholderMarker: config.primitives.placeholder_marker,
    diagnostics,
  });
  log(`mapping: entries=${table.size} max_depth=${table.maxNaturalDepth}`);
  return table;
}

export type Pipeline = {
  table: CharacterTable;
  engine: DecompositionEngine;
  manifest: PrimitiveManifest;
  overrides: Map<string, string>;
};

/** Everything a caller needs to decompose characters under `config`. */
export function loadPipeline(config: Config, diagnostics = new Diagnostics(), log: Logger = quiet): Pipeline {
  const table = buildTableFromConfig(config, diagnostics, log);
  const engine = new DecompositionEngine(table, {
    maxDepth: config.decompose.max_depth,
    depthCeiling: config.decompose.depth_ceiling,
    placeholderMarker: config.primitives.placeholder_marker,
    diagnostics,
  });
  const manifest = loadManifest(config);
  const overrides = config.overrides ? loadOverrides(config.overrides) : new Map<string, string>();
  log(`pipeline: default_depth=${engine.defaultMaxDepth} primitives=${manifest.size} overrides=${overrides.size}`);
  return { table, engine, manifest, overrides };
}
