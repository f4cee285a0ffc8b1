import fs from "fs";
import path from "path";
import yaml from "js-yaml";
import { DEFAULT_DEPTH_CEILING } from "./decompose.js";
import { TIER_ORDER } from "./model.js";
import type { Tier } from "./model.js";
import { DEFAULT_PLACEHOLDER_MARKER } from "./primitives.js";
import { asBool, asNum, asStr, die, errorMessage, isRecord } from "./util.js";

export type SourceConfig = {
  path?: string;
  required: boolean;
};

export type Config = {
  sources: Record<Tier, SourceConfig>;
  primitives: {
    manifest?: string;
    placeholder_marker: string;
  };
  decompose: {
    max_depth?: number;
    depth_ceiling: number;
  };
  radical_variants: {
    path?: string;
    inline: Record<string, string>;
  };
  overrides?: string;
};

const defaultConfig: Config = {
  sources: {
    primary: { required: true },
    secondary: { required: true },
    tertiary: { required: true },
  },
  primitives: { placeholder_marker: DEFAULT_PLACEHOLDER_MARKER },
  decompose: { depth_ceiling: DEFAULT_DEPTH_CEILING },
  radical_variants: { inline: {} },
};

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const v = raw[key];
  if (v === undefined || v === null) return {};
  if (!isRecord(v)) die(`config: '${key}' must be a mapping`);
  return v;
}

function depth(v: unknown, key: string): number | undefined {
  if (v === undefined || v === null) return undefined;
  const n = asNum(v);
  if (n === undefined || !Number.isInteger(n) || n < 0) die(`config: '${key}' must be a non-negative integer`);
  return n;
}

function stringMap(raw: Record<string, unknown>, what: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(raw)) {
    const s = asStr(v);
    if (s === undefined) die(`${what}: value for '${k}' must be a string`);
    out[k] = s;
  }
  return out;
}

/** Fills every missing setting from the defaults; relative paths resolve against `baseDir`. */
export function mergeConfig(rules: unknown, baseDir: string): Config {
  const raw = rules === undefined || rules === null ? {} : rules;
  if (!isRecord(raw)) die("config: top level must be a mapping");
  const resolvePath = (v: unknown): string | undefined => {
    const s = asStr(v)?.trim();
    return s ? path.resolve(baseDir, s) : undefined;
  };

  const rawSources = section(raw, "sources");
  const sources = { ...defaultConfig.sources };
  for (const tier of TIER_ORDER) {
    const v = rawSources[tier];
    // A bare string is just the path.
    const s: Record<string, unknown> = isRecord(v) ? v : { path: v };
    sources[tier] = {
      path: resolvePath(s.path),
      required: asBool(s.required) ?? defaultConfig.sources[tier].required,
    };
  }

  const prims = section(raw, "primitives");
  const dec = section(raw, "decompose");

  const rv = raw.radical_variants;
  const radical_variants = isRecord(rv)
    ? { inline: stringMap(rv, "config: radical_variants") }
    : { path: resolvePath(rv), inline: {} };

  return {
    sources,
    primitives: {
      manifest: resolvePath(prims.manifest),
      placeholder_marker: asStr(prims.placeholder_marker) ?? defaultConfig.primitives.placeholder_marker,
    },
    decompose: {
      max_depth: depth(dec.max_depth, "decompose.max_depth"),
      depth_ceiling: depth(dec.depth_ceiling, "decompose.depth_ceiling") ?? defaultConfig.decompose.depth_ceiling,
    },
    radical_variants,
    overrides: resolvePath(raw.overrides),
  };
}

export function parseStringMap(raw: unknown, what: string): Record<string, string> {
  if (!isRecord(raw)) die(`${what}: top level must be a mapping`);
  return stringMap(raw, what);
}

export function loadConfig(configPath: string): Config {
  let rules: unknown;
  try {
    rules = yaml.load(fs.readFileSync(configPath, "utf8"));
  } catch (e) {
    die(`config: cannot load '${configPath}': ${errorMessage(e)}`);
  }
  return mergeConfig(rules, path.dirname(path.resolve(configPath)));
}
