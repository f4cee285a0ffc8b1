export * from "./model.js";
export * from "./errors.js";
export { interpretLayout, fitLayout, lookupLayoutTag, SINGLE_LAYOUT } from "./layout.js";
export { parseRsh } from "./rsh_parse.js";
export { parseIds, parseIdsTable, cleanIds, serializeIds } from "./ids_parse.js";
export type { IdsNode } from "./ids_parse.js";
export { parseCedict, pickGloss } from "./cedict_parse.js";
export { buildMapping, CharacterTable } from "./mapping.js";
export type { MappingOptions } from "./mapping.js";
export { DecompositionEngine, DEFAULT_DEPTH_CEILING } from "./decompose.js";
export type { EngineOptions } from "./decompose.js";
export { resolveKeywords, normalizeOverrides, parseOverrides, loadOverrides } from "./keywords.js";
export type { KeywordOverrides } from "./keywords.js";
export {
  PrimitiveManifest,
  primitiveAssets,
  isPlaceholderCharacter,
  DEFAULT_PLACEHOLDER_MARKER,
} from "./primitives.js";
export type { PrimitiveAsset } from "./primitives.js";
export { namedComponents, formatDecomposition, formatComponentsDetail, formatTree, countLeaves } from "./summary.js";
export type { NamedComponent, LeafCount } from "./summary.js";
export { coverageReport, formatCoverage } from "./coverage.js";
export type { CoverageReport } from "./coverage.js";
export { loadConfig, mergeConfig } from "./config.js";
export type { Config, SourceConfig } from "./config.js";
export { loadSources, loadRadicalVariants, loadManifest, buildTableFromConfig, loadPipeline } from "./sources.js";
export type { Pipeline } from "./sources.js";
