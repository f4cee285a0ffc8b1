import { MissingPrimitiveAssetError, MissingSourceError } from "./errors.js";
import type { DecompositionNode } from "./model.js";
import { asBool, asStr, die, errorMessage, isRecord } from "./util.js";

export const DEFAULT_PLACEHOLDER_MARKER = "囧";

/**
 * Source data writes primitives that have no Unicode glyph as the marker plus
 * a distinguishing suffix. The bare marker is an ordinary character.
 */
export function isPlaceholderCharacter(character: string, marker: string = DEFAULT_PLACEHOLDER_MARKER): boolean {
  return marker !== "" && character !== marker && character.includes(marker);
}

export type PrimitiveAsset = {
  character: string;
  asset: string;
  /** The asset only approximates the primitive's shape. */
  approximate: boolean;
  note?: string;
};

function readAsset(character: string, raw: unknown): PrimitiveAsset {
  const direct = asStr(raw);
  if (direct !== undefined && direct.trim()) return { character, asset: direct.trim(), approximate: false };
  if (!isRecord(raw)) die(`primitive manifest: entry '${character}' must be an asset id or an object`);
  const asset = (asStr(raw.asset) ?? asStr(raw.file) ?? "").trim();
  if (!asset) die(`primitive manifest: entry '${character}' has no asset or file`);
  const note = asStr(raw.note);
  return { character, asset, approximate: asBool(raw.approximate) ?? false, note };
}

export class PrimitiveManifest {
  private readonly assets: ReadonlyMap<string, PrimitiveAsset>;

  constructor(entries: Iterable<PrimitiveAsset>, readonly marker: string = DEFAULT_PLACEHOLDER_MARKER) {
    const m = new Map<string, PrimitiveAsset>();
    for (const e of entries) m.set(e.character, e);
    this.assets = m;
  }

  static fromJson(text: string, marker: string = DEFAULT_PLACEHOLDER_MARKER, path?: string): PrimitiveManifest {
    let doc: unknown;
    try {
      doc = JSON.parse(text);
    } catch (e) {
      throw new MissingSourceError("manifest", `invalid JSON (${errorMessage(e)})`, path);
    }
    if (!isRecord(doc)) throw new MissingSourceError("manifest", "top level must be an object", path);
    return new PrimitiveManifest(
      Object.entries(doc).map(([character, raw]) => readAsset(character, raw)),
      marker,
    );
  }

  get size(): number {
    return this.assets.size;
  }

  isPlaceholder(character: string): boolean {
    return isPlaceholderCharacter(character, this.marker);
  }

  entry(character: string): PrimitiveAsset | undefined {
    return this.assets.get(character);
  }

  /** Asset id for a placeholder; undefined for characters that render as text. */
  resolve(character: string): string | undefined {
    if (!this.isPlaceholder(character)) return undefined;
    const found = this.assets.get(character);
    if (!found) throw new MissingPrimitiveAssetError(character);
    return found.asset;
  }
}

/** Every placeholder in the tree mapped to its asset id, in first-seen order. */
export function primitiveAssets(tree: DecompositionNode, manifest: PrimitiveManifest): Map<string, string> {
  const out = new Map<string, string>();
  const walk = (n: DecompositionNode): void => {
    if (!out.has(n.character)) {
      const asset = manifest.resolve(n.character);
      if (asset !== undefined) out.set(n.character, asset);
    }
    n.children.forEach(walk);
  };
  walk(tree);
  return out;
}
