import type { Diagnostics } from "./errors.js";
import { interpretLayout, SINGLE_LAYOUT } from "./layout.js";
import { tierRank } from "./model.js";
import type { AuthoritativeEntry, PrimaryRecord, SourceRecord } from "./model.js";
import { DEFAULT_PLACEHOLDER_MARKER, isPlaceholderCharacter } from "./primitives.js";

export type MappingOptions = {
  /** variant form -> parent character, e.g. 亻 -> 人 */
  radicalVariants?: Readonly<Record<string, string>>;
  placeholderMarker?: string;
  diagnostics?: Diagnostics;
};

/**
 * Longest expansion path in the table, counting edges; an edge back onto the
 * current path counts once and stops there. Heights reached through such an
 * edge depend on the path, so only cycle-free ones are memoized.
 */
function naturalDepth(entries: ReadonlyMap<string, AuthoritativeEntry>): number {
  const memo = new Map<string, number>();
  const onPath = new Set<string>();
  const height = (c: string): [number, boolean] => {
    const known = memo.get(c);
    if (known !== undefined) return [known, false];
    const e = entries.get(c);
    if (!e || e.components.length === 0) return [0, false];
    onPath.add(c);
    let best = 0;
    let cyclic = false;
    for (const k of e.components) {
      if (onPath.has(k)) {
        best = Math.max(best, 1);
        cyclic = true;
        continue;
      }
      const [h, hitCycle] = height(k);
      best = Math.max(best, 1 + h);
      cyclic = cyclic || hitCycle;
    }
    onPath.delete(c);
    if (!cyclic) memo.set(c, best);
    return [best, cyclic];
  };
  let max = 0;
  for (const c of entries.keys()) max = Math.max(max, height(c)[0]);
  return max;
}

/**
 * The authoritative character table. Built once, frozen, and shared by every
 * decomposition request.
 */
export class CharacterTable {
  private readonly byChar: ReadonlyMap<string, AuthoritativeEntry>;
  readonly maxNaturalDepth: number;

  constructor(entries: Iterable<AuthoritativeEntry>) {
    const m = new Map<string, AuthoritativeEntry>();
    for (const e of entries) {
      if (m.has(e.character)) continue;
      m.set(e.character, Object.freeze({
        ...e,
        components: Object.freeze([...e.components]),
        aliases: Object.freeze([...e.aliases]),
      }));
    }
    this.byChar = m;
    this.maxNaturalDepth = naturalDepth(m);
  }

  get(character: string): AuthoritativeEntry | undefined {
    return this.byChar.get(character);
  }

  has(character: string): boolean {
    return this.byChar.has(character);
  }

  get size(): number {
    return this.byChar.size;
  }

  characters(): IterableIterator<string> {
    return this.byChar.keys();
  }

  values(): IterableIterator<AuthoritativeEntry> {
    return this.byChar.values();
  }

  /** Components with no entry of their own; they decompose as primitive leaves. */
  danglingComponents(): string[] {
    const out = new Set<string>();
    for (const e of this.byChar.values()) {
      for (const c of e.components) {
        if (!this.byChar.has(c)) out.add(c);
      }
    }
    return Array.from(out).sort();
  }
}

function mergeGroup(character: string, group: SourceRecord[], marker: string, diagnostics?: Diagnostics): AuthoritativeEntry {
  // sort is stable, so first-loaded still wins inside a tier
  const ranked = [...group].sort((a, b) => tierRank(a.tier) - tierRank(b.tier));
  const chosen = ranked[0];

  let components: string[] = [...chosen.components];
  if (components.length === 1 && components[0] === character) {
    diagnostics?.report({
      kind: "self-reference",
      source: chosen.tier,
      character,
      detail: "decomposes to itself; kept as a primitive",
    });
    components = [];
  }

  // Keyword is chosen on its own axis: the best tier that actually has one.
  const named = ranked.find((r) => r.keyword.trim() !== "");
  const primary = ranked.find((r): r is PrimaryRecord => r.tier === "primary");
  let reading: string | undefined;
  for (const r of ranked) {
    if (r.tier === "tertiary" && r.reading) {
      reading = r.reading;
      break;
    }
  }

  // Heisig frames rarely carry a layout; the IDS operator for the same character stands in.
  const layoutSource = chosen.layoutCode !== undefined
    ? chosen
    : ranked.find((r) => r.tier === "secondary" && r.layoutCode !== undefined);
  const layoutCode = layoutSource?.layoutCode;
  const layout = interpretLayout(layoutCode, components.length);
  if (layout.tag === "UNKNOWN" && layoutSource && layoutCode !== undefined) {
    diagnostics?.report({
      kind: "unknown-layout",
      source: layoutSource.tier,
      character,
      detail: `layout code '${layoutCode}' does not describe ${components.length} component(s)`,
    });
  }

  return {
    character,
    keyword: named?.keyword.trim() ?? "",
    keywordTier: named?.tier,
    components,
    layout,
    tier: chosen.tier,
    aliases: primary?.aliases ?? [],
    reading,
    isPlaceholder: isPlaceholderCharacter(character, marker),
  };
}

function applyRadicalVariants(built: Map<string, AuthoritativeEntry>, variants: Readonly<Record<string, string>>): void {
  for (const [variant, parent] of Object.entries(variants)) {
    const p = built.get(parent);
    if (!p || !p.keyword) continue;
    const own = built.get(variant);
    if (own && own.keyword) continue;
    if (own) {
      built.set(variant, {
        ...own,
        keyword: p.keyword,
        keywordTier: p.keywordTier,
        aliases: own.aliases.length > 0 ? own.aliases : p.aliases,
        variantOf: parent,
      });
      continue;
    }
    built.set(variant, {
      character: variant,
      keyword: p.keyword,
      keywordTier: p.keywordTier,
      components: [],
      layout: SINGLE_LAYOUT,
      tier: p.tier,
      aliases: p.aliases,
      variantOf: parent,
      isPlaceholder: false,
    });
  }
}

/**
 * Merges loader output into the authoritative table. Records must arrive in
 * loader order; components come from the highest tier present and the keyword
 * from the highest tier that has a non-empty one.
 */
export function buildMapping(records: Iterable<SourceRecord>, options: MappingOptions = {}): CharacterTable {
  const marker = options.placeholderMarker ?? DEFAULT_PLACEHOLDER_MARKER;
  const groups = new Map<string, SourceRecord[]>();
  for (const r of records) {
    const g = groups.get(r.character);
    if (g) g.push(r);
    else groups.set(r.character, [r]);
  }
  const built = new Map<string, AuthoritativeEntry>();
  for (const [character, group] of groups) {
    built.set(character, mergeGroup(character, group, marker, options.diagnostics));
  }
  applyRadicalVariants(built, options.radicalVariants ?? {});
  return new CharacterTable(built.values());
}

