import type { LayoutDescriptor, LayoutTag } from "./model.js";

const SLOTS: Record<LayoutTag, readonly string[]> = {
  SINGLE: [],
  LEFT_RIGHT: ["left", "right"],
  TOP_BOTTOM: ["top", "bottom"],
  LEFT_MIDDLE_RIGHT: ["left", "middle", "right"],
  TOP_MIDDLE_BOTTOM: ["top", "middle", "bottom"],
  SURROUND_FROM_ABOVE: ["outer", "inner"],
  SURROUND_FROM_BELOW: ["outer", "inner"],
  SURROUND_FROM_LEFT: ["outer", "inner"],
  SURROUND_FROM_RIGHT: ["outer", "inner"],
  SURROUND_FROM_UPPER_LEFT: ["outer", "inner"],
  SURROUND_FROM_LOWER_LEFT: ["outer", "inner"],
  SURROUND_FROM_UPPER_RIGHT: ["outer", "inner"],
  FULL_SURROUND: ["outer", "inner"],
  OVERLAID: ["base", "overlay"],
  UNKNOWN: [],
};

const LABELS: Record<LayoutTag, string> = {
  SINGLE: "single",
  LEFT_RIGHT: "left-right",
  TOP_BOTTOM: "top-bottom",
  LEFT_MIDDLE_RIGHT: "left-middle-right",
  TOP_MIDDLE_BOTTOM: "top-middle-bottom",
  SURROUND_FROM_ABOVE: "surround from above",
  SURROUND_FROM_BELOW: "surround from below",
  SURROUND_FROM_LEFT: "surround from left",
  SURROUND_FROM_RIGHT: "surround from right",
  SURROUND_FROM_UPPER_LEFT: "surround from upper left",
  SURROUND_FROM_LOWER_LEFT: "surround from lower left",
  SURROUND_FROM_UPPER_RIGHT: "surround from upper right",
  FULL_SURROUND: "full surround",
  OVERLAID: "overlaid",
  UNKNOWN: "unknown",
};

// ⿽ ⿾ ⿿ and 〾 have no canonical tag and fall through to UNKNOWN.
const IDS_OPERATORS: Record<string, LayoutTag> = {
  "⿰": "LEFT_RIGHT",
  "⿱": "TOP_BOTTOM",
  "⿲": "LEFT_MIDDLE_RIGHT",
  "⿳": "TOP_MIDDLE_BOTTOM",
  "⿴": "FULL_SURROUND",
  "⿵": "SURROUND_FROM_ABOVE",
  "⿶": "SURROUND_FROM_BELOW",
  "⿷": "SURROUND_FROM_LEFT",
  "⿸": "SURROUND_FROM_UPPER_LEFT",
  "⿹": "SURROUND_FROM_UPPER_RIGHT",
  "⿺": "SURROUND_FROM_LOWER_LEFT",
  "⿻": "OVERLAID",
  "⿼": "SURROUND_FROM_RIGHT",
};

const TEXT_CODES: Record<string, LayoutTag> = {
  "single": "SINGLE",
  "lr": "LEFT_RIGHT",
  "left-right": "LEFT_RIGHT",
  "tb": "TOP_BOTTOM",
  "top-bottom": "TOP_BOTTOM",
  "left-mid-right": "LEFT_MIDDLE_RIGHT",
  "top-mid-bottom": "TOP_MIDDLE_BOTTOM",
  "surround": "FULL_SURROUND",
  "enclosed": "FULL_SURROUND",
  "surround-open-bottom": "SURROUND_FROM_ABOVE",
  "surround-open-top": "SURROUND_FROM_BELOW",
  "surround-open-right": "SURROUND_FROM_LEFT",
  "surround-open-left": "SURROUND_FROM_RIGHT",
  "top-left-wrap": "SURROUND_FROM_UPPER_LEFT",
  "top-right-wrap": "SURROUND_FROM_UPPER_RIGHT",
  "bottom-left-wrap": "SURROUND_FROM_LOWER_LEFT",
  "overlap": "OVERLAID",
};

// Canonical tag names are accepted too: "LEFT_RIGHT", "surround from above", ...
for (const tag of Object.keys(SLOTS)) {
  if (!isLayoutTag(tag)) continue;
  TEXT_CODES[normalizeCode(tag)] = tag;
  TEXT_CODES[normalizeCode(LABELS[tag])] = tag;
}

function isLayoutTag(s: string): s is LayoutTag {
  return Object.prototype.hasOwnProperty.call(SLOTS, s);
}

function normalizeCode(code: string): string {
  return code.trim().toLowerCase().replace(/[\s_]+/g, "-");
}

function descriptor(tag: LayoutTag, code?: string): LayoutDescriptor {
  const d: LayoutDescriptor = code === undefined
    ? { tag, slots: SLOTS[tag], label: LABELS[tag] }
    : { tag, slots: SLOTS[tag], label: LABELS[tag], code };
  return Object.freeze(d);
}

export const SINGLE_LAYOUT = descriptor("SINGLE");

function unknownLayout(code?: string): LayoutDescriptor {
  return descriptor("UNKNOWN", code);
}

export function lookupLayoutTag(code: string): LayoutTag | undefined {
  const trimmed = code.trim();
  return IDS_OPERATORS[trimmed] ?? TEXT_CODES[normalizeCode(trimmed)];
}

/**
 * Maps a source layout code onto a canonical descriptor for a node with
 * `childCount` children. Never throws: absent or unmapped codes and arity
 * mismatches come back as UNKNOWN.
 */
export function interpretLayout(code: string | undefined, childCount: number): LayoutDescriptor {
  if (childCount === 0) return SINGLE_LAYOUT;
  if (code === undefined || code.trim() === "") return unknownLayout(code);
  const tag = lookupLayoutTag(code);
  if (!tag || tag === "SINGLE" || tag === "UNKNOWN") return unknownLayout(code);
  if (SLOTS[tag].length !== childCount) return unknownLayout(code);
  return descriptor(tag, code.trim());
}

export function fitLayout(layout: LayoutDescriptor, childCount: number): LayoutDescriptor {
  if (childCount === 0) return SINGLE_LAYOUT;
  if (layout.tag === "UNKNOWN" || layout.slots.length === childCount) return layout;
  return unknownLayout(layout.code);
}
