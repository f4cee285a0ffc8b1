import type { PrimaryRecord, SecondaryRecord, TertiaryRecord } from "../model.js";

export function primary(
  character: string,
  keyword: string,
  components: string[] = [],
  layoutCode?: string,
  aliases: string[] = [],
): PrimaryRecord {
  return { tier: "primary", character, keyword, components, layoutCode, aliases, frameType: "character" };
}

export function secondary(character: string, components: string[], layoutCode?: string): SecondaryRecord {
  return {
    tier: "secondary",
    character,
    keyword: "",
    components,
    layoutCode,
    ids: (layoutCode ?? "") + components.join(""),
    synthetic: false,
  };
}

export function tertiary(character: string, keyword: string, reading?: string): TertiaryRecord {
  return { tier: "tertiary", character, keyword, components: [], reading, definitions: [keyword] };
}
