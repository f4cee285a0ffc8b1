export type Tier = "primary" | "secondary" | "tertiary";

// Loader order and merge priority are the same list.
export const TIER_ORDER: readonly Tier[] = ["primary", "secondary", "tertiary"];

export function tierRank(t: Tier): number {
  return TIER_ORDER.indexOf(t);
}

export type LayoutTag =
  | "SINGLE"
  | "LEFT_RIGHT"
  | "TOP_BOTTOM"
  | "LEFT_MIDDLE_RIGHT"
  | "TOP_MIDDLE_BOTTOM"
  | "SURROUND_FROM_ABOVE"
  | "SURROUND_FROM_BELOW"
  | "SURROUND_FROM_LEFT"
  | "SURROUND_FROM_RIGHT"
  | "SURROUND_FROM_UPPER_LEFT"
  | "SURROUND_FROM_LOWER_LEFT"
  | "SURROUND_FROM_UPPER_RIGHT"
  | "FULL_SURROUND"
  | "OVERLAID"
  | "UNKNOWN";

export type LayoutDescriptor = {
  readonly tag: LayoutTag;
  /** Operand slot names, one per child, in child order. */
  readonly slots: readonly string[];
  readonly label: string;
  readonly code?: string;
};

export type PrimaryRecord = {
  readonly tier: "primary";
  readonly character: string;
  readonly keyword: string;
  readonly components: readonly string[];
  readonly layoutCode?: string;
  readonly aliases: readonly string[];
  readonly frameType: "character" | "primitive";
  readonly number?: number;
};

export type SecondaryRecord = {
  readonly tier: "secondary";
  readonly character: string;
  readonly keyword: "";
  readonly components: readonly string[];
  readonly layoutCode?: string;
  readonly ids: string;
  /** Minted for a nested IDS sub-expression; keyed by its IDS text. */
  readonly synthetic: boolean;
};

export type TertiaryRecord = {
  readonly tier: "tertiary";
  readonly character: string;
  readonly keyword: string;
  readonly components: readonly [];
  readonly layoutCode?: undefined;
  readonly reading?: string;
  readonly definitions: readonly string[];
};

export type SourceRecord = PrimaryRecord | SecondaryRecord | TertiaryRecord;

export type LoadIssue = {
  kind: "malformed-record" | "unresolved-component";
  at: string;
  detail: string;
  character?: string;
};

export type LoadResult<R extends SourceRecord> = {
  records: R[];
  issues: LoadIssue[];
};

export type AuthoritativeEntry = {
  readonly character: string;
  readonly keyword: string;
  readonly keywordTier?: Tier;
  readonly components: readonly string[];
  readonly layout: LayoutDescriptor;
  /** Tier the components were taken from. */
  readonly tier: Tier;
  readonly aliases: readonly string[];
  readonly reading?: string;
  readonly variantOf?: string;
  readonly isPlaceholder: boolean;
};

export type Truncation = "cycle" | "depth";

export type KeywordSource = "override" | "table" | "none";

export type DecompositionNode = {
  readonly character: string;
  readonly keyword: string;
  readonly keywordSource: KeywordSource;
  readonly aliases: readonly string[];
  readonly reading?: string;
  readonly tier?: Tier;
  readonly layout: LayoutDescriptor;
  readonly depth: number;
  readonly children: readonly DecompositionNode[];
  readonly isPrimitivePlaceholder: boolean;
  readonly truncated?: Truncation;
};
