export type SourceName = "primary" | "secondary" | "tertiary" | "manifest" | "overrides" | "radical-variants";

export type ErrorCode = "MISSING_SOURCE" | "MISSING_PRIMITIVE_ASSET";

export class DecompositionError extends Error {
  constructor(message: string, readonly code: ErrorCode) {
    super(message);
    this.name = new.target.name;
  }
}

/** A whole data source could not be read or is not valid for its format. */
export class MissingSourceError extends DecompositionError {
  constructor(readonly source: SourceName, readonly reason: string, readonly path?: string) {
    super(`${source} source ${path ? `'${path}' ` : ""}unusable: ${reason}`, "MISSING_SOURCE");
  }
}

export class MissingPrimitiveAssetError extends DecompositionError {
  constructor(readonly character: string) {
    super(`No primitive asset for placeholder '${character}'; add it to the primitive manifest.`, "MISSING_PRIMITIVE_ASSET");
  }
}

export type AnomalyKind =
  | "malformed-record"
  | "unresolved-component"
  | "self-reference"
  | "unknown-layout"
  | "cycle"
  | "depth";

export type Anomaly = {
  kind: AnomalyKind;
  detail: string;
  character?: string;
  source?: string;
};

export type Logger = (msg: string) => void;

const silent: Logger = () => undefined;

/**
 * Collects the recoverable problems met while loading and decomposing.
 * Nothing here is fatal; callers decide whether to print the summary.
 */
export class Diagnostics {
  private readonly items: Anomaly[] = [];
  private readonly counts = new Map<AnomalyKind, number>();

  constructor(private readonly log: Logger = silent, private readonly keep = 5000) {}

  report(a: Anomaly): void {
    this.counts.set(a.kind, (this.counts.get(a.kind) ?? 0) + 1);
    if (this.items.length < this.keep) this.items.push(a);
    const where = [a.source, a.character].filter((x) => x !== undefined && x !== "").join(" ");
    this.log(`${a.kind}: ${where ? `${where}: ` : ""}${a.detail}`);
  }

  count(kind: AnomalyKind): number {
    return this.counts.get(kind) ?? 0;
  }

  get anomalies(): readonly Anomaly[] {
    return this.items;
  }

  summary(): string {
    if (this.counts.size === 0) return "anomalies: none";
    const parts = Array.from(this.counts.entries())
      .sort((a, b) => a[0].localeCompare(b[0]))
      .map(([k, n]) => `${k}=${n}`);
    return `anomalies: ${parts.join(" ")}`;
  }
}
