export type SelectorType = "class" | "id" | "tag";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface ElementSelector {
  type: SelectorType;
  value: string;
}

/** Pre-fetch pruning rule. `values` holds every pipe-separated target. */
export interface RemovalRule {
  type: SelectorType;
  values: readonly string[];
}

export interface CrawlConfig {
  readonly baseUrl: string;
  readonly selector: Readonly<ElementSelector>;
  readonly preRemove?: Readonly<RemovalRule>;
}

export type CrawlStage =
  | "idle"
  | "fetch-entry"
  | "locate-container"
  | "extract-links"
  | "fetch-all"
  | "convert"
  | "assemble"
  | "persist"
  | "done"
  | "failed";

export interface CrawlProgress {
  total: number;
  succeeded: number;
  failed: number;
  currentUrl?: string;
}

export interface PageRecord {
  /** Canonical, fragment-stripped URL. */
  readonly url: string;
  /** Fetched HTML after pre-removal. */
  readonly html: string;
  readonly title: string;
  readonly anchorSlug: string;
  /** Where the raw fetched HTML was cached, when the write succeeded. */
  readonly cachePath?: string;
}

/** Canonical URL → page, in discovery order. */
export type PageTable = Map<string, PageRecord>;

/** Canonical URL → anchor slug. */
export type AnchorTable = ReadonlyMap<string, string>;

export interface PageSection {
  title: string;
  markdown: string;
}

export interface CrawlResult {
  outputPath: string;
  /** URLs that made it into the document, in order. */
  pages: string[];
  /** Candidate URLs that could not be fetched. */
  failed: string[];
  durationMs: number;
}
