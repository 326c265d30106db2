/**
 * Shared data model
 */

/** Resolved URL href → absolute path of the local copy */
export type AssetMapping = Map<string, string>;

export type AssetOutcome =
  | { status: "downloaded"; url: string; path: string }
  | { status: "skipped-existing"; url: string; path: string }
  | { status: "skipped-duplicate"; url: string; path: string }
  | { status: "planned"; url: string; path: string }
  | { status: "missing"; url: string }
  | { status: "failed"; url: string; reason: string }
  | { status: "unsupported"; url: string };

/** Outcomes that leave a usable local copy behind */
export type LocatedOutcome = Extract<AssetOutcome, { path: string }>;

export function hasLocalPath(outcome: AssetOutcome): outcome is LocatedOutcome {
  return "path" in outcome;
}

export interface AssetCounts {
  downloaded: number;
  skipped: number;
  failed: number;
  missing: number;
  planned: number;
}

export type IssueKind = "missing" | "failed" | "unsupported";

export interface Issue {
  document: string;
  reference: string;
  kind: IssueKind;
  detail?: string;
}

export interface DocumentReport {
  /** HTML file on disk, relative to the HTML root where possible */
  document: string;
  pageUrl: string;
  references: number;
  uniqueUrls: number;
  counts: AssetCounts;
  changed: boolean;
  replaced: number;
  issues: Issue[];
  /** Set when the document itself could not be processed */
  error?: string;
}

export interface RunSummary extends AssetCounts {
  documents: number;
  rewritten: number;
  documentErrors: number;
}

export function emptyCounts(): AssetCounts {
  return { downloaded: 0, skipped: 0, failed: 0, missing: 0, planned: 0 };
}

/**
 * Fold one outcome into a tally
 */
export function countOutcome(counts: AssetCounts, outcome: AssetOutcome): void {
  switch (outcome.status) {
    case "downloaded":
      counts.downloaded++;
      break;
    case "skipped-existing":
    case "skipped-duplicate":
    case "unsupported":
      counts.skipped++;
      break;
    case "planned":
      counts.planned++;
      break;
    case "missing":
      counts.missing++;
      break;
    case "failed":
      counts.failed++;
      break;
  }
}
