/**
 * Normalized abstract-page URL, the unique key the harvest processes by.
 */
export type CandidateLink = string;

export type DownloadOutcome =
  | { readonly ok: true; readonly path: string; readonly bytes: number }
  | { readonly ok: false; readonly reason: string };

export type LinkFailure = {
  readonly link: CandidateLink;
  readonly stage: "resolve" | "download";
  readonly reason: string;
};

/**
 * One observed (item, link) pair. Items without a matching link appear once
 * with `link: null`.
 */
export type LinkRecord = {
  readonly itemId: string;
  readonly body: string;
  readonly createdAt: Date | null;
  readonly link: CandidateLink | null;
};

export type HarvestSummary = {
  readonly items: number;
  readonly candidates: number;
  readonly alreadyProcessed: number;
  readonly attempted: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly failures: ReadonlyArray<LinkFailure>;
};
