export { runHarvest, createHarvestDeps } from "./harvest";
export {
  normalizeLink,
  extractLinks,
  toArtifactUrl,
  isAbstractLink,
} from "./extractor";
export { resolveTitle, parseTitle } from "./resolver";
export { downloadArtifact, sanitizeFileName, artifactFileName } from "./downloader";
export type { HarvestDeps } from "./harvest";
export type { LinkTarget } from "./extractor";
export type {
  CandidateLink,
  DownloadOutcome,
  HarvestSummary,
  LinkFailure,
  LinkRecord,
} from "./types";
