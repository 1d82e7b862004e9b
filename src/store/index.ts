import { join } from "node:path";
import type { AppConfig } from "../config";
import type { CandidateLink } from "../pipeline/types";
import { createJsonStore } from "./json-store";
import { createSqliteStore } from "./sqlite-store";
import type { ProcessedStore } from "./types";

const DEFAULT_FILES = {
  json: "history.json",
  sqlite: "history.db",
} as const;

export function resolveStorePath(config: AppConfig): string {
  return join(
    config.store.cacheDir,
    config.store.cacheFile ?? DEFAULT_FILES[config.store.format],
  );
}

export function createStore(config: AppConfig): ProcessedStore {
  const path = resolveStorePath(config);
  return config.store.format === "sqlite"
    ? createSqliteStore(path)
    : createJsonStore(path);
}

/**
 * Candidates not yet in the processed set, in candidate order.
 */
export function pendingLinks(
  candidates: Iterable<CandidateLink>,
  processed: ReadonlySet<CandidateLink>,
): Array<CandidateLink> {
  const pending: Array<CandidateLink> = [];
  for (const link of candidates) {
    if (!processed.has(link)) pending.push(link);
  }
  return pending;
}

export { createJsonStore } from "./json-store";
export { createSqliteStore } from "./sqlite-store";
export { acquireLock } from "./lock";
export type { StoreLock } from "./lock";
export type { ProcessedStore } from "./types";
