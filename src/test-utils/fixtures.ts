import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { AppConfig } from "../config";
import type { FavoritedItem, FavoritesSource } from "../feed/types";
import type { LinkTarget } from "../pipeline/extractor";

export const exampleTarget: LinkTarget = {
  domain: "example.org",
  abstractPath: "abs",
  filePath: "pdf",
  fileExtension: ".pdf",
};

export function createTempDir(prefix = "paper-harvest-test-"): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

/**
 * Builds a favorited item with one embedded URL per entry of `urls`.
 */
export function createTestItem(
  id: string,
  urls: ReadonlyArray<string>,
  text = `post ${id}`,
): FavoritedItem {
  return {
    id,
    text,
    createdAt: new Date("2024-03-01T10:00:00Z"),
    urls: urls.map((expandedUrl) => ({ expandedUrl })),
  };
}

export type MemorySource = FavoritesSource & {
  readonly requestedCounts: Array<number>;
};

/**
 * In-memory favorites feed returning the first `count` of `items`.
 */
export function createMemorySource(
  items: ReadonlyArray<FavoritedItem>,
): MemorySource {
  const requestedCounts: Array<number> = [];
  return {
    requestedCounts,
    fetchFavorites: async (count) => {
      requestedCounts.push(count);
      return items.slice(0, count);
    },
  };
}

export function createTestConfig(
  dir: string,
  overrides?: Partial<AppConfig>,
): AppConfig {
  return {
    feed: { maxItems: 20 },
    target: exampleTarget,
    store: { cacheDir: join(dir, "cache"), format: "json" },
    artifacts: { dir: join(dir, "papers") },
    http: { timeoutMs: 5000, userAgent: "paper-harvest-test" },
    ...overrides,
  };
}
