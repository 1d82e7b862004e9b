import type { Logger } from "pino";
import type { AppConfig } from "../config";
import { ResolutionError, errorMessage } from "../errors";
import type { FavoritesSource } from "../feed/types";
import { pendingLinks } from "../store";
import type { ProcessedStore } from "../store";
import { downloadArtifact } from "./downloader";
import { extractLinks } from "./extractor";
import type { LinkTarget } from "./extractor";
import { resolveTitle } from "./resolver";
import type {
  CandidateLink,
  DownloadOutcome,
  HarvestSummary,
  LinkFailure,
  LinkRecord,
} from "./types";

export type HarvestDeps = {
  readonly source: FavoritesSource;
  readonly store: ProcessedStore;
  readonly resolveTitle: (link: CandidateLink) => Promise<string>;
  readonly download: (
    link: CandidateLink,
    title: string,
  ) => Promise<DownloadOutcome>;
  readonly target: LinkTarget;
  readonly maxItems: number;
  readonly logger: Logger;
};

/**
 * Wires the network-backed resolver and downloader from configuration.
 */
export function createHarvestDeps(
  config: AppConfig,
  source: FavoritesSource,
  store: ProcessedStore,
  logger: Logger,
): HarvestDeps {
  const http = {
    target: config.target,
    timeoutMs: config.http.timeoutMs,
    userAgent: config.http.userAgent,
  };
  const claimedNames = new Map<string, CandidateLink>();

  return {
    source,
    store,
    resolveTitle: (link) => resolveTitle(link, http),
    download: (link, title) =>
      downloadArtifact(
        link,
        title,
        { ...http, destinationDir: config.artifacts.dir, claimedNames },
        logger,
      ),
    target: config.target,
    maxItems: config.feed.maxItems,
    logger,
  };
}

type Attempt =
  | { readonly ok: true }
  | { readonly ok: false; readonly failure: LinkFailure };

async function attemptLink(
  link: CandidateLink,
  deps: HarvestDeps,
): Promise<Attempt> {
  let title: string;
  try {
    title = await deps.resolveTitle(link);
  } catch (err) {
    if (err instanceof ResolutionError) {
      return {
        ok: false,
        failure: { link, stage: "resolve", reason: err.message },
      };
    }
    throw err;
  }

  deps.logger.debug({ link, title }, "title resolved");

  const outcome = await deps.download(link, title);
  if (!outcome.ok) {
    return {
      ok: false,
      failure: { link, stage: "download", reason: outcome.reason },
    };
  }

  deps.logger.info(
    { link, title, path: outcome.path, bytes: outcome.bytes },
    "paper downloaded",
  );
  return { ok: true };
}

/**
 * One harvest: load the processed set, fetch favorites, extract links, and
 * resolve then download every link not yet processed. Only successful
 * downloads enter the processed set. Links the store remembers from earlier
 * runs but never finished are retried too. The set is persisted once the loop
 * has started, even if an unexpected error ends it early; that error is the
 * one rethrown.
 */
export async function runHarvest(deps: HarvestDeps): Promise<HarvestSummary> {
  const { logger } = deps;

  const processed = await deps.store.load();
  const unfinished = await deps.store.pendingFromHistory();
  logger.info(
    { processedCount: processed.size, unfinishedCount: unfinished.length },
    "processed set loaded",
  );

  const items = await deps.source.fetchFavorites(deps.maxItems);

  const records: Array<LinkRecord> = [];
  const candidates = new Set<CandidateLink>();
  for (const item of items) {
    const base = { itemId: item.id, body: item.text, createdAt: item.createdAt };
    const links = extractLinks(item, deps.target);
    if (links.size === 0) {
      records.push({ ...base, link: null });
      continue;
    }
    for (const link of links) {
      records.push({ ...base, link });
      candidates.add(link);
    }
  }
  // Links recorded earlier whose items have since left the feed window.
  for (const link of unfinished) candidates.add(link);

  const pending = pendingLinks(candidates, processed);
  logger.info(
    {
      items: items.length,
      candidates: candidates.size,
      pending: pending.length,
    },
    "favorites reconciled",
  );

  const failures: Array<LinkFailure> = [];
  let succeeded = 0;

  let aborted: { readonly error: unknown } | null = null;
  try {
    for (const link of pending) {
      const attempt = await attemptLink(link, deps);
      if (attempt.ok) {
        processed.add(link);
        succeeded++;
      } else {
        failures.push(attempt.failure);
        logger.warn(
          { link, stage: attempt.failure.stage, reason: attempt.failure.reason },
          "paper harvest failed",
        );
      }
    }
  } catch (err) {
    aborted = { error: err };
  }

  try {
    await deps.store.persist(processed, records);
  } catch (err) {
    if (aborted === null) throw err;
    logger.error(
      { error: errorMessage(err) },
      "failed to persist processed set after an aborted harvest",
    );
  }
  if (aborted !== null) throw aborted.error;

  const summary: HarvestSummary = {
    items: items.length,
    candidates: candidates.size,
    alreadyProcessed: candidates.size - pending.length,
    attempted: pending.length,
    succeeded,
    failed: failures.length,
    failures,
  };

  logger.info(
    {
      items: summary.items,
      candidates: summary.candidates,
      alreadyProcessed: summary.alreadyProcessed,
      succeeded: summary.succeeded,
      failed: summary.failed,
    },
    "harvest complete",
  );

  return summary;
}
