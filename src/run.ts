import { runHarvest } from "./pipeline";
import type { HarvestDeps, HarvestSummary } from "./pipeline";
import { acquireLock } from "./store";

/**
 * Runs one harvest while holding the store's lock file. The lock is released
 * however the run ends.
 */
export async function runLockedHarvest(
  deps: HarvestDeps,
): Promise<HarvestSummary> {
  const lock = await acquireLock(deps.store.path);
  deps.logger.debug({ lockPath: lock.path }, "store lock acquired");

  try {
    return await runHarvest(deps);
  } finally {
    await lock.release();
  }
}
