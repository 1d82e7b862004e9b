import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import type { Logger } from "pino";
import { errorMessage } from "./errors";
import type { HarvestDeps } from "./pipeline/harvest";
import { runLockedHarvest } from "./run";

export type HarvestTick = {
  /** One scheduled harvest; skipped while the previous one is still running. */
  readonly run: () => Promise<void>;
  /** Resolves once no harvest is in flight. */
  readonly idle: () => Promise<void>;
};

export type HarvestScheduler = {
  /**
   * Halts the cron task, then waits for a harvest already in flight to
   * persist its successes and release the store lock.
   */
  readonly stop: () => Promise<void>;
};

/**
 * Failures, including a store held by another run, are logged and swallowed
 * so the schedule carries on.
 */
export function createHarvestTick(deps: HarvestDeps, logger: Logger): HarvestTick {
  let inFlight: Promise<void> | null = null;

  const harvestOnce = async () => {
    logger.info("scheduled harvest starting");
    try {
      await runLockedHarvest(deps);
    } catch (err) {
      logger.error({ error: errorMessage(err) }, "scheduled harvest failed");
    }
  };

  return {
    run: async () => {
      if (inFlight) {
        logger.warn("previous harvest still running, skipping tick");
        return;
      }

      inFlight = harvestOnce();
      try {
        await inFlight;
      } finally {
        inFlight = null;
      }
    },

    idle: async () => {
      if (inFlight) await inFlight;
    },
  };
}

/**
 * Starts a cron task that runs one locked harvest per tick.
 *
 * @param schedule - cron expression from the `schedule` config key
 */
export function createHarvestScheduler(
  schedule: string,
  deps: HarvestDeps,
  logger: Logger,
): HarvestScheduler {
  const tick = createHarvestTick(deps, logger);
  const task: ScheduledTask = cron.schedule(schedule, tick.run);

  return {
    stop: async () => {
      task.stop();
      await tick.idle();
    },
  };
}
