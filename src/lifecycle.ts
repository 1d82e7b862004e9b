// pattern: Imperative Shell
import type { Logger } from "pino";
import { errorMessage } from "./errors";
import type { HarvestScheduler } from "./scheduler";

export type ShutdownDeps = {
  readonly schedulers: ReadonlyArray<HarvestScheduler>;
  readonly closeStore: () => void;
  readonly logger: Logger;
  readonly exit?: (code: number) => void;
};

/**
 * Registers SIGTERM and SIGINT handlers for the scheduled mode. Each
 * scheduler is stopped and its in-flight harvest awaited, so the processed
 * set is persisted and the lock released before the store closes. Every step
 * runs even if an earlier one fails; the process exits 0. Repeated signals are
 * ignored.
 */
export function registerShutdownHandlers(deps: ShutdownDeps): void {
  const exit = deps.exit ?? ((code: number) => process.exit(code));
  let shuttingDown = false;

  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;

    deps.logger.info({ signal }, "shutdown signal received");

    for (const scheduler of deps.schedulers) {
      try {
        await scheduler.stop();
      } catch (err) {
        deps.logger.error(
          { error: errorMessage(err) },
          "error stopping scheduler",
        );
      }
    }
    deps.logger.info("in-flight harvests settled");

    try {
      deps.closeStore();
      deps.logger.info("store closed");
    } catch (err) {
      deps.logger.error({ error: errorMessage(err) }, "error closing store");
    }

    deps.logger.info("shutdown complete");
    exit(0);
  };

  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((err: unknown) => {
      deps.logger.fatal({ error: errorMessage(err) }, "shutdown failed");
      exit(1);
    });
  };

  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
}
