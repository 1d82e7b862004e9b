/**
 * Title resolution failed for a single link. The harvest marks that link as
 * failed and moves on; it is retried on the next run.
 */
export class ResolutionError extends Error {
  readonly link: string;
  readonly reason: "network" | "status" | "parse";

  constructor(
    link: string,
    reason: "network" | "status" | "parse",
    message: string,
  ) {
    super(message);
    this.name = "ResolutionError";
    this.link = link;
    this.reason = reason;
  }
}

/**
 * The persisted processed-set record exists but cannot be read. Fatal: running
 * on would re-download the entire history.
 */
export class StoreCorruptionError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`processed-set record at ${path} is unreadable: ${message}`);
    this.name = "StoreCorruptionError";
    this.path = path;
  }
}

export class StoreLockedError extends Error {
  readonly lockPath: string;
  readonly ownerPid: number | null;

  constructor(lockPath: string, ownerPid: number | null) {
    super(
      ownerPid === null
        ? `store is locked by another run (${lockPath})`
        : `store is locked by process ${ownerPid} (${lockPath})`,
    );
    this.name = "StoreLockedError";
    this.lockPath = lockPath;
    this.ownerPid = ownerPid;
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
