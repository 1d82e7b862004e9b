// pattern: Imperative Shell
import { mkdir, open, readFile, rm } from "node:fs/promises";
import { dirname } from "node:path";
import { StoreLockedError } from "../errors";

export type StoreLock = {
  readonly path: string;
  readonly release: () => Promise<void>;
};

function hasCode(err: unknown, code: string): boolean {
  return (
    typeof err === "object" && err !== null && "code" in err && err.code === code
  );
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return !hasCode(err, "ESRCH");
  }
}

async function readOwner(lockPath: string): Promise<number | null> {
  try {
    const pid = Number.parseInt((await readFile(lockPath, "utf-8")).trim(), 10);
    return Number.isInteger(pid) && pid > 0 ? pid : null;
  } catch (err) {
    if (hasCode(err, "ENOENT")) return null;
    throw err;
  }
}

async function tryCreate(lockPath: string): Promise<boolean> {
  try {
    const handle = await open(lockPath, "wx");
    try {
      await handle.writeFile(`${process.pid}\n`, "utf-8");
    } finally {
      await handle.close();
    }
    return true;
  } catch (err) {
    if (hasCode(err, "EEXIST")) return false;
    throw err;
  }
}

async function takeOverStale(lockPath: string): Promise<void> {
  // Only the holder of the takeover guard may read-and-remove a lock, so two
  // runs that both saw the same dead owner cannot delete each other's lock.
  const guardPath = `${lockPath}.takeover`;
  if (!(await tryCreate(guardPath))) {
    throw new StoreLockedError(lockPath, await readOwner(guardPath));
  }

  try {
    const owner = await readOwner(lockPath);
    if (owner !== null && isProcessAlive(owner)) {
      throw new StoreLockedError(lockPath, owner);
    }
    if (owner === null && (await lockExists(lockPath))) {
      throw new StoreLockedError(lockPath, null);
    }

    await rm(lockPath, { force: true });
    if (!(await tryCreate(lockPath))) {
      throw new StoreLockedError(lockPath, await readOwner(lockPath));
    }
  } finally {
    await rm(guardPath, { force: true });
  }
}

async function lockExists(lockPath: string): Promise<boolean> {
  try {
    await readFile(lockPath);
    return true;
  } catch (err) {
    if (hasCode(err, "ENOENT")) return false;
    throw err;
  }
}

/**
 * Takes the advisory lock guarding a processed-set record, creating the
 * record's directory first. A lock left behind by a process that no longer
 * exists is taken over; a live or unidentifiable owner raises
 * StoreLockedError.
 */
export async function acquireLock(recordPath: string): Promise<StoreLock> {
  const lockPath = `${recordPath}.lock`;
  await mkdir(dirname(lockPath), { recursive: true });

  if (!(await tryCreate(lockPath))) {
    const owner = await readOwner(lockPath);
    if (owner === null || isProcessAlive(owner)) {
      throw new StoreLockedError(lockPath, owner);
    }
    await takeOverStale(lockPath);
  }

  let released = false;
  return {
    path: lockPath,
    release: async () => {
      if (released) return;
      released = true;
      await rm(lockPath, { force: true });
    },
  };
}
