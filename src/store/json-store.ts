// pattern: Imperative Shell
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { z } from "zod";
import { StoreCorruptionError, errorMessage } from "../errors";
import type { ProcessedStore } from "./types";

const recordSchema = z.array(z.string().min(1));

function isMissingFile(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "ENOENT"
  );
}

/**
 * Processed set as a sorted JSON array of links. Writes go to a sibling temp
 * file that is renamed over the record.
 */
export function createJsonStore(path: string): ProcessedStore {
  return {
    path,

    load: async () => {
      let raw: string;
      try {
        raw = await readFile(path, "utf-8");
      } catch (err) {
        if (isMissingFile(err)) return new Set();
        throw new StoreCorruptionError(path, errorMessage(err));
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch (err) {
        throw new StoreCorruptionError(path, errorMessage(err));
      }

      const result = recordSchema.safeParse(parsed);
      if (!result.success) {
        throw new StoreCorruptionError(
          path,
          "expected a JSON array of link strings",
        );
      }

      return new Set(result.data);
    },

    pendingFromHistory: async () => [],

    persist: async (processed) => {
      const dir = dirname(path);
      await mkdir(dir, { recursive: true });

      const tmpPath = join(dir, `.${basename(path)}.${process.pid}.tmp`);
      const body = `${JSON.stringify([...processed].sort(), null, 2)}\n`;

      try {
        await writeFile(tmpPath, body, "utf-8");
        await rename(tmpPath, path);
      } catch (err) {
        await rm(tmpPath, { force: true });
        throw err;
      }
    },

    close: () => {},
  };
}
