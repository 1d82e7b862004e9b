// pattern: Imperative Shell
import { and, asc, eq, isNotNull, isNull } from "drizzle-orm";
import { createDatabase } from "../db";
import { harvestHistory } from "../db/schema";
import { StoreCorruptionError, errorMessage } from "../errors";
import type { ProcessedStore } from "./types";

/**
 * Processed set kept as per-item history rows in SQLite. Every persist runs
 * in a single transaction.
 */
export function createSqliteStore(path: string): ProcessedStore {
  let opened: ReturnType<typeof createDatabase>;
  try {
    opened = createDatabase(path);
  } catch (err) {
    throw new StoreCorruptionError(path, errorMessage(err));
  }
  const { db, close } = opened;

  return {
    path,

    load: async () => {
      try {
        const rows = db
          .selectDistinct({ link: harvestHistory.link })
          .from(harvestHistory)
          .where(
            and(
              eq(harvestHistory.processed, true),
              isNotNull(harvestHistory.link),
            ),
          )
          .all();

        const links = new Set<string>();
        for (const row of rows) {
          if (row.link !== null) links.add(row.link);
        }
        return links;
      } catch (err) {
        throw new StoreCorruptionError(path, errorMessage(err));
      }
    },

    pendingFromHistory: async () => {
      try {
        const rows = db
          .selectDistinct({ link: harvestHistory.link })
          .from(harvestHistory)
          .where(
            and(
              eq(harvestHistory.processed, false),
              isNotNull(harvestHistory.link),
            ),
          )
          .orderBy(asc(harvestHistory.link))
          .all();

        return rows.flatMap((row) => (row.link === null ? [] : [row.link]));
      } catch (err) {
        throw new StoreCorruptionError(path, errorMessage(err));
      }
    },

    persist: async (processed, records) => {
      db.transaction((tx) => {
        for (const record of records) {
          const existing = tx
            .select({ id: harvestHistory.id })
            .from(harvestHistory)
            .where(
              and(
                eq(harvestHistory.itemId, record.itemId),
                record.link === null
                  ? isNull(harvestHistory.link)
                  : eq(harvestHistory.link, record.link),
              ),
            )
            .get();

          if (existing) continue;

          tx.insert(harvestHistory)
            .values({
              itemId: record.itemId,
              body: record.body,
              link: record.link,
              createdAt: record.createdAt,
              processed: record.link === null,
            })
            .run();
        }

        for (const link of processed) {
          tx.update(harvestHistory)
            .set({ processed: true })
            .where(eq(harvestHistory.link, link))
            .run();
        }
      });
    },

    close,
  };
}
