import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

/**
 * Tabular processed-set record: one row per (item, link) pair seen in the
 * favorites. Items without a paper link keep a single row with a null link,
 * already flagged processed.
 */
export const harvestHistory = sqliteTable(
  "harvest_history",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    itemId: text("item_id").notNull(),
    body: text("body").notNull(),
    link: text("link"),
    createdAt: integer("created_at", { mode: "timestamp" }),
    processed: integer("processed", { mode: "boolean" })
      .notNull()
      .default(false),
    recordedAt: integer("recorded_at", { mode: "timestamp" })
      .notNull()
      .default(sql`(unixepoch())`),
  },
  (table) => ({
    itemIdIdx: index("harvest_history_item_id_idx").on(table.itemId),
    linkIdx: index("harvest_history_link_idx").on(table.link),
  }),
);
