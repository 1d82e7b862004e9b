import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { StoreCorruptionError } from "../errors";
import type { LinkRecord } from "../pipeline/types";
import { createTempDir } from "../test-utils/fixtures";
import { createSqliteStore } from "./sqlite-store";

const createdAt = new Date("2024-03-01T10:00:00Z");

function record(itemId: string, link: string | null): LinkRecord {
  return { itemId, body: `post ${itemId}`, createdAt, link };
}

describe("createSqliteStore", () => {
  it("should load an empty set from a fresh database", async () => {
    const store = createSqliteStore(":memory:");

    expect((await store.load()).size).toBe(0);
    store.close();
  });

  it("should return only links flagged processed", async () => {
    const store = createSqliteStore(":memory:");

    await store.persist(new Set(["https://example.org/abs/1"]), [
      record("10", "https://example.org/abs/1"),
      record("11", "https://example.org/abs/2"),
      record("12", null),
    ]);

    expect([...(await store.load())]).toEqual(["https://example.org/abs/1"]);
    store.close();
  });

  it("should flag a link processed on a later persist", async () => {
    const store = createSqliteStore(":memory:");
    const records = [
      record("10", "https://example.org/abs/1"),
      record("11", "https://example.org/abs/2"),
    ];

    await store.persist(new Set(["https://example.org/abs/1"]), records);
    await store.persist(
      new Set(["https://example.org/abs/1", "https://example.org/abs/2"]),
      records,
    );

    expect([...(await store.load())].sort()).toEqual([
      "https://example.org/abs/1",
      "https://example.org/abs/2",
    ]);
    store.close();
  });

  it("should flag every item that carries a processed link", async () => {
    const store = createSqliteStore(":memory:");

    await store.persist(new Set(["https://example.org/abs/1"]), [
      record("10", "https://example.org/abs/1"),
      record("11", "https://example.org/abs/1"),
    ]);

    expect([...(await store.load())]).toEqual(["https://example.org/abs/1"]);
    store.close();
  });

  it("should list recorded links that were never processed", async () => {
    const store = createSqliteStore(":memory:");

    await store.persist(new Set(["https://example.org/abs/1"]), [
      record("10", "https://example.org/abs/1"),
      record("11", "https://example.org/abs/3"),
      record("12", "https://example.org/abs/2"),
      record("13", "https://example.org/abs/2"),
      record("14", null),
    ]);

    expect(await store.pendingFromHistory()).toEqual([
      "https://example.org/abs/2",
      "https://example.org/abs/3",
    ]);
    store.close();
  });

  describe("on disk", () => {
    let dir: string;

    beforeEach(() => {
      dir = createTempDir();
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("should survive reopening", async () => {
      const path = join(dir, "cache", "history.db");
      const first = createSqliteStore(path);
      await first.persist(new Set(["https://example.org/abs/1"]), [
        record("10", "https://example.org/abs/1"),
      ]);
      first.close();

      const second = createSqliteStore(path);
      expect([...(await second.load())]).toEqual(["https://example.org/abs/1"]);
      second.close();
    });

    it("should fail loudly when the file is not a database", () => {
      const path = join(dir, "cache", "history.db");
      mkdirSync(join(dir, "cache"), { recursive: true });
      writeFileSync(path, "this is not sqlite, just some text long enough to matter");

      expect(() => createSqliteStore(path)).toThrow(StoreCorruptionError);
    });
  });
});
