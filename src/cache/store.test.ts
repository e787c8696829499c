import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Logger } from "pino";
import { CacheIOError } from "../errors";
import { createTestLogger } from "../test-utils/fixtures";
import { loadSummaryCache } from "./store";

const DAY_MS = 24 * 60 * 60 * 1000;

describe("summary cache", () => {
  const logger = createTestLogger();
  let dir: string;
  let path: string;
  let current: Date;
  const now = () => current;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "summary-cache-"));
    path = join(dir, "summary-cache.json");
    current = new Date("2024-03-01T00:00:00.000Z");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const entry = (lastUsedAt: string, summaryText = "Cached summary.") => ({
    summaryText,
    createdAt: "2024-02-01T00:00:00.000Z",
    lastUsedAt,
    sourceContentHash: "hash-1",
    title: "Comet spotted",
  });

  describe("loading", () => {
    it("should start empty when the file does not exist", async () => {
      const cache = await loadSummaryCache({ path, retentionDays: 7, now }, logger);

      expect(cache.size()).toBe(0);
      expect(cache.lookup("fp", "hash-1")).toBeNull();
    });

    it("should drop entries not used within the retention window", async () => {
      await writeFile(
        path,
        JSON.stringify({
          version: 1,
          entries: {
            recent: entry("2024-02-25T00:00:00.000Z"),
            old: entry("2024-02-20T00:00:00.000Z"),
          },
        }),
      );

      const cache = await loadSummaryCache({ path, retentionDays: 7, now }, logger);

      expect(cache.size()).toBe(1);
      expect(cache.lookup("recent", "hash-1")?.summaryText).toBe("Cached summary.");
      expect(cache.lookup("old", "hash-1")).toBeNull();
    });

    it("should drop malformed entries and keep the rest", async () => {
      await writeFile(
        path,
        JSON.stringify({
          version: 1,
          entries: {
            good: entry("2024-02-29T00:00:00.000Z"),
            bad: { summaryText: "", lastUsedAt: "yesterday" },
          },
        }),
      );

      const cache = await loadSummaryCache({ path, retentionDays: 7, now }, logger);

      expect(cache.size()).toBe(1);
      expect(cache.lookup("good", "hash-1")).not.toBeNull();
    });

    it("should start cold and warn when the file is not valid JSON", async () => {
      await writeFile(path, "{ not json");
      const warn = vi.fn();
      const spyLogger = { info: vi.fn(), debug: vi.fn(), warn } as unknown as Logger;

      const cache = await loadSummaryCache({ path, retentionDays: 7, now }, spyLogger);

      expect(cache.size()).toBe(0);
      expect(warn).toHaveBeenCalledWith(
        expect.objectContaining({ path, kind: "CacheIOError" }),
        "summary cache load failed, starting cold",
      );
    });

    it("should start cold when the file has an unknown version", async () => {
      await writeFile(path, JSON.stringify({ version: 2, entries: {} }));

      const cache = await loadSummaryCache({ path, retentionDays: 7, now }, logger);

      expect(cache.size()).toBe(0);
    });
  });

  describe("lookup and store", () => {
    it("should return a stored summary for the same content hash", async () => {
      const cache = await loadSummaryCache({ path, retentionDays: 7, now }, logger);

      cache.store("fp-1", "hash-1", "A comet was seen.", "Comet spotted");

      expect(cache.lookup("fp-1", "hash-1")).toEqual({
        fingerprint: "fp-1",
        summaryText: "A comet was seen.",
        createdAt: "2024-03-01T00:00:00.000Z",
        lastUsedAt: "2024-03-01T00:00:00.000Z",
        sourceContentHash: "hash-1",
        title: "Comet spotted",
      });
      expect(cache.stats()).toEqual({ hits: 1, misses: 0, stale: 0, stores: 1 });
    });

    it("should treat a changed content hash as a miss", async () => {
      const cache = await loadSummaryCache({ path, retentionDays: 7, now }, logger);
      cache.store("fp-1", "hash-1", "A comet was seen.", "Comet spotted");

      expect(cache.lookup("fp-1", "hash-2")).toBeNull();
      expect(cache.lookup("fp-unknown", "hash-1")).toBeNull();
      expect(cache.stats()).toEqual({ hits: 0, misses: 1, stale: 1, stores: 1 });
    });

    it("should refresh last use on a hit", async () => {
      const cache = await loadSummaryCache({ path, retentionDays: 7, now }, logger);
      cache.store("fp-1", "hash-1", "A comet was seen.", "Comet spotted");

      current = new Date("2024-03-05T00:00:00.000Z");
      const hit = cache.lookup("fp-1", "hash-1");

      expect(hit?.createdAt).toBe("2024-03-01T00:00:00.000Z");
      expect(hit?.lastUsedAt).toBe("2024-03-05T00:00:00.000Z");
    });

    it("should cap the stored title", async () => {
      const cache = await loadSummaryCache({ path, retentionDays: 7, now }, logger);
      cache.store("fp-1", "hash-1", "Summary.", "x".repeat(150));

      expect(cache.lookup("fp-1", "hash-1")?.title).toHaveLength(100);
    });
  });

  describe("flush", () => {
    it("should write every entry with sorted keys and reload it", async () => {
      const cache = await loadSummaryCache({ path, retentionDays: 7, now }, logger);
      cache.store("fp-b", "hash-b", "Second summary.", "Second");
      cache.store("fp-a", "hash-a", "First summary.", "First");

      await cache.flush();

      const written = JSON.parse(await readFile(path, "utf-8"));
      expect(written.version).toBe(1);
      expect(Object.keys(written.entries)).toEqual(["fp-a", "fp-b"]);

      const reloaded = await loadSummaryCache({ path, retentionDays: 7, now }, logger);
      expect(reloaded.lookup("fp-a", "hash-a")?.summaryText).toBe("First summary.");
      expect(reloaded.lookup("fp-b", "hash-b")?.summaryText).toBe("Second summary.");
    });

    it("should keep an entry used recently even if it was created long ago", async () => {
      const cache = await loadSummaryCache({ path, retentionDays: 7, now }, logger);
      cache.store("fp-1", "hash-1", "A comet was seen.", "Comet spotted");

      current = new Date(current.getTime() + 6 * DAY_MS);
      cache.lookup("fp-1", "hash-1");
      await cache.flush();

      current = new Date(current.getTime() + 6 * DAY_MS);
      const reloaded = await loadSummaryCache({ path, retentionDays: 7, now }, logger);

      expect(reloaded.size()).toBe(1);
    });

    it("should leave no temporary files behind", async () => {
      const cache = await loadSummaryCache({ path, retentionDays: 7, now }, logger);
      cache.store("fp-1", "hash-1", "A comet was seen.", "Comet spotted");

      await cache.flush();
      await cache.flush();

      expect(await readdir(dir)).toEqual(["summary-cache.json"]);
    });

    it("should create missing parent directories", async () => {
      const nested = join(dir, "nested", "deeper", "cache.json");
      const cache = await loadSummaryCache({ path: nested, retentionDays: 7, now }, logger);
      cache.store("fp-1", "hash-1", "A comet was seen.", "Comet spotted");

      await cache.flush();

      expect(JSON.parse(await readFile(nested, "utf-8")).entries["fp-1"].summaryText).toBe(
        "A comet was seen.",
      );
    });

    it("should throw CacheIOError when the file cannot be written", async () => {
      const blocker = join(dir, "not-a-directory");
      await writeFile(blocker, "");
      const cache = await loadSummaryCache(
        { path: join(blocker, "cache.json"), retentionDays: 7, now },
        logger,
      );
      cache.store("fp-1", "hash-1", "A comet was seen.", "Comet spotted");

      const error = await cache.flush().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(CacheIOError);
      expect((error as CacheIOError).operation).toBe("flush");
    });

    it("should not touch disk when the cache is not persistent", async () => {
      const cache = await loadSummaryCache({ path: null, retentionDays: 7, now }, logger);
      cache.store("fp-1", "hash-1", "A comet was seen.", "Comet spotted");

      await cache.flush();

      expect(await readdir(dir)).toEqual([]);
    });
  });
});
