// pattern: Imperative Shell
import { readFile } from "node:fs/promises";
import type { Logger } from "pino";
import { CacheIOError, errorMessage } from "../errors";
import { writeFileAtomic } from "../utils/atomic";
import {
  CACHE_FILE_VERSION,
  cacheEntrySchema,
  cacheFileSchema,
  type CacheEntry,
  type CacheFile,
  type StoredCacheEntry,
} from "./schema";

const DAY_MS = 24 * 60 * 60 * 1000;
const STORED_TITLE_LENGTH = 100;

export type SummaryCacheOptions = {
  /** Cache file location; null keeps the cache in memory only. */
  readonly path: string | null;
  readonly retentionDays: number;
  readonly now?: () => Date;
};

export type CacheStats = Readonly<{
  hits: number;
  misses: number;
  stale: number;
  stores: number;
}>;

/**
 * Fingerprint → summary store. Lookups and stores only touch memory; the
 * file is rewritten as a whole by `flush`.
 */
export type SummaryCache = {
  readonly lookup: (fingerprint: string, contentHash: string) => CacheEntry | null;
  readonly store: (
    fingerprint: string,
    contentHash: string,
    summaryText: string,
    title: string,
  ) => void;
  readonly flush: () => Promise<void>;
  readonly size: () => number;
  readonly stats: () => CacheStats;
};

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function readCacheEntries(
  path: string,
  cutoff: number,
  logger: Logger,
): Promise<Map<string, StoredCacheEntry>> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      logger.info({ path }, "no summary cache file, starting empty");
      return new Map();
    }
    throw new CacheIOError(path, "load", errorMessage(err), { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new CacheIOError(path, "load", `invalid JSON: ${errorMessage(err)}`, { cause: err });
  }

  const file = cacheFileSchema.safeParse(parsed);
  if (!file.success) {
    const issues = file.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new CacheIOError(path, "load", `unrecognized cache file: ${issues}`);
  }

  const entries = new Map<string, StoredCacheEntry>();
  let evictedCount = 0;
  let malformedCount = 0;

  for (const [fingerprint, value] of Object.entries(file.data.entries)) {
    const entry = cacheEntrySchema.safeParse(value);
    if (!entry.success) {
      malformedCount++;
      continue;
    }
    if (Date.parse(entry.data.lastUsedAt) < cutoff) {
      evictedCount++;
      continue;
    }
    entries.set(fingerprint, entry.data);
  }

  logger.info(
    { path, loadedCount: entries.size, evictedCount, malformedCount },
    "summary cache loaded",
  );
  return entries;
}

export function createSummaryCache(
  initial: ReadonlyMap<string, StoredCacheEntry>,
  options: SummaryCacheOptions,
  logger: Logger,
): SummaryCache {
  const now = options.now ?? (() => new Date());
  const entries = new Map(initial);
  let hits = 0;
  let misses = 0;
  let stale = 0;
  let stores = 0;

  return {
    lookup(fingerprint, contentHash) {
      const entry = entries.get(fingerprint);
      if (!entry) {
        misses++;
        return null;
      }
      if (entry.sourceContentHash !== contentHash) {
        stale++;
        logger.debug({ fingerprint }, "cached summary is stale, content changed");
        return null;
      }

      hits++;
      const touched = { ...entry, lastUsedAt: now().toISOString() };
      entries.set(fingerprint, touched);
      return { fingerprint, ...touched };
    },

    store(fingerprint, contentHash, summaryText, title) {
      const timestamp = now().toISOString();
      entries.set(fingerprint, {
        summaryText,
        createdAt: timestamp,
        lastUsedAt: timestamp,
        sourceContentHash: contentHash,
        title: title.slice(0, STORED_TITLE_LENGTH),
      });
      stores++;
    },

    async flush() {
      if (!options.path) {
        logger.debug("summary cache is not persistent, skipping flush");
        return;
      }

      const sorted = [...entries.entries()].sort(([a], [b]) => a.localeCompare(b));
      const file: CacheFile = {
        version: CACHE_FILE_VERSION,
        entries: Object.fromEntries(sorted),
      };

      try {
        await writeFileAtomic(options.path, `${JSON.stringify(file, null, 2)}\n`);
      } catch (err) {
        throw new CacheIOError(options.path, "flush", errorMessage(err), { cause: err });
      }

      logger.info({ path: options.path, entryCount: entries.size }, "summary cache flushed");
    },

    size: () => entries.size,

    stats: () => ({ hits, misses, stale, stores }),
  };
}

/**
 * Loads the cache file, dropping entries not used within the retention
 * window. A missing file gives an empty cache; an unreadable or invalid one
 * is logged and also gives an empty cache, so the run proceeds cold.
 */
export async function loadSummaryCache(
  options: SummaryCacheOptions,
  logger: Logger,
): Promise<SummaryCache> {
  if (!options.path) {
    logger.info("summary cache disabled for this run");
    return createSummaryCache(new Map(), options, logger);
  }

  const now = options.now ?? (() => new Date());
  const cutoff = now().getTime() - options.retentionDays * DAY_MS;

  let initial = new Map<string, StoredCacheEntry>();
  try {
    initial = await readCacheEntries(options.path, cutoff, logger);
  } catch (err) {
    const error =
      err instanceof CacheIOError
        ? err
        : new CacheIOError(options.path, "load", errorMessage(err), { cause: err });
    logger.warn(
      { path: options.path, kind: error.kind, error: error.message },
      "summary cache load failed, starting cold",
    );
  }

  return createSummaryCache(initial, options, logger);
}
