import { z } from "zod/v3";

export const CACHE_FILE_VERSION = 1;

export const cacheEntrySchema = z.object({
  summaryText: z.string().min(1),
  createdAt: z.string().datetime(),
  lastUsedAt: z.string().datetime(),
  sourceContentHash: z.string().min(1),
  title: z.string().default(""),
});

export const cacheFileSchema = z.object({
  version: z.literal(CACHE_FILE_VERSION),
  entries: z.record(z.string(), z.unknown()),
});

export type StoredCacheEntry = z.infer<typeof cacheEntrySchema>;

export type CacheEntry = Readonly<
  StoredCacheEntry & {
    fingerprint: string;
  }
>;

export type CacheFile = {
  readonly version: typeof CACHE_FILE_VERSION;
  readonly entries: Readonly<Record<string, StoredCacheEntry>>;
};
