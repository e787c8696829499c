// pattern: Imperative Shell
import type { Logger } from "pino";
import type { SummaryCache } from "./cache/store";
import type { AppConfig } from "./config";
import { assembleDigest } from "./digest/builder";
import type { Digest } from "./digest/builder";
import { CacheIOError, errorMessage } from "./errors";
import { deduplicateArticles } from "./pipeline/dedup";
import { normalizePollResults } from "./pipeline/normalizer";
import { pollSources } from "./pipeline/poller";
import { resolveSummaries } from "./pipeline/summarize-articles";
import type { SummaryStats } from "./pipeline/summarize-articles";
import type { SourceFailure } from "./pipeline/types";
import type { Source } from "./sources/registry";
import type { Summarizer } from "./summarizer/summarizer";
import { timeoutSignal } from "./utils/abort";

export type RunDeps = {
  readonly sources: ReadonlyArray<Source>;
  readonly cache: SummaryCache;
  readonly summarizer: Summarizer;
  readonly config: AppConfig;
  readonly logger: Logger;
  /** Aborts the run early (process signals); the run still assembles. */
  readonly signal?: AbortSignal;
  readonly now?: () => Date;
};

export type RunStatus = "success" | "no-articles" | "cache-flush-failed";

export type RunStats = Readonly<{
  sourceCount: number;
  failedSourceCount: number;
  entryCount: number;
  articleCount: number;
  duplicateCount: number;
  summaries: SummaryStats;
  aborted: boolean;
}>;

export type RunReport = Readonly<{
  status: RunStatus;
  digest: Digest | null;
  sourceFailures: ReadonlyArray<SourceFailure & { readonly sourceName: string }>;
  stats: RunStats;
}>;

const NO_SUMMARIES: SummaryStats = { cacheHits: 0, generated: 0, fallbacks: 0 };

/**
 * Runs one ingestion cycle: poll every source, normalize, dedup, resolve
 * summaries through the cache, assemble the digest, flush the cache.
 *
 * Fails only when no article survives dedup or the cache cannot be
 * flushed. Source and summarization failures are absorbed. Hitting
 * `run.timeoutMs` (or an external abort) cuts outstanding network work
 * short; whatever finished is still assembled and cached.
 */
export async function runPipeline(deps: RunDeps): Promise<RunReport> {
  const { sources, cache, summarizer, config, logger } = deps;
  const now = deps.now ?? (() => new Date());

  const signal = timeoutSignal(config.run.timeoutMs, deps.signal);
  const onAbort = () => {
    logger.warn(
      { reason: errorMessage(signal.reason) },
      "run aborted, continuing with completed work",
    );
  };
  signal.addEventListener("abort", onAbort, { once: true });

  try {
    const pollResults = await pollSources(
      sources,
      { ...config.fetch, signal },
      logger,
    );

    const sourceFailures = pollResults.flatMap((result) =>
      result.failure ? [{ sourceName: result.sourceName, ...result.failure }] : [],
    );
    const entryCount = pollResults.reduce((sum, result) => sum + result.entries.length, 0);

    const normalized = normalizePollResults(sources, pollResults, logger);
    const { articles, duplicateCount } = deduplicateArticles(normalized, logger);

    const baseStats = {
      sourceCount: sources.length,
      failedSourceCount: sourceFailures.length,
      entryCount,
      articleCount: articles.length,
      duplicateCount,
    };

    if (articles.length === 0) {
      logger.error(
        { sourceCount: sources.length, failedSourceCount: sourceFailures.length },
        "no articles retrieved from any source",
      );
      return {
        status: "no-articles",
        digest: null,
        sourceFailures,
        stats: { ...baseStats, summaries: NO_SUMMARIES, aborted: signal.aborted },
      };
    }

    const { resolved, stats: summaries } = await resolveSummaries(articles, {
      cache,
      summarizer,
      sources,
      config,
      logger,
      signal,
    });

    const digest = assembleDigest(resolved, {
      categoryPriority: config.categories.priority,
      generatedAt: now(),
    });

    const stats = { ...baseStats, summaries, aborted: signal.aborted };

    try {
      await cache.flush();
    } catch (err) {
      const kind = err instanceof CacheIOError ? err.kind : "CacheIOError";
      logger.error({ kind, error: errorMessage(err) }, "summary cache flush failed");
      return { status: "cache-flush-failed", digest, sourceFailures, stats };
    }

    logger.info(
      {
        articleCount: digest.totalArticleCount,
        categoryCount: digest.categories.length,
        failedSourceCount: sourceFailures.length,
        ...summaries,
        cache: { ...cache.stats(), size: cache.size() },
      },
      "pipeline run complete",
    );
    return { status: "success", digest, sourceFailures, stats };
  } finally {
    signal.removeEventListener("abort", onAbort);
  }
}
