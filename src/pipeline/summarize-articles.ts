import pLimit from "p-limit";
import type { Logger } from "pino";
import type { SummaryCache } from "../cache/store";
import type { AppConfig } from "../config";
import { PipelineError, errorMessage } from "../errors";
import type { Source } from "../sources/registry";
import { fallbackSummary } from "../summarizer/fallback";
import type { Summarizer } from "../summarizer/summarizer";
import { enrichArticleBodies } from "./fetcher";
import type { Article, ResolvedArticle, SummarySource } from "./types";

export type ResolveDeps = {
  readonly cache: SummaryCache;
  readonly summarizer: Summarizer;
  readonly sources: ReadonlyArray<Source>;
  readonly config: Pick<AppConfig, "summarizer" | "extraction" | "fetch">;
  readonly logger: Logger;
  readonly signal?: AbortSignal;
};

export type SummaryStats = Readonly<{
  cacheHits: number;
  generated: number;
  fallbacks: number;
}>;

export type ResolveResult = {
  readonly resolved: ReadonlyArray<ResolvedArticle>;
  readonly stats: SummaryStats;
};

type Resolution = {
  readonly summary: string;
  readonly summarySource: Exclude<SummarySource, "cache">;
};

/**
 * Attaches a summary to every article.
 *
 * Fresh cache entries are used as-is and never reach the summarizer. Misses
 * go through optional full-text enrichment and then the summarizer, at most
 * `summarizer.maxConcurrency` at a time. Requests for a fingerprint already
 * in flight share its result, so each fingerprint is summarized and stored
 * at most once. A failed summary falls back to the excerpt and is not
 * cached. Output order matches input order.
 */
export async function resolveSummaries(
  articles: ReadonlyArray<Article>,
  deps: ResolveDeps,
): Promise<ResolveResult> {
  const { cache, summarizer, config, logger, signal } = deps;

  const cached = new Map<string, string>();
  const misses: Array<Article> = [];
  const missFingerprints = new Set<string>();

  for (const article of articles) {
    if (cached.has(article.fingerprint) || missFingerprints.has(article.fingerprint)) {
      continue;
    }
    const entry = cache.lookup(article.fingerprint, article.contentHash);
    if (entry) {
      cached.set(article.fingerprint, entry.summaryText);
    } else {
      misses.push(article);
      missFingerprints.add(article.fingerprint);
    }
  }

  logger.info(
    { articleCount: articles.length, cacheHitCount: cached.size, missCount: misses.length },
    "summary cache lookup complete",
  );

  const enriched = new Map(
    (
      await enrichArticleBodies(
        misses,
        deps.sources,
        {
          extraction: config.extraction,
          userAgent: config.fetch.userAgent,
          signal,
        },
        logger,
      )
    ).map((article) => [article.fingerprint, article]),
  );

  const limit = pLimit(config.summarizer.maxConcurrency);
  const inFlight = new Map<string, Promise<Resolution>>();

  const fallback = (article: Article): Resolution => ({
    summary: fallbackSummary(article, config.summarizer.fallbackLength),
    summarySource: "fallback",
  });

  const summarizeOne = async (article: Article): Promise<Resolution> => {
    if (signal?.aborted) {
      logger.warn(
        { fingerprint: article.fingerprint, title: article.title },
        "run aborted before summarization, using fallback summary",
      );
      return fallback(article);
    }

    try {
      const summary = await summarizer.summarize(article, signal);
      cache.store(article.fingerprint, article.contentHash, summary, article.title);
      return { summary, summarySource: "generated" };
    } catch (err) {
      logger.warn(
        {
          fingerprint: article.fingerprint,
          title: article.title,
          kind: err instanceof PipelineError ? err.kind : "SummarizationError",
          error: errorMessage(err),
        },
        "summarization failed, using fallback summary",
      );
      return fallback(article);
    }
  };

  const resolve = (article: Article): Promise<Resolution> => {
    const pending = inFlight.get(article.fingerprint);
    if (pending) return pending;

    const task = limit(() => summarizeOne(enriched.get(article.fingerprint) ?? article));
    inFlight.set(article.fingerprint, task);
    return task;
  };

  const resolutions = await Promise.all(
    articles.map((article) =>
      cached.has(article.fingerprint) ? Promise.resolve(null) : resolve(article),
    ),
  );

  let generated = 0;
  let fallbacks = 0;
  let cacheHits = 0;

  const resolved = articles.map((article, index): ResolvedArticle => {
    const resolution = resolutions[index];
    if (!resolution) {
      cacheHits++;
      return { article, summary: cached.get(article.fingerprint) ?? "", summarySource: "cache" };
    }
    if (resolution.summarySource === "generated") generated++;
    else fallbacks++;
    return { article, summary: resolution.summary, summarySource: resolution.summarySource };
  });

  const stats = { cacheHits, generated, fallbacks };
  logger.info(stats, "summary resolution complete");
  return { resolved, stats };
}
