import { setTimeout as sleep } from "node:timers/promises";
import type { Logger } from "pino";
import pLimit from "p-limit";
import type { ExtractionConfig } from "../config";
import { errorMessage } from "../errors";
import type { Source } from "../sources/registry";
import { timeoutSignal } from "../utils/abort";
import { extractMainText } from "./extractor";
import { normalizeLink } from "./fingerprint";
import type { Article } from "./types";

export type FetchResult =
  | { success: true; html: string; url: string }
  | { success: false; error: string; url: string };

/**
 * Fetches article HTML from a single URL with timeout support.
 * Returns structured result indicating success or failure with error details.
 */
export async function fetchArticle(
  url: string,
  options: { timeoutMs: number; userAgent: string; signal?: AbortSignal },
  logger: Logger,
): Promise<FetchResult> {
  try {
    const response = await fetch(url, {
      signal: timeoutSignal(options.timeoutMs, options.signal),
      headers: {
        "User-Agent": options.userAgent,
        Accept: "text/html,application/xhtml+xml",
      },
    });

    if (!response.ok) {
      return {
        success: false,
        error: `HTTP ${response.status}: ${response.statusText}`,
        url,
      };
    }

    const html = await response.text();
    return { success: true, html, url };
  } catch (err) {
    const message = errorMessage(err);
    logger.warn({ url, error: message }, "article fetch failed");
    return { success: false, error: message, url };
  }
}

export type EnrichOptions = {
  readonly extraction: ExtractionConfig;
  readonly userAgent: string;
  readonly signal?: AbortSignal;
};

function wantsFullText(
  article: Article,
  sourcesByName: ReadonlyMap<string, Source>,
  extraction: ExtractionConfig,
): boolean {
  if (normalizeLink(article.link) === null) return false;
  const source = sourcesByName.get(article.sourceName);
  return extraction.enabled || (source?.hints.fullText ?? false);
}

/**
 * Replaces `body` with the linked page's main text for articles whose source
 * asks for it (or when extraction is enabled globally). Requests run through
 * a bounded pool with a minimum delay between hits on the same host. Any
 * failure leaves the article as it was.
 */
export async function enrichArticleBodies(
  articles: ReadonlyArray<Article>,
  sources: ReadonlyArray<Source>,
  options: EnrichOptions,
  logger: Logger,
): Promise<ReadonlyArray<Article>> {
  const sourcesByName = new Map(sources.map((source) => [source.name, source]));
  const candidates = articles.filter((article) =>
    wantsFullText(article, sourcesByName, options.extraction),
  );

  if (candidates.length === 0) {
    return articles;
  }

  const limit = pLimit(options.extraction.maxConcurrency);
  const delayMs = options.extraction.perDomainDelayMs;
  const domainLastFetch = new Map<string, number>();
  const bodies = new Map<string, string>();

  const tasks = candidates.map((article) =>
    limit(async () => {
      if (options.signal?.aborted || !article.link) return;

      const domain = new URL(article.link).hostname;
      const lastFetch = domainLastFetch.get(domain) ?? 0;
      const elapsed = Date.now() - lastFetch;
      domainLastFetch.set(domain, Math.max(Date.now(), lastFetch + delayMs));

      if (lastFetch > 0 && elapsed < delayMs) {
        await sleep(delayMs - elapsed, undefined, { signal: options.signal });
      }

      const result = await fetchArticle(
        article.link,
        {
          timeoutMs: options.extraction.timeoutMs,
          userAgent: options.userAgent,
          signal: options.signal,
        },
        logger,
      );
      if (!result.success) return;

      const source = sourcesByName.get(article.sourceName);
      const extracted = extractMainText(
        result.html,
        {
          selectors: [
            ...(source?.hints.contentSelectors ?? []),
            ...options.extraction.selectors,
          ],
          minLength: options.extraction.minLength,
        },
        logger,
      );

      if (extracted) {
        bodies.set(article.fingerprint, extracted.text);
        logger.debug(
          { fingerprint: article.fingerprint, selector: extracted.selector, length: extracted.text.length },
          "article body extracted",
        );
      }
    }),
  );

  const settled = await Promise.allSettled(tasks);
  for (const outcome of settled) {
    if (outcome.status === "rejected") {
      logger.warn({ error: errorMessage(outcome.reason) }, "article enrichment task failed");
    }
  }

  logger.info(
    { candidateCount: candidates.length, extractedCount: bodies.size },
    "article body extraction complete",
  );

  return articles.map((article) => {
    const body = bodies.get(article.fingerprint);
    return body ? { ...article, body } : article;
  });
}
