// pattern: functional-core
import type { Logger } from "pino";
import type { Source } from "../sources/registry";
import { htmlToText } from "./extractor";
import { collapseWhitespace, computeContentHash, computeFingerprint } from "./fingerprint";
import type { Article, PollResult, RawFeedEntry } from "./types";

/**
 * Maps a raw feed entry to an Article. The title is plain text as decoded
 * by the feed parser; only the excerpt has markup stripped.
 *
 * Missing title falls back to the link; an entry with neither is dropped
 * (returns null). Missing excerpt becomes an empty string so the summarizer
 * works from the title alone. Metadata-based fingerprints are logged.
 */
export function normalizeEntry(
  entry: RawFeedEntry,
  source: Source,
  logger: Logger,
): Article | null {
  const title = entry.title ? collapseWhitespace(entry.title) : null;
  const link = entry.link;

  if (!title && !link) {
    logger.debug({ sourceName: source.name, guid: entry.guid }, "entry without title or link dropped");
    return null;
  }

  const resolvedTitle = title || (link ?? "");
  const excerpt = entry.excerpt ? htmlToText(entry.excerpt) : "";

  const { fingerprint, basis } = computeFingerprint({
    link,
    sourceName: source.name,
    title: resolvedTitle,
    publishedAt: entry.publishedAt,
  });

  if (basis === "metadata") {
    logger.info(
      { sourceName: source.name, title: resolvedTitle, link },
      "link unusable, fingerprint derived from source, title and date",
    );
  }

  return {
    fingerprint,
    fingerprintBasis: basis,
    contentHash: computeContentHash(resolvedTitle, excerpt),
    category: source.category,
    title: resolvedTitle,
    link,
    publishedAt: entry.publishedAt,
    excerpt,
    body: null,
    sourceName: source.name,
  };
}

/**
 * Normalizes every poll result in registry order. `results` and `sources`
 * are parallel arrays.
 */
export function normalizePollResults(
  sources: ReadonlyArray<Source>,
  results: ReadonlyArray<PollResult>,
  logger: Logger,
): ReadonlyArray<Article> {
  const articles: Array<Article> = [];

  sources.forEach((source, index) => {
    const result = results[index];
    if (!result || result.failure) return;

    for (const entry of result.entries) {
      const article = normalizeEntry(entry, source, logger);
      if (article) articles.push(article);
    }
  });

  logger.info({ articleCount: articles.length }, "normalization complete");
  return articles;
}
