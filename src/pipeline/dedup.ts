import type { Logger } from "pino";
import type { Article, DedupResult } from "./types";

/**
 * Keeps the first article per fingerprint. Input order is registry order
 * then feed order, so the earliest-configured source wins a syndicated
 * article regardless of which fetch finished first.
 */
export function deduplicateArticles(
  articles: ReadonlyArray<Article>,
  logger: Logger,
): DedupResult {
  const seen = new Map<string, Article>();
  let duplicateCount = 0;

  for (const article of articles) {
    const winner = seen.get(article.fingerprint);
    if (winner) {
      duplicateCount++;
      logger.debug(
        {
          fingerprint: article.fingerprint,
          keptSource: winner.sourceName,
          droppedSource: article.sourceName,
        },
        "duplicate article dropped",
      );
      continue;
    }
    seen.set(article.fingerprint, article);
  }

  const unique = Array.from(seen.values());
  logger.info(
    { uniqueCount: unique.length, duplicateCount },
    "dedup complete",
  );
  return { articles: unique, duplicateCount };
}
