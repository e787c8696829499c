// pattern: functional-core
import type { ResolvedArticle, SummarySource } from "../pipeline/types";

/**
 * An article as handed to the renderer.
 */
export type DigestArticle = Readonly<{
  fingerprint: string;
  title: string;
  link: string | null;
  sourceName: string;
  publishedAt: string | null;
  summary: string;
  summarySource: SummarySource;
}>;

export type DigestCategory = Readonly<{
  name: string;
  articles: ReadonlyArray<DigestArticle>;
}>;

/**
 * Categorized digest for one run. `categories` is ordered.
 */
export type Digest = Readonly<{
  generatedAt: string;
  totalArticleCount: number;
  sourceCount: number;
  categories: ReadonlyArray<DigestCategory>;
}>;

export type AssembleOptions = {
  readonly categoryPriority: ReadonlyArray<string>;
  readonly generatedAt: Date;
};

type Indexed = {
  readonly item: ResolvedArticle;
  readonly index: number;
};

/**
 * Newest first; undated after dated; otherwise input (fetch) order.
 */
function compareArticles(a: Indexed, b: Indexed): number {
  const aTime = a.item.article.publishedAt?.getTime() ?? null;
  const bTime = b.item.article.publishedAt?.getTime() ?? null;

  if (aTime !== null && bTime !== null && aTime !== bTime) {
    return bTime - aTime;
  }
  if (aTime === null && bTime !== null) return 1;
  if (aTime !== null && bTime === null) return -1;
  return a.index - b.index;
}

/**
 * Priority-listed categories first, in list order; the rest alphabetically.
 */
export function orderCategories(
  names: ReadonlyArray<string>,
  priority: ReadonlyArray<string>,
): ReadonlyArray<string> {
  const rank = new Map(priority.map((name, index) => [name, index]));

  return [...names].sort((a, b) => {
    const aRank = rank.get(a);
    const bRank = rank.get(b);
    if (aRank !== undefined && bRank !== undefined) return aRank - bRank;
    if (aRank !== undefined) return -1;
    if (bRank !== undefined) return 1;
    return a < b ? -1 : a > b ? 1 : 0;
  });
}

function toDigestArticle({ article, summary, summarySource }: ResolvedArticle): DigestArticle {
  return {
    fingerprint: article.fingerprint,
    title: article.title,
    link: article.link,
    sourceName: article.sourceName,
    publishedAt: article.publishedAt ? article.publishedAt.toISOString() : null,
    summary,
    summarySource,
  };
}

/**
 * Groups resolved articles by category and orders both levels. Pure: the
 * same input always yields the same digest.
 */
export function assembleDigest(
  resolved: ReadonlyArray<ResolvedArticle>,
  options: AssembleOptions,
): Digest {
  const groups = new Map<string, Array<Indexed>>();

  resolved.forEach((item, index) => {
    const group = groups.get(item.article.category) ?? [];
    group.push({ item, index });
    groups.set(item.article.category, group);
  });

  const categories = orderCategories([...groups.keys()], options.categoryPriority).map(
    (name): DigestCategory => ({
      name,
      articles: [...(groups.get(name) ?? [])].sort(compareArticles).map(({ item }) => toDigestArticle(item)),
    }),
  );

  return {
    generatedAt: options.generatedAt.toISOString(),
    totalArticleCount: resolved.length,
    sourceCount: new Set(resolved.map(({ article }) => article.sourceName)).size,
    categories,
  };
}
