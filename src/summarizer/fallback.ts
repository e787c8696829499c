import type { Article } from "../pipeline/types";

const ELLIPSIS = "…";

export function truncateAtWord(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;

  const cut = text.slice(0, Math.max(0, maxLength - ELLIPSIS.length));
  const lastSpace = cut.lastIndexOf(" ");
  const trimmed = lastSpace > maxLength * 0.6 ? cut.slice(0, lastSpace) : cut;
  return `${trimmed.trimEnd()}${ELLIPSIS}`;
}

/**
 * Summary used when the model could not produce one: the excerpt, else the
 * extracted body, else the title, truncated.
 */
export function fallbackSummary(article: Article, maxLength: number): string {
  const source = article.excerpt || article.body || article.title;
  return truncateAtWord(source, maxLength);
}
