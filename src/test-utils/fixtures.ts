import pino from "pino";
import { appConfigSchema } from "../config/schema";
import type { AppConfig } from "../config";
import { computeContentHash, computeFingerprint } from "../pipeline/fingerprint";
import type { Article } from "../pipeline/types";
import type { Source } from "../sources/registry";
import type { Summarizer } from "../summarizer/summarizer";

export function createTestLogger(): pino.Logger {
  return pino({ level: "silent" });
}

/**
 * Creates a validated AppConfig suitable for testing: two sources, no retry
 * delays, short timeouts.
 * @param overrides - Raw config sections merged over the defaults before validation.
 */
export function createTestConfig(overrides: Record<string, unknown> = {}): AppConfig {
  return appConfigSchema.parse({
    llm: { provider: "anthropic", model: "test-model" },
    sources: [
      { name: "science-wire", url: "https://science.example.com/rss", category: "Science" },
      { name: "games-hub", url: "https://games.example.com/rss", category: "Gaming" },
    ],
    categories: { priority: ["Science", "Technology", "AI", "Gaming", "Entertainment"] },
    fetch: { timeoutMs: 1000, maxConcurrency: 4 },
    summarizer: {
      maxConcurrency: 2,
      retry: { maxAttempts: 3, baseDelayMs: 0, factor: 2, maxDelayMs: 0 },
    },
    ...overrides,
  });
}

export function createTestSource(overrides: Partial<Source> = {}): Source {
  return {
    name: "science-wire",
    url: "https://science.example.com/rss",
    category: "Science",
    maxArticles: 10,
    hints: { fullText: false, contentSelectors: [] },
    ...overrides,
  };
}

type ArticleInput = Partial<Omit<Article, "fingerprint" | "fingerprintBasis" | "contentHash">>;

/**
 * Builds an Article with fingerprint and content hash derived the same way
 * the normalizer derives them.
 */
export function createTestArticle(overrides: ArticleInput = {}): Article {
  const title = overrides.title ?? "Test Article";
  const excerpt = overrides.excerpt ?? "An excerpt about the test article.";
  const sourceName = overrides.sourceName ?? "science-wire";
  const link = overrides.link === undefined ? "https://example.com/article" : overrides.link;
  const publishedAt =
    overrides.publishedAt === undefined ? new Date("2024-01-01T12:00:00Z") : overrides.publishedAt;
  const { fingerprint, basis } = computeFingerprint({ link, sourceName, title, publishedAt });

  return {
    fingerprint,
    fingerprintBasis: basis,
    contentHash: computeContentHash(title, excerpt),
    category: overrides.category ?? "Science",
    title,
    link,
    publishedAt,
    excerpt,
    body: overrides.body ?? null,
    sourceName,
  };
}

export type FakeSummarizer = Summarizer & {
  readonly calls: Array<Article>;
};

/**
 * In-process summarizer that records every article it is asked about.
 */
export function createFakeSummarizer(
  respond: (article: Article) => Promise<string> = async (article) => `Summary of ${article.title}`,
): FakeSummarizer {
  const calls: Array<Article> = [];
  return {
    calls,
    async summarize(article) {
      calls.push(article);
      return respond(article);
    },
  };
}

export type FeedItemFixture = {
  readonly title?: string;
  readonly link?: string;
  readonly pubDate?: string;
  readonly description?: string;
  readonly guid?: string;
};

/**
 * Minimal RSS 2.0 document with the given items, in order.
 */
export function buildRssFeed(items: ReadonlyArray<FeedItemFixture>, title = "Test Feed"): string {
  const itemXml = items
    .map((item) => {
      const fields = [
        item.title !== undefined ? `<title>${item.title}</title>` : "",
        item.link !== undefined ? `<link>${item.link}</link>` : "",
        item.guid !== undefined ? `<guid>${item.guid}</guid>` : "",
        item.pubDate !== undefined ? `<pubDate>${item.pubDate}</pubDate>` : "",
        item.description !== undefined ? `<description>${item.description}</description>` : "",
      ].join("");
      return `<item>${fields}</item>`;
    })
    .join("\n");

  return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
<channel>
<title>${title}</title>
<link>https://example.com</link>
<description>Fixture feed</description>
${itemXml}
</channel>
</rss>`;
}

/**
 * Response-like object accepted where the code reads `ok`, `status`,
 * `statusText` and `text()`.
 */
export function textResponse(body: string, status = 200, statusText = "OK"): Response {
  return new Response(body, { status, statusText });
}
