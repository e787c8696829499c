import { describe, it, expect } from "vitest";
import { createTestArticle } from "../test-utils/fixtures";
import type { ResolvedArticle } from "../pipeline/types";
import { assembleDigest, orderCategories } from "./builder";

const PRIORITY = ["Science", "Technology", "AI", "Gaming", "Entertainment"];
const generatedAt = new Date("2024-01-05T09:00:00.000Z");

function resolved(
  overrides: Parameters<typeof createTestArticle>[0],
  summary = "A summary.",
): ResolvedArticle {
  return { article: createTestArticle(overrides), summary, summarySource: "generated" };
}

describe("orderCategories", () => {
  it("should follow the priority list", () => {
    expect(orderCategories(["Gaming", "AI", "Science"], PRIORITY)).toEqual(["Science", "AI", "Gaming"]);
  });

  it("should place unlisted categories after listed ones, alphabetically", () => {
    expect(orderCategories(["Sports", "Gaming", "Culture", "Science"], PRIORITY)).toEqual([
      "Science",
      "Gaming",
      "Culture",
      "Sports",
    ]);
  });

  it("should sort alphabetically when there is no priority list", () => {
    expect(orderCategories(["Gaming", "AI", "Science"], [])).toEqual(["AI", "Gaming", "Science"]);
  });
});

describe("assembleDigest", () => {
  it("should put Science before Gaming whatever the input order", () => {
    const digest = assembleDigest(
      [
        resolved({ link: "https://example.com/game", category: "Gaming", sourceName: "games-hub" }),
        resolved({ link: "https://example.com/comet", category: "Science" }),
      ],
      { categoryPriority: PRIORITY, generatedAt },
    );

    expect(digest.categories.map((category) => category.name)).toEqual(["Science", "Gaming"]);
  });

  it("should order articles newest first with undated ones last", () => {
    const digest = assembleDigest(
      [
        resolved({ link: "https://example.com/undated", title: "Undated", publishedAt: null }),
        resolved({ link: "https://example.com/old", title: "Old", publishedAt: new Date("2024-01-01T00:00:00Z") }),
        resolved({ link: "https://example.com/new", title: "New", publishedAt: new Date("2024-01-03T00:00:00Z") }),
      ],
      { categoryPriority: PRIORITY, generatedAt },
    );

    expect(digest.categories[0]!.articles.map((article) => article.title)).toEqual([
      "New",
      "Old",
      "Undated",
    ]);
  });

  it("should break ties by fetch order", () => {
    const sameTime = new Date("2024-01-02T00:00:00Z");
    const digest = assembleDigest(
      [
        resolved({ link: "https://example.com/b", title: "Fetched first", publishedAt: sameTime }),
        resolved({ link: "https://example.com/a", title: "Fetched second", publishedAt: sameTime }),
        resolved({ link: "https://example.com/c", title: "Undated first", publishedAt: null }),
        resolved({ link: "https://example.com/d", title: "Undated second", publishedAt: null }),
      ],
      { categoryPriority: PRIORITY, generatedAt },
    );

    expect(digest.categories[0]!.articles.map((article) => article.title)).toEqual([
      "Fetched first",
      "Fetched second",
      "Undated first",
      "Undated second",
    ]);
  });

  it("should map articles to their digest form and count sources", () => {
    const digest = assembleDigest(
      [
        resolved({ link: "https://example.com/comet", title: "Comet spotted" }, "A comet was seen."),
        resolved({ link: "https://example.com/ai", category: "AI", sourceName: "ai-weekly", publishedAt: null }),
      ],
      { categoryPriority: PRIORITY, generatedAt },
    );

    expect(digest.generatedAt).toBe("2024-01-05T09:00:00.000Z");
    expect(digest.totalArticleCount).toBe(2);
    expect(digest.sourceCount).toBe(2);
    expect(digest.categories[0]).toEqual({
      name: "Science",
      articles: [
        {
          fingerprint: createTestArticle({ link: "https://example.com/comet", title: "Comet spotted" }).fingerprint,
          title: "Comet spotted",
          link: "https://example.com/comet",
          sourceName: "science-wire",
          publishedAt: "2024-01-01T12:00:00.000Z",
          summary: "A comet was seen.",
          summarySource: "generated",
        },
      ],
    });
    expect(digest.categories[1]!.articles[0]!.publishedAt).toBeNull();
  });

  it("should produce no categories for no articles", () => {
    expect(assembleDigest([], { categoryPriority: PRIORITY, generatedAt })).toEqual({
      generatedAt: "2024-01-05T09:00:00.000Z",
      totalArticleCount: 0,
      sourceCount: 0,
      categories: [],
    });
  });

  it("should be deterministic for the same input", () => {
    const input = [
      resolved({ link: "https://example.com/1", category: "Gaming" }),
      resolved({ link: "https://example.com/2", category: "Culture" }),
      resolved({ link: "https://example.com/3" }),
    ];

    expect(assembleDigest(input, { categoryPriority: PRIORITY, generatedAt })).toEqual(
      assembleDigest(input, { categoryPriority: PRIORITY, generatedAt }),
    );
  });
});
