import type { PipelineErrorKind } from "../errors";

export type RawFeedEntry = {
  readonly guid: string | null;
  readonly title: string | null;
  readonly link: string | null;
  readonly publishedAt: Date | null;
  readonly excerpt: string | null;
};

export type SourceFailureKind = Extract<PipelineErrorKind, "FetchError" | "ParseError">;

export type SourceFailure = {
  readonly kind: SourceFailureKind;
  readonly message: string;
};

export type PollResult = {
  readonly sourceName: string;
  readonly entries: ReadonlyArray<RawFeedEntry>;
  readonly failure: SourceFailure | null;
};

export type FingerprintBasis = "link" | "metadata";

export type Article = {
  readonly fingerprint: string;
  readonly fingerprintBasis: FingerprintBasis;
  readonly contentHash: string;
  readonly category: string;
  readonly title: string;
  readonly link: string | null;
  readonly publishedAt: Date | null;
  readonly excerpt: string;
  readonly body: string | null;
  readonly sourceName: string;
};

export type DedupResult = {
  readonly articles: ReadonlyArray<Article>;
  readonly duplicateCount: number;
};

export type SummarySource = "cache" | "generated" | "fallback";

export type ResolvedArticle = {
  readonly article: Article;
  readonly summary: string;
  readonly summarySource: SummarySource;
};
