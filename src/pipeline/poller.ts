import Parser from "rss-parser";
import pLimit from "p-limit";
import type { Logger } from "pino";
import { FetchError, ParseError, errorMessage } from "../errors";
import type { Source } from "../sources/registry";
import { timeoutSignal } from "../utils/abort";
import type { PollResult, RawFeedEntry, SourceFailure } from "./types";

type FeedItemFields = {
  mediaDescription?: string;
  summary?: string;
};

type FeedParser = Parser<Record<string, unknown>, FeedItemFields>;

let parserInstance: FeedParser | null = null;

function createParser(): FeedParser {
  return new Parser<Record<string, unknown>, FeedItemFields>({
    customFields: {
      item: [["media:description", "mediaDescription"]],
    },
  });
}

function getParser(): FeedParser {
  if (!parserInstance) {
    parserInstance = createParser();
  }
  return parserInstance;
}

export type PollOptions = {
  readonly timeoutMs: number;
  readonly userAgent: string;
  readonly signal?: AbortSignal;
};

export type PollSourcesOptions = PollOptions & {
  readonly maxConcurrency: number;
};

function parseDate(value: string | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function nonEmpty(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/**
 * Downloads a feed document. Any network error, timeout, abort or non-2xx
 * status becomes a FetchError.
 */
export async function fetchFeedDocument(
  url: string,
  options: PollOptions,
): Promise<string> {
  try {
    const response = await fetch(url, {
      signal: timeoutSignal(options.timeoutMs, options.signal),
      headers: {
        "User-Agent": options.userAgent,
        Accept:
          "application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.8, */*;q=0.5",
      },
    });

    if (!response.ok) {
      throw new FetchError(url, `HTTP ${response.status}: ${response.statusText}`);
    }

    return await response.text();
  } catch (err) {
    if (err instanceof FetchError) throw err;
    throw new FetchError(url, errorMessage(err), { cause: err });
  }
}

/**
 * Parses an RSS or Atom document into raw entries, keeping the feed's own
 * item order.
 */
export async function parseFeedDocument(
  url: string,
  xml: string,
): Promise<ReadonlyArray<RawFeedEntry>> {
  let feed: Awaited<ReturnType<FeedParser["parseString"]>>;
  try {
    feed = await getParser().parseString(xml);
  } catch (err) {
    throw new ParseError(url, errorMessage(err), { cause: err });
  }

  if (!Array.isArray(feed.items)) {
    throw new ParseError(url, "feed has no item list");
  }

  return feed.items.map((item) => ({
    guid: nonEmpty(item.guid),
    title: nonEmpty(item.title),
    link: nonEmpty(item.link),
    publishedAt: parseDate(item.isoDate ?? item.pubDate),
    excerpt:
      nonEmpty(item.contentSnippet) ??
      nonEmpty(item.content) ??
      nonEmpty(item.summary) ??
      nonEmpty(item.mediaDescription),
  }));
}

function toSourceFailure(err: unknown): SourceFailure {
  if (err instanceof ParseError) {
    return { kind: "ParseError", message: err.message };
  }
  return { kind: "FetchError", message: errorMessage(err) };
}

/**
 * Retrieves and parses one source. Never throws: failures are reported in
 * the result and the source contributes no entries.
 */
export async function pollSource(
  source: Source,
  options: PollOptions,
  logger: Logger,
): Promise<PollResult> {
  try {
    const xml = await fetchFeedDocument(source.url, options);
    const entries = await parseFeedDocument(source.url, xml);
    const kept = entries.slice(0, source.maxArticles);

    logger.info(
      {
        sourceName: source.name,
        entryCount: kept.length,
        droppedCount: entries.length - kept.length,
      },
      "feed polled successfully",
    );
    return { sourceName: source.name, entries: kept, failure: null };
  } catch (err) {
    const failure = toSourceFailure(err);
    logger.warn(
      {
        sourceName: source.name,
        url: source.url,
        kind: failure.kind,
        error: failure.message,
      },
      "feed poll failed",
    );
    return { sourceName: source.name, entries: [], failure };
  }
}

/**
 * Polls every source through a bounded pool and waits for all of them.
 * Results are returned in registry order, not completion order.
 */
export async function pollSources(
  sources: ReadonlyArray<Source>,
  options: PollSourcesOptions,
  logger: Logger,
): Promise<ReadonlyArray<PollResult>> {
  if (sources.length === 0) {
    logger.warn("no sources to poll");
    return [];
  }

  const limit = pLimit(Math.min(options.maxConcurrency, sources.length));

  const results = await Promise.all(
    sources.map((source) =>
      limit(async (): Promise<PollResult> => {
        if (options.signal?.aborted) {
          logger.warn({ sourceName: source.name }, "run aborted before feed poll");
          return {
            sourceName: source.name,
            entries: [],
            failure: { kind: "FetchError", message: "run aborted before fetch" },
          };
        }
        return pollSource(source, options, logger);
      }),
    ),
  );

  const failedCount = results.filter((result) => result.failure !== null).length;
  logger.info(
    {
      sourceCount: sources.length,
      succeededCount: sources.length - failedCount,
      failedCount,
    },
    "feed poll cycle complete",
  );

  return results;
}
