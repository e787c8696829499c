// pattern: imperative-shell
import { APICallError, generateText } from "ai";
import type { LanguageModel } from "ai";
import type { Logger } from "pino";
import type { SummarizerConfig } from "../config";
import { SummarizationError, errorMessage } from "../errors";
import type { Article } from "../pipeline/types";
import { timeoutSignal } from "../utils/abort";
import { withRetry } from "./retry";
import type { RetryOptions } from "./retry";

export type Summarizer = {
  readonly summarize: (article: Article, signal?: AbortSignal) => Promise<string>;
};

const SYSTEM_PROMPT =
  "You write one-sentence news digest summaries. State the main finding or event factually. No hype, no speculation, no preamble.";

/**
 * Text the model sees for an article: extracted body, else the feed
 * excerpt, else nothing (the title alone is sent).
 */
export function summaryInput(article: Article, maxInputLength: number): string {
  const text = article.body ?? article.excerpt;
  return text.slice(0, maxInputLength).trim();
}

export function buildSummaryPrompt(article: Article, maxInputLength: number): string {
  const content = summaryInput(article, maxInputLength);
  const lines = [
    "Summarize this article in one factual sentence.",
    "",
    `Title: ${article.title}`,
  ];
  if (content) {
    lines.push(`Content: ${content}`);
  }
  return lines.join("\n");
}

/**
 * Rate limits, conflicts, server errors, network failures and per-attempt
 * timeouts are worth retrying. Everything else is not.
 */
export function isTransientLlmError(err: unknown): boolean {
  if (APICallError.isInstance(err)) {
    return err.isRetryable;
  }
  return err instanceof Error && err.name === "TimeoutError";
}

function cleanSummary(text: string): string {
  return text
    .replace(/\s+/g, " ")
    .trim()
    .replace(/^["“](.*)["”]$/, "$1")
    .trim();
}

/**
 * Summarizer backed by a single text-generation call per attempt. The SDK's
 * own retries are disabled; the configured retry policy applies instead.
 * Throws SummarizationError once the policy gives up.
 */
export function createLlmSummarizer(
  model: LanguageModel,
  config: SummarizerConfig,
  logger: Logger,
  options: { readonly sleep?: RetryOptions["sleep"] } = {},
): Summarizer {
  return {
    async summarize(article, signal) {
      const prompt = buildSummaryPrompt(article, config.maxInputLength);

      const outcome = await withRetry(
        async () => {
          const { text } = await generateText({
            model,
            system: SYSTEM_PROMPT,
            prompt,
            temperature: config.temperature,
            maxOutputTokens: config.maxOutputTokens,
            maxRetries: 0,
            abortSignal: timeoutSignal(config.timeoutMs, signal),
          });

          const summary = cleanSummary(text);
          if (!summary) {
            throw new Error("model returned an empty summary");
          }
          return summary;
        },
        {
          policy: config.retry,
          isTransient: isTransientLlmError,
          signal,
          sleep: options.sleep,
          onRetry: ({ attempt, delayMs, error }) => {
            logger.warn(
              {
                fingerprint: article.fingerprint,
                attempt,
                delayMs,
                error: errorMessage(error),
              },
              "summarization attempt failed, retrying",
            );
          },
        },
      );

      if (outcome.ok) {
        logger.debug(
          { fingerprint: article.fingerprint, attempts: outcome.attempts },
          "article summarized",
        );
        return outcome.value;
      }

      throw new SummarizationError(
        article.fingerprint,
        outcome.attempts,
        `summarization failed after ${outcome.attempts} attempt(s): ${errorMessage(outcome.error)}`,
        { cause: outcome.error },
      );
    },
  };
}

/**
 * Stand-in used when no model could be created: every article takes the
 * fallback path and nothing is cached, so the next run tries again.
 */
export function createUnavailableSummarizer(reason: string): Summarizer {
  return {
    async summarize(article) {
      throw new SummarizationError(article.fingerprint, 0, `summarizer unavailable: ${reason}`);
    },
  };
}
