// pattern: functional-core
import * as cheerio from "cheerio";
import type { Logger } from "pino";

const NOISE_SELECTOR = "script, style, noscript, nav, header, footer, aside, form";

export type ExtractionOptions = {
  readonly selectors: ReadonlyArray<string>;
  readonly minLength: number;
};

export type ExtractionResult = {
  readonly text: string;
  readonly selector: string;
};

/**
 * Plain text of an HTML fragment with whitespace collapsed. Text without
 * markup passes through unchanged apart from whitespace.
 */
export function htmlToText(html: string): string {
  const $ = cheerio.load(html, null, false);
  $(NOISE_SELECTOR).remove();
  return $.root().text().replace(/\s+/g, " ").trim();
}

/**
 * Finds the main article text in a page by trying each selector in order and
 * returning the first match with at least `minLength` characters of text.
 */
export function extractMainText(
  html: string,
  options: ExtractionOptions,
  logger: Logger,
): ExtractionResult | null {
  const $ = cheerio.load(html);
  $(NOISE_SELECTOR).remove();

  for (const selector of options.selectors) {
    let text: string;
    try {
      text = $(selector).first().text().replace(/\s+/g, " ").trim();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.debug({ selector, error: message }, "invalid content selector");
      continue;
    }

    if (text.length >= options.minLength) {
      return { text, selector };
    }
  }

  return null;
}
