import type { Logger } from "pino";
import type { AppConfig } from "../config";

export type SourceHints = Readonly<{
  fullText: boolean;
  contentSelectors: ReadonlyArray<string>;
}>;

/**
 * A feed endpoint tagged with its category. Identity is the url.
 */
export type Source = Readonly<{
  name: string;
  url: string;
  category: string;
  maxArticles: number;
  hints: SourceHints;
}>;

/**
 * Builds the immutable source list for this process from configuration.
 *
 * Disabled sources are skipped. When `only` is given, the list is narrowed
 * to those source names; names that match nothing are logged and ignored.
 * Registry order is configuration order and is what dedup uses to pick
 * winners.
 */
export function loadSourceRegistry(
  config: AppConfig,
  logger: Logger,
  only?: ReadonlyArray<string>,
): ReadonlyArray<Source> {
  const enabled = config.sources.filter((source) => source.enabled);

  if (only && only.length > 0) {
    const known = new Set(enabled.map((source) => source.name));
    const unknown = only.filter((name) => !known.has(name));
    if (unknown.length > 0) {
      logger.warn({ unknown }, "requested sources not found or disabled");
    }
  }

  const selected =
    only && only.length > 0
      ? enabled.filter((source) => only.includes(source.name))
      : enabled;

  const registry = selected.map((source) =>
    Object.freeze({
      name: source.name,
      url: source.url,
      category: source.category,
      maxArticles: source.maxArticles,
      hints: Object.freeze({
        fullText: source.hints.fullText,
        contentSelectors: Object.freeze([...(source.hints.contentSelectors ?? [])]),
      }),
    }),
  );

  logger.info(
    {
      sourceCount: registry.length,
      disabledCount: config.sources.length - enabled.length,
    },
    "source registry loaded",
  );

  return Object.freeze(registry);
}
