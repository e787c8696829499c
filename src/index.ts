import { randomUUID } from "node:crypto";
import { resolve } from "node:path";
import { createLogger, createRunLogger } from "./logger";
import { loadConfig } from "./config";
import type { AppConfig } from "./config";
import { parseCliArgs } from "./cli";
import type { CliOptions } from "./cli";
import { loadSourceRegistry } from "./sources/registry";
import { loadSummaryCache } from "./cache/store";
import { createLlmClient } from "./llm/client";
import { createLlmSummarizer, createUnavailableSummarizer } from "./summarizer/summarizer";
import type { Summarizer } from "./summarizer/summarizer";
import { createFileDigestWriter } from "./digest/writer";
import { registerShutdownHandlers } from "./lifecycle";
import { runPipeline } from "./runner";

const CONFIG_PATH = process.env["CONFIG_PATH"] ?? "./config.yaml";

async function main(): Promise<number> {
  const logger = createRunLogger(createLogger(), randomUUID());

  logger.info("feed-digest starting");

  let config: AppConfig;
  let cli: CliOptions;
  try {
    cli = parseCliArgs(process.argv.slice(2));
    config = loadConfig(resolve(CONFIG_PATH));
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    return 1;
  }

  logger.info(
    { provider: config.llm.provider, model: config.llm.model },
    "config loaded",
  );

  const sources = loadSourceRegistry(config, logger, cli.sources);

  const cache = await loadSummaryCache(
    {
      path: cli.noCache ? null : resolve(config.cache.path),
      retentionDays: config.cache.retentionDays,
    },
    logger,
  );

  let summarizer: Summarizer;
  try {
    summarizer = createLlmSummarizer(createLlmClient(config), config.summarizer, logger);
    logger.info(
      { provider: config.llm.provider, model: config.llm.model },
      "llm client initialised",
    );
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn({ error: message }, "llm client init failed, using fallback summaries");
    summarizer = createUnavailableSummarizer(message);
  }

  const controller = new AbortController();
  const unregister = registerShutdownHandlers({
    stoppables: [{ stop: (reason) => controller.abort(new Error(reason)) }],
    logger,
  });

  try {
    const report = await runPipeline({
      sources,
      cache,
      summarizer,
      config,
      logger,
      signal: controller.signal,
    });

    if (!report.digest) {
      return 1;
    }

    const writeDigest = createFileDigestWriter(
      resolve(cli.outputPath ?? config.output.path),
    );
    const written = await writeDigest(report.digest, logger);

    return report.status === "success" && written.success ? 0 : 1;
  } finally {
    unregister();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error("fatal error:", err);
    process.exitCode = 1;
  },
);
