import { readFileSync } from "node:fs";
import { parse } from "yaml";
import { appConfigSchema } from "./schema";
import type {
  AppConfig,
  ExtractionConfig,
  LlmProvider,
  RetryPolicy,
  SummarizerConfig,
} from "./schema";

/**
 * Reads, parses and validates the YAML configuration file.
 * Throws with a readable list of issues when validation fails.
 */
export function loadConfig(configPath: string): AppConfig {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to read config file at ${configPath}: ${message}`);
  }

  return parseConfig(raw, configPath);
}

export function parseConfig(raw: string, origin = "<inline>"): AppConfig {
  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to parse YAML in ${origin}: ${message}`);
  }

  const result = appConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`invalid configuration in ${origin}:\n${issues}`);
  }

  return result.data;
}

export type {
  AppConfig,
  ExtractionConfig,
  LlmProvider,
  RetryPolicy,
  SummarizerConfig,
};
