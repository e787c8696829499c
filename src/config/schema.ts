import { z } from "zod/v3";

const DEFAULT_CONTENT_SELECTORS = [
  "#text",
  ".story-body",
  ".article-content",
  ".post-content",
  ".entry-content",
  ".article-body",
  "article",
  ".content",
  ".main-content",
  '[role="main"]',
];

const sourceHintsSchema = z.object({
  fullText: z.boolean().default(false),
  contentSelectors: z.array(z.string().min(1)).optional(),
});

const sourceConfigSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  category: z.string().min(1),
  maxArticles: z.number().int().positive().default(10),
  enabled: z.boolean().default(true),
  hints: sourceHintsSchema.default({}),
});

const retryPolicySchema = z.object({
  maxAttempts: z.number().int().positive().default(3),
  baseDelayMs: z.number().int().nonnegative().default(1000),
  factor: z.number().min(1).default(2),
  maxDelayMs: z.number().int().nonnegative().default(10000),
});

export const appConfigSchema = z.object({
  llm: z.object({
    provider: z.enum(["anthropic", "openai", "gemini", "ollama", "lmstudio"]),
    model: z.string().min(1),
    baseUrl: z.string().url().optional(),
  }),
  sources: z
    .array(sourceConfigSchema)
    .min(1)
    .superRefine((sources, ctx) => {
      const seenUrls = new Set<string>();
      const seenNames = new Set<string>();
      sources.forEach((source, index) => {
        if (seenUrls.has(source.url)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [index, "url"],
            message: `duplicate source url ${source.url}`,
          });
        }
        if (seenNames.has(source.name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [index, "name"],
            message: `duplicate source name ${source.name}`,
          });
        }
        seenUrls.add(source.url);
        seenNames.add(source.name);
      });
    }),
  categories: z
    .object({
      priority: z.array(z.string().min(1)).default([]),
    })
    .default({}),
  fetch: z
    .object({
      timeoutMs: z.number().int().positive().default(15000),
      maxConcurrency: z.number().int().positive().default(4),
      userAgent: z.string().min(1).default("feed-digest/1.0 (RSS reader)"),
    })
    .default({}),
  extraction: z
    .object({
      enabled: z.boolean().default(false),
      maxConcurrency: z.number().int().positive().default(2),
      perDomainDelayMs: z.number().int().nonnegative().default(1000),
      timeoutMs: z.number().int().positive().default(15000),
      minLength: z.number().int().nonnegative().default(200),
      selectors: z.array(z.string().min(1)).default(DEFAULT_CONTENT_SELECTORS),
    })
    .default({}),
  summarizer: z
    .object({
      maxConcurrency: z.number().int().positive().default(3),
      maxInputLength: z.number().int().positive().default(2000),
      maxOutputTokens: z.number().int().positive().default(120),
      temperature: z.number().min(0).max(2).default(0.1),
      timeoutMs: z.number().int().positive().default(30000),
      fallbackLength: z.number().int().positive().default(280),
      retry: retryPolicySchema.default({}),
    })
    .default({}),
  cache: z
    .object({
      path: z.string().min(1).default("./data/summary-cache.json"),
      retentionDays: z.number().positive().default(7),
    })
    .default({}),
  run: z
    .object({
      timeoutMs: z.number().int().positive().default(300000),
    })
    .default({}),
  output: z
    .object({
      path: z.string().min(1).default("./data/digest.json"),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type RetryPolicy = z.infer<typeof retryPolicySchema>;
export type SummarizerConfig = AppConfig["summarizer"];
export type ExtractionConfig = AppConfig["extraction"];
export type LlmProvider = AppConfig["llm"]["provider"];
