import pino from "pino";

/**
 * Creates the process logger: JSON lines on stdout, string level labels,
 * ISO 8601 timestamps.
 *
 * Level resolution: explicit argument, then `LOG_LEVEL`, then `info`.
 */
export function createLogger(
  level?: string,
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    name: "feed-digest",
    level: level ?? process.env["LOG_LEVEL"] ?? "info",
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return destination ? pino(options, destination) : pino(options);
}

/**
 * Child logger bound to a single pipeline run.
 */
export function createRunLogger(logger: pino.Logger, runId: string): pino.Logger {
  return logger.child({ runId });
}
