export type PipelineErrorKind =
  | "FetchError"
  | "ParseError"
  | "SummarizationError"
  | "CacheIOError";

/**
 * Base class for the failures the pipeline distinguishes. `kind` is what
 * gets logged and reported; `cause` keeps the underlying error.
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network failure, timeout or non-2xx response while retrieving a feed. */
export class FetchError extends PipelineError {
  override readonly kind = "FetchError";

  constructor(
    readonly url: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Feed body that is not valid RSS or Atom. */
export class ParseError extends PipelineError {
  override readonly kind = "ParseError";

  constructor(
    readonly url: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Summarization gave up after the retry policy was exhausted. */
export class SummarizationError extends PipelineError {
  override readonly kind = "SummarizationError";

  constructor(
    readonly fingerprint: string,
    readonly attempts: number,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Reading or writing the summary cache file failed. */
export class CacheIOError extends PipelineError {
  override readonly kind = "CacheIOError";

  constructor(
    readonly path: string,
    readonly operation: "load" | "flush",
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
