// pattern: Imperative Shell
import type { Logger } from "pino";
import { writeFileAtomic } from "../utils/atomic";
import { errorMessage } from "../errors";
import type { Digest } from "./builder";

/**
 * Discriminated union result type for digest hand-off.
 */
export type WriteResult =
  | { readonly success: true; readonly path: string }
  | { readonly success: false; readonly error: string };

/**
 * Hands a digest to whatever renders and publishes it.
 * Never throws; failures come back in the result.
 */
export type WriteDigestFn = (digest: Digest, logger: Logger) => Promise<WriteResult>;

/**
 * Writes the digest as pretty-printed JSON, replacing the previous file
 * atomically so the renderer never reads a partial document.
 */
export function createFileDigestWriter(path: string): WriteDigestFn {
  return async function writeDigest(digest, logger) {
    try {
      await writeFileAtomic(path, `${JSON.stringify(digest, null, 2)}\n`);
      logger.info(
        { path, articleCount: digest.totalArticleCount, categoryCount: digest.categories.length },
        "digest written",
      );
      return { success: true, path };
    } catch (err) {
      const message = errorMessage(err);
      logger.error({ path, error: message }, "digest write failed");
      return { success: false, error: message };
    }
  };
}
