// pattern: Imperative Shell
import type { Logger } from "pino";

/**
 * Something the shutdown handler can ask to wind down.
 */
export type Stoppable = {
  readonly stop: (reason: string) => void;
};

/**
 * Dependencies for the shutdown handler.
 */
export type ShutdownDeps = {
  readonly stoppables: ReadonlyArray<Stoppable>;
  readonly logger: Logger;
};

const FORCED_EXIT_CODE = 130;

/**
 * Registers SIGTERM and SIGINT handlers.
 *
 * The first signal stops every stoppable (the run aborts outstanding network
 * work, then still assembles its digest and flushes the cache). A second
 * signal exits immediately. Returns a function that removes the handlers.
 */
export function registerShutdownHandlers(deps: ShutdownDeps): () => void {
  let stopping = false;

  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) {
      deps.logger.warn({ signal }, "second shutdown signal, exiting immediately");
      process.exit(FORCED_EXIT_CODE);
    }
    stopping = true;

    deps.logger.info({ signal }, "shutdown signal received, finishing with completed work");

    for (const stoppable of deps.stoppables) {
      try {
        stoppable.stop(`received ${signal}`);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        deps.logger.error({ error: message }, "error while stopping");
      }
    }
  };

  const onSigterm = () => shutdown("SIGTERM");
  const onSigint = () => shutdown("SIGINT");
  process.on("SIGTERM", onSigterm);
  process.on("SIGINT", onSigint);

  return () => {
    process.off("SIGTERM", onSigterm);
    process.off("SIGINT", onSigint);
  };
}
