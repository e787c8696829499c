export type CliOptions = {
  /** Restrict the run to these source names; empty means all. */
  readonly sources: ReadonlyArray<string>;
  readonly outputPath: string | null;
  readonly noCache: boolean;
};

function valueOf(arg: string, flag: string): string | null {
  const prefix = `${flag}=`;
  return arg.startsWith(prefix) ? arg.slice(prefix.length) : null;
}

/**
 * Parses `--sources=a,b`, `--output=path` and `--no-cache`. Throws on
 * anything else.
 */
export function parseCliArgs(argv: ReadonlyArray<string>): CliOptions {
  let sources: Array<string> = [];
  let outputPath: string | null = null;
  let noCache = false;

  for (const arg of argv) {
    if (arg === "--no-cache") {
      noCache = true;
      continue;
    }

    const sourceList = valueOf(arg, "--sources");
    if (sourceList !== null) {
      sources = sourceList
        .split(",")
        .map((name) => name.trim())
        .filter((name) => name.length > 0);
      continue;
    }

    const output = valueOf(arg, "--output");
    if (output !== null) {
      if (!output) throw new Error("--output requires a path");
      outputPath = output;
      continue;
    }

    throw new Error(`unknown argument: ${arg}`);
  }

  return { sources, outputPath, noCache };
}
