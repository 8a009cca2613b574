import { parseIndexList, type ChapterSelection } from "../chapters/chapterSelection.js";
import { ConfigError } from "./errors.js";

export type StageArgs = {
  selection: ChapterSelection;
  concurrency: number | null;
  flags: Set<string>;
};

function parseNonNegativeInt(name: string, raw: string | undefined): number {
  const n = raw === undefined ? NaN : Number(raw);
  if (!Number.isInteger(n) || n < 0) {
    throw new ConfigError(`--${name} must be a non-negative integer`);
  }
  return n;
}

/**
 * Shared argv grammar for the stage scripts:
 *   --start <n> --end <n>      inclusive chapter range
 *   --only <n,n,...>           explicit chapters (bypasses skip logic)
 *   --concurrency <n>          override the worker count
 * Any other `--flag` without a value is collected into `flags`.
 */
export function parseStageArgs(argv: string[]): StageArgs {
  const selection: ChapterSelection = {};
  let concurrency: number | null = null;
  const flags = new Set<string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--start") {
      selection.start = parseNonNegativeInt("start", argv[++i]);
    } else if (arg === "--end") {
      selection.end = parseNonNegativeInt("end", argv[++i]);
    } else if (arg === "--only") {
      const raw = argv[++i];
      if (!raw) throw new ConfigError("--only needs a comma-separated list of chapters");
      selection.only = parseIndexList(raw);
    } else if (arg === "--concurrency") {
      concurrency = parseNonNegativeInt("concurrency", argv[++i]);
      if (concurrency < 1) throw new ConfigError("--concurrency must be at least 1");
    } else if (arg.startsWith("--")) {
      flags.add(arg.slice(2));
    } else {
      throw new ConfigError(`Unexpected argument: ${arg}`);
    }
  }

  if (selection.start !== undefined && selection.end !== undefined && selection.start > selection.end) {
    throw new ConfigError(`--start ${selection.start} is after --end ${selection.end}`);
  }

  return { selection, concurrency, flags };
}
