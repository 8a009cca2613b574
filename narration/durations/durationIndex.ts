import { readFile, writeFile } from "node:fs/promises";
import { z } from "zod";
import { partialPathFor } from "../artifacts/artifactPaths.js";
import { finalizeArtifact } from "../artifacts/artifactValidity.js";
import { isErrnoException } from "../lib/commandRunner.js";
import { ConfigError } from "../lib/errors.js";

export const DURATION_INDEX_COLUMNS = [
  "chapter",
  "title",
  "duration_seconds",
  "size_bytes",
  "expected_seconds",
  "flag",
] as const;

export const DurationFlagSchema = z.enum(["ok", "suspect", "failed"]);
export type DurationFlag = z.infer<typeof DurationFlagSchema>;

export const DurationRecordSchema = z.object({
  chapter: z.coerce.number().int().nonnegative(),
  title: z.string(),
  durationSeconds: z.coerce.number().nonnegative(),
  sizeBytes: z.coerce.number().int().nonnegative(),
  expectedSeconds: z.coerce.number().nonnegative(),
  flag: DurationFlagSchema,
});

export type DurationRecord = z.infer<typeof DurationRecordSchema>;

function csvField(value: string): string {
  if (/[",\r\n]/.test(value)) return `"${value.replace(/"/g, '""')}"`;
  return value;
}

/** Split one CSV line, honouring double-quoted fields with "" escapes. */
export function parseCsvLine(line: string): string[] {
  const out: string[] = [];
  let field = "";
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') {
        field += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        field += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ",") {
      out.push(field);
      field = "";
    } else {
      field += ch;
    }
  }
  out.push(field);
  return out;
}

/**
 * Round a record to the precision the CSV stores, so records used straight
 * after measuring pack the same way as records read back from the index.
 */
export function atIndexPrecision(record: DurationRecord): DurationRecord {
  return {
    ...record,
    durationSeconds: Number(record.durationSeconds.toFixed(3)),
    expectedSeconds: Number(record.expectedSeconds.toFixed(1)),
  };
}

export function formatDurationIndex(records: DurationRecord[]): string {
  const sorted = [...records].sort((a, b) => a.chapter - b.chapter);
  const lines = [DURATION_INDEX_COLUMNS.join(",")];
  for (const r of sorted) {
    lines.push(
      [
        String(r.chapter),
        csvField(r.title.replace(/\r?\n/g, " ")),
        r.durationSeconds.toFixed(3),
        String(r.sizeBytes),
        r.expectedSeconds.toFixed(1),
        r.flag,
      ].join(",")
    );
  }
  return lines.join("\n") + "\n";
}

export function parseDurationIndex(text: string, source = "duration index"): DurationRecord[] {
  const lines = text.split(/\r?\n/).filter((l) => l.trim().length > 0);
  if (lines.length === 0) return [];

  const header = parseCsvLine(lines[0]);
  if (header.join(",") !== DURATION_INDEX_COLUMNS.join(",")) {
    throw new ConfigError(`${source}: unexpected header "${lines[0]}"`);
  }

  const records: DurationRecord[] = [];
  for (let i = 1; i < lines.length; i++) {
    const [chapter, title, durationSeconds, sizeBytes, expectedSeconds, flag] = parseCsvLine(lines[i]);
    const parsed = DurationRecordSchema.safeParse({ chapter, title, durationSeconds, sizeBytes, expectedSeconds, flag });
    if (!parsed.success) {
      const issues = parsed.error.issues.map((iss) => `${iss.path.join(".")}: ${iss.message}`).join("; ");
      throw new ConfigError(`${source} line ${i + 1}: ${issues}`);
    }
    records.push(parsed.data);
  }
  return records.sort((a, b) => a.chapter - b.chapter);
}

/** Missing file reads as an empty index. */
export async function readDurationIndex(path: string): Promise<DurationRecord[]> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (e) {
    if (isErrnoException(e) && e.code === "ENOENT") return [];
    throw e;
  }
  return parseDurationIndex(text, path);
}

export async function writeDurationIndex(path: string, records: DurationRecord[]): Promise<void> {
  const partial = partialPathFor(path);
  await writeFile(partial, formatDurationIndex(records), "utf-8");
  await finalizeArtifact(partial, path);
}
