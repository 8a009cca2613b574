import { readFile } from "node:fs/promises";
import { ConfigError } from "../lib/errors.js";
import type { ChapterRef } from "./chapterStore.js";

export type ChapterSelection = {
  start?: number;
  end?: number;
  /** Explicit indices; these bypass the skip-if-valid check. */
  only?: number[];
};

export type MissingChapter = { chapter: number; reason: string };

export type SelectedChapters = {
  chapters: ChapterRef[];
  /** Explicitly requested indices that have no source file. */
  missing: MissingChapter[];
  /** Indices whose existing output must be ignored. */
  forced: Set<number>;
};

export function inRange(index: number, selection: ChapterSelection): boolean {
  if (selection.start !== undefined && index < selection.start) return false;
  if (selection.end !== undefined && index > selection.end) return false;
  return true;
}

export function selectChapters(all: ChapterRef[], selection: ChapterSelection): SelectedChapters {
  if (selection.only && selection.only.length > 0) {
    const byIndex = new Map(all.map((c) => [c.index, c]));
    const wanted = [...new Set(selection.only)].sort((a, b) => a - b);
    const chapters: ChapterRef[] = [];
    const missing: MissingChapter[] = [];

    for (const index of wanted) {
      if (!inRange(index, selection)) continue;
      const ref = byIndex.get(index);
      if (ref) {
        chapters.push(ref);
      } else {
        missing.push({ chapter: index, reason: `Chapter ${index} has no source file` });
      }
    }
    return { chapters, missing, forced: new Set(chapters.map((c) => c.index)) };
  }

  return {
    chapters: all.filter((c) => inRange(c.index, selection)),
    missing: [],
    forced: new Set(),
  };
}

/**
 * One chapter index per line. Blank lines and `#` comments are ignored.
 */
export function parseRegenerateList(text: string, source = "regenerate list"): number[] {
  const out: number[] = [];
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].replace(/#.*$/, "").trim();
    if (!line) continue;
    if (!/^\d+$/.test(line)) {
      throw new ConfigError(`${source} line ${i + 1}: "${line}" is not a chapter number`);
    }
    out.push(Number.parseInt(line, 10));
  }
  return out;
}

export async function readRegenerateList(path: string): Promise<number[]> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (e) {
    throw new ConfigError(`Cannot read ${path}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseRegenerateList(text, path);
}

export function parseIndexList(raw: string): number[] {
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .map((s) => {
      if (!/^\d+$/.test(s)) throw new ConfigError(`"${s}" is not a chapter number`);
      return Number.parseInt(s, 10);
    });
}
