import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { PreconditionError } from "../lib/errors.js";

export type ChapterRef = {
  index: number;
  sourcePath: string;
};

export type Chapter = ChapterRef & {
  text: string;
};

const CHAPTER_FILE = /^ch_(\d+)\.txt$/;

export function parseChapterFileName(name: string): number | null {
  const m = name.match(CHAPTER_FILE);
  if (!m) return null;
  return Number.parseInt(m[1], 10);
}

/**
 * List chapter files (`ch_7.txt`, `ch_0007.txt`) in ascending index order.
 * Gaps in the numbering are normal. A missing directory reads as empty.
 */
export async function listChapters(chaptersDir: string): Promise<ChapterRef[]> {
  let names: string[];
  try {
    names = await readdir(chaptersDir);
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return [];
    throw e;
  }

  const byIndex = new Map<number, ChapterRef>();
  for (const name of [...names].sort()) {
    const index = parseChapterFileName(name);
    if (index === null) continue;
    // ch_7.txt and ch_007.txt both claim 7; keep the first seen in name order
    if (!byIndex.has(index)) {
      byIndex.set(index, { index, sourcePath: join(chaptersDir, name) });
    }
  }

  return [...byIndex.values()].sort((a, b) => a.index - b.index);
}

export async function readChapter(ref: ChapterRef): Promise<Chapter> {
  try {
    const text = await readFile(ref.sourcePath, "utf-8");
    return { ...ref, text };
  } catch (e) {
    throw new PreconditionError(
      `chapter ${ref.index}`,
      `Cannot read chapter source ${ref.sourcePath}: ${e instanceof Error ? e.message : String(e)}`
    );
  }
}

export function chapterTitle(text: string): string {
  const first = text.split(/\r?\n/).find((line) => line.trim().length > 0);
  return first ? first.trim() : "Unknown Title";
}

export function countWords(text: string): number {
  return text.trim().split(/\s+/).filter((w) => w.length > 0).length;
}
