import { readdir } from "node:fs/promises";
import type { PipelineConfig } from "../config/pipelineConfig.js";
import { chapterTitle, countWords, listChapters, readChapter, type ChapterRef } from "../chapters/chapterStore.js";
import { inRange, type ChapterSelection } from "../chapters/chapterSelection.js";
import { clipPath, parseClipFileName } from "../artifacts/artifactPaths.js";
import { clipRule, fileSize } from "../artifacts/artifactValidity.js";
import type { MediaTool } from "../media/ffmpegTool.js";
import { isErrnoException } from "../lib/commandRunner.js";
import { runPool } from "../lib/workerPool.js";
import { estimateSpeechSeconds, qaClip } from "../audio/worker/audioQa.js";
import { atIndexPrecision, readDurationIndex, writeDurationIndex, type DurationRecord } from "./durationIndex.js";

export type DurationSettings = Pick<PipelineConfig, "paths" | "thresholds" | "rateMultiplier">;

export type DurationCounts = { ok: number; suspect: number; failed: number };

export type DurationAnalysis = {
  records: DurationRecord[];
  /** Chapters (re)measured in this pass. */
  analyzed: number[];
  counts: DurationCounts;
  totalSeconds: number;
};

const PROBE_CONCURRENCY = 4;

async function listClipIndices(audioDir: string): Promise<number[]> {
  let names: string[];
  try {
    names = await readdir(audioDir);
  } catch (e) {
    if (isErrnoException(e) && e.code === "ENOENT") return [];
    throw e;
  }
  return names.map(parseClipFileName).filter((n): n is number => n !== null);
}

/**
 * Measure one chapter. The clip rule decides `failed` (no usable clip);
 * a usable clip is `suspect` when it fails the text-length or size checks.
 */
export async function analyzeChapter(params: {
  index: number;
  source: ChapterRef | undefined;
  settings: DurationSettings;
  media: MediaTool;
}): Promise<DurationRecord> {
  const { index, source, settings, media } = params;

  let title = "Unknown Title";
  let wordCount = 0;
  if (source) {
    const chapter = await readChapter(source);
    title = chapterTitle(chapter.text);
    wordCount = countWords(chapter.text);
  }

  const expectedSeconds = estimateSpeechSeconds({
    wordCount,
    wordsPerMinute: settings.thresholds.wordsPerMinute,
    rateMultiplier: settings.rateMultiplier,
  });

  const path = clipPath(settings.paths.audioDir, index);
  const check = await clipRule(media, settings.thresholds).check(path);
  if (!check.valid) {
    return {
      chapter: index,
      title,
      durationSeconds: 0,
      sizeBytes: (await fileSize(path)) ?? 0,
      expectedSeconds,
      flag: "failed",
    };
  }

  const durationSeconds = check.durationSeconds ?? 0;
  const qa = qaClip({
    chapter: index,
    durationSeconds,
    sizeBytes: check.sizeBytes,
    wordCount,
    rateMultiplier: settings.rateMultiplier,
    thresholds: settings.thresholds,
  });

  return {
    chapter: index,
    title,
    durationSeconds,
    sizeBytes: check.sizeBytes,
    expectedSeconds,
    flag: qa.ok ? "ok" : "suspect",
  };
}

export function summarizeRecords(records: DurationRecord[]): { counts: DurationCounts; totalSeconds: number } {
  const counts: DurationCounts = { ok: 0, suspect: 0, failed: 0 };
  let totalSeconds = 0;
  for (const r of records) {
    counts[r.flag]++;
    totalSeconds += r.durationSeconds;
  }
  return { counts, totalSeconds };
}

/**
 * Rebuild (or, with a selection, update) the duration index.
 *
 * Covers every chapter in the store plus any stray clip in the audio
 * directory. Chapters in the store without a usable clip get a `failed` row
 * so the gap is visible downstream instead of disappearing. With a
 * selection, rows outside it are carried over from the existing index.
 * Re-running on unchanged inputs writes the same table.
 */
export async function analyzeDurations(params: {
  settings: DurationSettings;
  media: MediaTool;
  selection?: ChapterSelection;
}): Promise<DurationAnalysis> {
  const { settings, media } = params;
  const selection = params.selection ?? {};
  const partial = selection.start !== undefined || selection.end !== undefined || (selection.only?.length ?? 0) > 0;

  const chapters = await listChapters(settings.paths.chaptersDir);
  const byIndex = new Map(chapters.map((c) => [c.index, c]));
  const clipIndices = await listClipIndices(settings.paths.audioDir);

  const all = [...new Set([...chapters.map((c) => c.index), ...clipIndices])].sort((a, b) => a - b);
  const only = selection.only && selection.only.length > 0 ? new Set(selection.only) : null;
  const targets = all.filter((i) => inRange(i, selection) && (only === null || only.has(i)));

  console.log(`[durations] analyzing ${targets.length} chapter(s)...`);

  const results = await runPool(targets, PROBE_CONCURRENCY, (index) =>
    analyzeChapter({ index, source: byIndex.get(index), settings, media })
  );

  const fresh = new Map<number, DurationRecord>();
  for (const r of results) {
    if (r.ok) {
      fresh.set(r.item, r.value);
    } else {
      console.error(`[durations] chapter ${r.item}: ${r.error instanceof Error ? r.error.message : String(r.error)}`);
      fresh.set(r.item, {
        chapter: r.item,
        title: "Unknown Title",
        durationSeconds: 0,
        sizeBytes: 0,
        expectedSeconds: 0,
        flag: "failed",
      });
    }
  }

  const merged = new Map<number, DurationRecord>();
  if (partial) {
    for (const r of await readDurationIndex(settings.paths.durationIndex)) merged.set(r.chapter, r);
  }
  for (const [index, record] of fresh) merged.set(index, atIndexPrecision(record));

  const records = [...merged.values()].sort((a, b) => a.chapter - b.chapter);
  await writeDurationIndex(settings.paths.durationIndex, records);

  const { counts, totalSeconds } = summarizeRecords(records);
  return { records, analyzed: targets, counts, totalSeconds };
}
