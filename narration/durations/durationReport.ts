import type { DurationRecord } from "./durationIndex.js";

export function formatClock(totalSeconds: number): string {
  const s = Math.floor(totalSeconds);
  const minutes = Math.floor(s / 60);
  const seconds = s % 60;
  return `${minutes}:${String(seconds).padStart(2, "0")}`;
}

export function formatMegabytes(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}

export function suspectChapters(records: DurationRecord[]): number[] {
  return records.filter((r) => r.flag === "suspect").map((r) => r.chapter);
}

export function failedChapters(records: DurationRecord[]): number[] {
  return records.filter((r) => r.flag === "failed").map((r) => r.chapter);
}

/** One line per chapter, e.g. `! ch_12: Title - 0:41 (0.35 MB) [suspect]`. */
export function formatRecordLine(r: DurationRecord): string {
  const marker = r.flag === "ok" ? " " : "!";
  const tag = r.flag === "ok" ? "" : ` [${r.flag}]`;
  return `${marker} ch_${r.chapter}: ${r.title} - ${formatClock(r.durationSeconds)} (${formatMegabytes(r.sizeBytes)})${tag}`;
}

export function formatDurationReport(records: DurationRecord[], indexPath: string): string[] {
  const lines = records.map(formatRecordLine);
  const totalSeconds = records.reduce((sum, r) => sum + r.durationSeconds, 0);
  const totalMinutes = Math.floor(totalSeconds / 60);

  lines.push("");
  lines.push(`Index written: ${indexPath}`);
  lines.push(`Total audio length: ${totalMinutes} minutes (${(totalMinutes / 60).toFixed(2)} hours)`);

  const suspects = suspectChapters(records);
  if (suspects.length > 0) {
    lines.push("");
    lines.push(`Found ${suspects.length} suspect chapter(s). Regenerate them with:`);
    lines.push(`  npm run regen-audio -- --only ${suspects.join(",")}`);
  }

  const failed = failedChapters(records);
  if (failed.length > 0) {
    lines.push("");
    lines.push(`Chapters without usable audio (excluded from videos): ${failed.join(", ")}`);
  }

  return lines;
}

/** Body for chapters_to_regenerate.txt. */
export function formatRegenerateList(chapters: number[]): string {
  return chapters.length === 0 ? "" : chapters.join("\n") + "\n";
}
