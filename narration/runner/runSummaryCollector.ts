import { promises as fs } from "fs";
import { dirname } from "path";
import type { SynthesisCounts, SynthesisOutcome } from "../audio/worker/audioTypes.js";
import type { DurationCounts } from "../durations/analyzeDurations.js";
import type { PackResult } from "../segments/packSegments.js";
import type { VideoCounts, VideoOutcome } from "../video/runVideoAssembly.js";
import type { UploadOutcome } from "../publishing/uploadVideos.js";

export interface RunSummaryArtifact {
  book_id: string;
  started_at: string;
  finished_at: string | null;
  fatal_error: string | null;
  synthesis: (SynthesisCounts & { failed_chapters: number[]; suspect_chapters: number[] }) | null;
  durations: (DurationCounts & { total_seconds: number }) | null;
  packing: { segments: number; oversized: number; excluded_chapters: number[] } | null;
  video: (VideoCounts & { failed_segments: number[] }) | null;
  upload: UploadOutcome | null;
}

/**
 * Collects per-stage counts for the end-of-run summary. Stages that did not
 * run stay null.
 */
export class RunSummaryCollector {
  private artifact: RunSummaryArtifact;

  constructor(bookId: string, startedAt: Date = new Date()) {
    this.artifact = {
      book_id: bookId,
      started_at: startedAt.toISOString(),
      finished_at: null,
      fatal_error: null,
      synthesis: null,
      durations: null,
      packing: null,
      video: null,
      upload: null,
    };
  }

  recordSynthesis(counts: SynthesisCounts, outcomes: SynthesisOutcome[]): void {
    this.artifact.synthesis = {
      ...counts,
      failed_chapters: outcomes.filter((o) => o.kind === "failed").map((o) => o.chapter),
      suspect_chapters: outcomes.filter((o) => o.kind === "suspect").map((o) => o.chapter),
    };
  }

  recordDurations(counts: DurationCounts, totalSeconds: number): void {
    this.artifact.durations = { ...counts, total_seconds: totalSeconds };
  }

  recordPacking(pack: PackResult): void {
    this.artifact.packing = {
      segments: pack.segments.length,
      oversized: pack.segments.filter((s) => s.oversized).length,
      excluded_chapters: [...pack.excluded],
    };
  }

  recordVideo(counts: VideoCounts, outcomes: VideoOutcome[]): void {
    this.artifact.video = {
      ...counts,
      failed_segments: outcomes.filter((o) => o.kind === "failed").map((o) => o.segment.segmentId),
    };
  }

  recordUpload(outcome: UploadOutcome): void {
    this.artifact.upload = outcome;
  }

  recordFatal(error: unknown): void {
    this.artifact.fatal_error = error instanceof Error ? error.message : String(error);
  }

  finish(finishedAt: Date = new Date()): RunSummaryArtifact {
    this.artifact.finished_at = finishedAt.toISOString();
    return this.toArtifact();
  }

  toArtifact(): RunSummaryArtifact {
    return structuredClone(this.artifact);
  }

  formatLines(): string[] {
    const a = this.artifact;
    const lines: string[] = [`Book: ${a.book_id}`];

    if (a.synthesis) {
      const s = a.synthesis;
      lines.push(
        `  Audio:     generated=${s.generated} suspect=${s.suspect} failed=${s.failed} skipped=${s.skipped}`
      );
      if (s.failed_chapters.length > 0) lines.push(`             failed chapters: ${s.failed_chapters.join(", ")}`);
      if (s.suspect_chapters.length > 0) lines.push(`             suspect chapters: ${s.suspect_chapters.join(", ")}`);
    }
    if (a.durations) {
      const d = a.durations;
      const minutes = Math.floor(d.total_seconds / 60);
      lines.push(`  Durations: ok=${d.ok} suspect=${d.suspect} failed=${d.failed} total=${minutes} min`);
    }
    if (a.packing) {
      const p = a.packing;
      lines.push(`  Segments:  ${p.segments} (oversized=${p.oversized}, excluded chapters=${p.excluded_chapters.length})`);
    }
    if (a.video) {
      const v = a.video;
      lines.push(`  Videos:    rendered=${v.rendered} skipped=${v.skipped} failed=${v.failed}`);
      if (v.failed_segments.length > 0) lines.push(`             failed segments: ${v.failed_segments.join(", ")}`);
    }
    if (a.upload) {
      const u = a.upload;
      const text =
        u.kind === "disabled"
          ? "disabled"
          : u.kind === "uploaded"
          ? `uploaded ${u.files} file(s) to ${u.destination}`
          : `failed (${u.reason})`;
      lines.push(`  Upload:    ${text}`);
    }
    if (a.fatal_error) lines.push(`  FATAL:     ${a.fatal_error}`);

    return lines;
  }

  async writeArtifact(outputPath: string): Promise<void> {
    const json = JSON.stringify(this.toArtifact(), null, 2);
    await fs.mkdir(dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, json, "utf-8");
  }
}
