import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import type { PipelineConfig } from "../config/pipelineConfig.js";
import { listChapters } from "../chapters/chapterStore.js";
import { selectChapters, type ChapterSelection } from "../chapters/chapterSelection.js";
import { fileSize } from "../artifacts/artifactValidity.js";
import type { SpeechSynthesizer } from "../audio/speech/types.js";
import { runSynthesisPool } from "../audio/worker/runSynthesisPool.js";
import type { SynthesisReport } from "../audio/worker/audioTypes.js";
import { analyzeDurations, type DurationAnalysis } from "../durations/analyzeDurations.js";
import { atIndexPrecision, readDurationIndex, type DurationRecord } from "../durations/durationIndex.js";
import { formatDurationReport } from "../durations/durationReport.js";
import type { MediaTool } from "../media/ffmpegTool.js";
import { NoChaptersError } from "../lib/errors.js";
import { describeSegment, packSegments, type PackResult } from "../segments/packSegments.js";
import { runVideoAssembly, segmentsForSelection, type VideoReport } from "../video/runVideoAssembly.js";
import type { Uploader } from "../publishing/types.js";
import { uploadVideos, type UploadOutcome } from "../publishing/uploadVideos.js";
import { RunSummaryCollector, type RunSummaryArtifact } from "./runSummaryCollector.js";

export type PipelineDeps = {
  synthesizer: SpeechSynthesizer;
  media: MediaTool;
  uploader: Uploader;
  sleep?: (ms: number) => Promise<void>;
};

export async function generateAudio(params: {
  config: PipelineConfig;
  deps: Pick<PipelineDeps, "synthesizer" | "media" | "sleep">;
  selection?: ChapterSelection;
  concurrency?: number;
}): Promise<SynthesisReport> {
  const { config, deps } = params;
  const all = await listChapters(config.paths.chaptersDir);
  if (all.length === 0) throw new NoChaptersError(config.paths.chaptersDir);

  await mkdir(config.paths.audioDir, { recursive: true });
  const selected = selectChapters(all, params.selection ?? {});
  console.log(`[synthesis] found ${all.length} chapter file(s), ${selected.chapters.length} selected`);

  return runSynthesisPool({
    chapters: selected.chapters,
    forced: selected.forced,
    missing: selected.missing,
    concurrency: params.concurrency ?? config.audioConcurrency,
    settings: { ...config, audioDir: config.paths.audioDir },
    deps,
  });
}

export async function measureDurations(params: {
  config: PipelineConfig;
  media: MediaTool;
  selection?: ChapterSelection;
}): Promise<DurationAnalysis> {
  const analysis = await analyzeDurations({ settings: params.config, media: params.media, selection: params.selection });
  for (const line of formatDurationReport(analysis.records, params.config.paths.durationIndex)) {
    console.log(`[durations] ${line}`);
  }
  return analysis;
}

/**
 * Pack the whole book from the duration index (building the index first if
 * it does not exist yet), then render the segments touching the selection.
 * Packing always covers every chapter so segment boundaries do not depend on
 * which range a run was asked for.
 */
export async function createVideos(params: {
  config: PipelineConfig;
  media: MediaTool;
  records?: DurationRecord[];
  selection?: ChapterSelection;
}): Promise<{ pack: PackResult; video: VideoReport }> {
  const { config, media } = params;
  let records = params.records ?? (await readDurationIndex(config.paths.durationIndex));
  if (records.length === 0) {
    console.log("[packer] no duration index yet, measuring clips first");
    records = (await analyzeDurations({ settings: config, media })).records;
  }

  const pack = packSegments(records.map(atIndexPrecision), config.targetVideoSeconds);
  console.log(
    `[packer] ${pack.segments.length} segment(s) at target ${config.book.targetVideoDurationMinutes} min`
  );
  for (const s of pack.segments) console.log(`[packer]   ${describeSegment(s)}`);
  if (pack.excluded.length > 0) {
    console.warn(`[packer] excluded chapters without usable audio: ${pack.excluded.join(", ")}`);
  }

  const selection = params.selection ?? {};
  const segments = segmentsForSelection(pack.segments, selection);
  const forceChapters = new Set(selection.only ?? []);
  const video = await runVideoAssembly({ segments, settings: config, media, forceChapters });
  return { pack, video };
}

export async function uploadStage(params: { config: PipelineConfig; uploader: Uploader }): Promise<UploadOutcome> {
  return uploadVideos({ settings: params.config, uploader: params.uploader });
}

/**
 * Chapter store -> synthesis -> durations -> packing -> video -> upload.
 *
 * Per-unit failures end up in the summary; only a missing chapter store
 * (or bad configuration, before this is called) stops the run.
 */
export async function runPipeline(params: {
  config: PipelineConfig;
  deps: PipelineDeps;
  selection?: ChapterSelection;
  summaryPath?: string;
}): Promise<{ summary: RunSummaryArtifact; ok: boolean }> {
  const { config, deps } = params;
  const collector = new RunSummaryCollector(config.bookId);
  const summaryPath = params.summaryPath ?? join(config.paths.workdir, "run_summary.json");

  console.log(`[pipeline] book ${config.bookId} (${config.book.name})`);
  const coverSize = await fileSize(config.paths.coverImage);
  if (!coverSize) {
    console.warn(`[pipeline] cover image not found at ${config.paths.coverImage}; video rendering will fail`);
  }

  let ok = true;
  try {
    console.log("[pipeline] step 1/4: generating audio");
    const synthesis = await generateAudio({ config, deps, selection: params.selection });
    collector.recordSynthesis(synthesis.counts, synthesis.outcomes);

    console.log("[pipeline] step 2/4: measuring durations");
    const durations = await measureDurations({ config, media: deps.media });
    collector.recordDurations(durations.counts, durations.totalSeconds);

    console.log("[pipeline] step 3/4: packing and rendering videos");
    const { pack, video } = await createVideos({
      config,
      media: deps.media,
      records: durations.records,
      selection: params.selection,
    });
    collector.recordPacking(pack);
    collector.recordVideo(video.counts, video.outcomes);

    console.log("[pipeline] step 4/4: upload");
    collector.recordUpload(await uploadStage({ config, uploader: deps.uploader }));
  } catch (e) {
    ok = false;
    collector.recordFatal(e);
    console.error(`[pipeline] fatal: ${e instanceof Error ? e.message : String(e)}`);
  }

  const summary = collector.finish();
  await collector.writeArtifact(summaryPath);

  console.log("[pipeline] summary");
  for (const line of collector.formatLines()) console.log(`[pipeline] ${line}`);

  return { summary, ok };
}
