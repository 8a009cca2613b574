import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import type { PipelineConfig } from "../config/pipelineConfig.js";
import { inRange, type ChapterSelection } from "../chapters/chapterSelection.js";
import { clipPath, partialPathFor, videoFileName } from "../artifacts/artifactPaths.js";
import {
  discardPartial,
  fileSize,
  finalizeArtifact,
  removeStalePartials,
  shouldSkip,
  videoRule,
} from "../artifacts/artifactValidity.js";
import type { MediaTool } from "../media/ffmpegTool.js";
import { AssemblyError, PreconditionError, errorMessage } from "../lib/errors.js";
import { pipelineLogHelpers } from "../lib/pipelineLog.js";
import { runPool } from "../lib/workerPool.js";
import { describeSegment, type VideoSegment } from "../segments/packSegments.js";
import { prepareCoverImage } from "./coverImage.js";
import {
  fingerprintClips,
  readSegmentManifest,
  sameClips,
  SEGMENT_MANIFEST_DIR,
  segmentManifestPath,
  writeSegmentManifest,
} from "./segmentManifest.js";

export type VideoSettings = Pick<PipelineConfig, "bookId" | "paths" | "thresholds" | "videoMaxWorkers">;

export type VideoOutcome =
  | { kind: "rendered"; segment: VideoSegment; path: string }
  | { kind: "skipped"; segment: VideoSegment; path: string }
  | { kind: "failed"; segment: VideoSegment; path: string; errorClass: "precondition" | "assembly"; reason: string };

export type VideoCounts = { requested: number; rendered: number; skipped: number; failed: number };

export type VideoReport = { outcomes: VideoOutcome[]; counts: VideoCounts };

export function segmentsForSelection(segments: VideoSegment[], selection: ChapterSelection): VideoSegment[] {
  const only = selection.only && selection.only.length > 0 ? new Set(selection.only) : null;
  return segments.filter((s) =>
    s.memberChapters.some((c) => inRange(c, selection) && (only === null || only.has(c)))
  );
}

async function assertClipsPresent(segment: VideoSegment, audioDir: string): Promise<string[]> {
  const paths = segment.memberChapters.map((c) => clipPath(audioDir, c));
  for (let i = 0; i < paths.length; i++) {
    const size = await fileSize(paths[i]);
    if (size === null || size === 0) {
      throw new PreconditionError(
        `segment ${segment.segmentId}`,
        `Clip for chapter ${segment.memberChapters[i]} is missing or empty: ${paths[i]}`
      );
    }
  }
  return paths;
}

/**
 * Render each segment into `videos/<id>_ch<first>-<last>.mp4`.
 *
 * Segments are independent, so up to `videoMaxWorkers` render at once. An
 * existing output is preserved when it passes the video rule and its recorded
 * clips (chapter, size, duration) still match the clips on disk, unless one
 * of its chapters is in `forceChapters`. The cover is normalized at most once per
 * run and shared by all workers. A failed segment is reported and the rest
 * carry on.
 */
export async function runVideoAssembly(params: {
  segments: VideoSegment[];
  settings: VideoSettings;
  media: MediaTool;
  forceChapters?: Set<number>;
}): Promise<VideoReport> {
  const { segments, settings, media } = params;
  const forceChapters = params.forceChapters ?? new Set<number>();
  const { videosDir, audioDir, coverImage, cacheDir } = settings.paths;
  const rule = videoRule(settings.thresholds);

  await mkdir(videosDir, { recursive: true });
  const stale = await removeStalePartials(videosDir);
  await removeStalePartials(join(cacheDir, SEGMENT_MANIFEST_DIR));
  if (stale.length > 0) {
    console.log(`[video] removed ${stale.length} partial file(s) from an interrupted run`);
  }

  let coverPromise: Promise<{ path: string; normalized: boolean }> | null = null;
  const cover = () => {
    if (!coverPromise) coverPromise = prepareCoverImage({ coverPath: coverImage, cacheDir, media });
    return coverPromise;
  };

  console.log(`[video] ${segments.length} segment(s), up to ${settings.videoMaxWorkers} worker(s)`);

  const results = await runPool(segments, settings.videoMaxWorkers, async (segment): Promise<VideoOutcome> => {
    const name = videoFileName(segment);
    const path = join(videosDir, name);
    const manifestPath = segmentManifestPath(cacheDir, name);
    const forced = segment.memberChapters.some((c) => forceChapters.has(c));

    const decision = await shouldSkip(rule, path, forced);
    if (decision.skip) {
      const recorded = await readSegmentManifest(manifestPath);
      const current = await fingerprintClips(segment.memberChapters, audioDir, media);
      if (recorded && current && sameClips(recorded.clips, current)) {
        pipelineLogHelpers.renderSkipped({ book_id: settings.bookId, segment_id: segment.segmentId, path });
        console.log(`[video] skipping ${name} (already exists)`);
        return { kind: "skipped", segment, path };
      }
      console.log(`[video] ${name} does not match its clips, re-rendering`);
    }

    const audioPaths = await assertClipsPresent(segment, audioDir);
    const clips = await fingerprintClips(segment.memberChapters, audioDir, media);
    const { path: imagePath } = await cover();

    pipelineLogHelpers.renderStarted({
      book_id: settings.bookId,
      segment_id: segment.segmentId,
      chapters: segment.memberChapters.length,
    });

    const partial = partialPathFor(path);
    try {
      await media.renderStillVideo({ imagePath, audioPaths, outputPath: partial });
      const check = await rule.check(partial);
      if (!check.valid) {
        throw new Error(`rendered file failed validation (${check.reason}${check.detail ? `: ${check.detail}` : ""})`);
      }
      await finalizeArtifact(partial, path);
      if (clips) await writeSegmentManifest(manifestPath, { video: name, clips });
    } catch (e) {
      await discardPartial(partial);
      throw new AssemblyError(segment.segmentId, `Render failed for ${name}: ${errorMessage(e)}`);
    }

    pipelineLogHelpers.renderSucceeded({
      book_id: settings.bookId,
      segment_id: segment.segmentId,
      duration_seconds: segment.totalDurationSeconds,
      path,
    });
    console.log(`[video] finished ${describeSegment(segment)}`);
    return { kind: "rendered", segment, path };
  });

  const outcomes: VideoOutcome[] = results.map((r) => {
    if (r.ok) return r.value;
    const errorClass = r.error instanceof PreconditionError ? "precondition" : "assembly";
    const reason = errorMessage(r.error);
    pipelineLogHelpers.renderFailed({
      book_id: settings.bookId,
      segment_id: r.item.segmentId,
      error_code: errorClass,
      error_message: reason,
    });
    console.error(`[video] failed ${describeSegment(r.item)}: ${reason}`);
    return { kind: "failed", segment: r.item, path: join(videosDir, videoFileName(r.item)), errorClass, reason };
  });

  const counts: VideoCounts = { requested: outcomes.length, rendered: 0, skipped: 0, failed: 0 };
  for (const o of outcomes) counts[o.kind]++;

  console.log(`[video] done: rendered=${counts.rendered} skipped=${counts.skipped} failed=${counts.failed}`);
  return { outcomes, counts };
}
