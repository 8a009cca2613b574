import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import type { PipelineConfig } from "../../config/pipelineConfig.js";
import type { VideoSegment } from "../../segments/packSegments.js";
import {
  FakeMediaTool,
  makeConfig,
  makeWorkdir,
  removeWorkdir,
  writeFakeClip,
  writeFakeImage,
} from "../../__testutils__/fakes.js";
import { runVideoAssembly, segmentsForSelection } from "../runVideoAssembly.js";

function segment(segmentId: number, memberChapters: number[]): VideoSegment {
  return { segmentId, memberChapters, totalDurationSeconds: memberChapters.length * 60, oversized: false };
}

describe("runVideoAssembly", () => {
  let workdir: string;
  let config: PipelineConfig;
  let media: FakeMediaTool;

  beforeEach(async () => {
    workdir = await makeWorkdir();
    config = makeConfig(workdir);
    media = new FakeMediaTool();
    await writeFakeImage(config.paths.coverImage, { width: 1600, height: 2400 });
    for (const n of [1, 2, 3, 4]) await writeFakeClip(join(config.paths.audioDir, `ch_${n}.mp3`), 60, 5000);
  });

  afterEach(async () => {
    await removeWorkdir(workdir);
  });

  it("renders each segment from its clips in chapter order", async () => {
    const report = await runVideoAssembly({
      segments: [segment(1, [1, 2, 3]), segment(2, [4])],
      settings: config,
      media,
    });

    expect(report.counts).toEqual({ requested: 2, rendered: 2, skipped: 0, failed: 0 });
    expect((await readdir(config.paths.videosDir)).sort()).toEqual(["001_ch1-3.mp4", "002_ch4-4.mp4"]);

    const first = media.renders.find((r) => r.outputPath.endsWith("001_ch1-3.partial.mp4"));
    expect(first?.imagePath).toBe(config.paths.coverImage);
    expect(first?.audioPaths).toEqual([1, 2, 3].map((n) => join(config.paths.audioDir, `ch_${n}.mp3`)));
  });

  it("skips segments whose video already exists", async () => {
    await runVideoAssembly({ segments: [segment(1, [1, 2])], settings: config, media });
    const before = await readFile(join(config.paths.videosDir, "001_ch1-2.mp4"));

    const again = new FakeMediaTool();
    const report = await runVideoAssembly({ segments: [segment(1, [1, 2]), segment(2, [3, 4])], settings: config, media: again });

    expect(report.outcomes.map((o) => o.kind)).toEqual(["skipped", "rendered"]);
    expect(again.renders).toHaveLength(1);
    expect(await readFile(join(config.paths.videosDir, "001_ch1-2.mp4"))).toEqual(before);
  });

  it("re-renders a video that is too small to be real", async () => {
    await mkdir(config.paths.videosDir, { recursive: true });
    await writeFile(join(config.paths.videosDir, "001_ch1-2.mp4"), "x");

    const report = await runVideoAssembly({ segments: [segment(1, [1, 2])], settings: config, media });
    expect(report.counts.rendered).toBe(1);
  });

  it("re-renders when a chapter joins a segment that keeps its name", async () => {
    await runVideoAssembly({ segments: [segment(1, [1, 3, 4])], settings: config, media });

    const again = new FakeMediaTool();
    const report = await runVideoAssembly({ segments: [segment(1, [1, 2, 3, 4])], settings: config, media: again });

    expect(report.outcomes.map((o) => o.kind)).toEqual(["rendered"]);
    expect(again.renders).toHaveLength(1);
    expect(again.renders[0].audioPaths).toEqual([1, 2, 3, 4].map((n) => join(config.paths.audioDir, `ch_${n}.mp3`)));
  });

  it("re-renders when a member clip was regenerated", async () => {
    await runVideoAssembly({ segments: [segment(1, [1, 2])], settings: config, media });
    await writeFakeClip(join(config.paths.audioDir, "ch_2.mp3"), 75, 5000);

    const report = await runVideoAssembly({ segments: [segment(1, [1, 2])], settings: config, media });

    expect(report.outcomes[0].kind).toBe("rendered");
    expect(media.renders).toHaveLength(2);
  });

  it("re-renders a video with no record of the clips it was made from", async () => {
    await mkdir(config.paths.videosDir, { recursive: true });
    await writeFile(join(config.paths.videosDir, "001_ch1-2.mp4"), "v".repeat(4096));

    const report = await runVideoAssembly({ segments: [segment(1, [1, 2])], settings: config, media });

    expect(report.outcomes[0].kind).toBe("rendered");
    const manifest = JSON.parse(await readFile(join(config.paths.cacheDir, "segments", "001_ch1-2.json"), "utf-8"));
    expect(manifest).toEqual({
      video: "001_ch1-2.mp4",
      clips: [
        { chapter: 1, sizeBytes: 5000, durationSeconds: 60 },
        { chapter: 2, sizeBytes: 5000, durationSeconds: 60 },
      ],
    });
  });

  it("re-renders a segment containing a forced chapter", async () => {
    await runVideoAssembly({ segments: [segment(1, [1, 2])], settings: config, media });
    const report = await runVideoAssembly({
      segments: [segment(1, [1, 2])],
      settings: config,
      media,
      forceChapters: new Set([2]),
    });
    expect(report.outcomes[0].kind).toBe("rendered");
    expect(media.renders).toHaveLength(2);
  });

  it("reports a failing segment and still renders the others", async () => {
    media.failRender = (out) => out.includes("002_");

    const report = await runVideoAssembly({
      segments: [segment(1, [1]), segment(2, [2]), segment(3, [3])],
      settings: config,
      media,
    });

    expect(report.counts).toEqual({ requested: 3, rendered: 2, skipped: 0, failed: 1 });
    const failed = report.outcomes[1];
    expect(failed.kind).toBe("failed");
    if (failed.kind !== "failed") return;
    expect(failed.errorClass).toBe("assembly");
    expect(failed.reason).toBe("Render failed for 002_ch2-2.mp4: ffmpeg exited with code 1");
    expect((await readdir(config.paths.videosDir)).sort()).toEqual(["001_ch1-1.mp4", "003_ch3-3.mp4"]);
  });

  it("fails a segment whose clip is missing without calling the media tool", async () => {
    const report = await runVideoAssembly({ segments: [segment(1, [4, 5])], settings: config, media });

    const outcome = report.outcomes[0];
    expect(outcome.kind).toBe("failed");
    if (outcome.kind !== "failed") return;
    expect(outcome.errorClass).toBe("precondition");
    expect(outcome.reason).toBe(
      `Clip for chapter 5 is missing or empty: ${join(config.paths.audioDir, "ch_5.mp3")}`
    );
    expect(media.renders).toHaveLength(0);
  });

  it("fails every segment when the cover image is missing", async () => {
    await writeFile(config.paths.coverImage, "");

    const report = await runVideoAssembly({ segments: [segment(1, [1]), segment(2, [2])], settings: config, media });
    expect(report.counts.failed).toBe(2);
    expect(report.outcomes.every((o) => o.kind === "failed" && o.errorClass === "precondition")).toBe(true);
  });

  it("clears partial files left by an interrupted render", async () => {
    await runVideoAssembly({ segments: [], settings: config, media });
    await writeFile(join(config.paths.videosDir, "001_ch1-1.partial.mp4"), "half");

    await runVideoAssembly({ segments: [segment(1, [1])], settings: config, media });
    expect(await readdir(config.paths.videosDir)).toEqual(["001_ch1-1.mp4"]);
  });
});

describe("segmentsForSelection", () => {
  const segments = [segment(1, [1, 2, 3]), segment(2, [4, 5]), segment(3, [6])];

  it("keeps segments touching the range", () => {
    expect(segmentsForSelection(segments, { start: 3, end: 4 }).map((s) => s.segmentId)).toEqual([1, 2]);
  });

  it("keeps segments containing an explicit chapter", () => {
    expect(segmentsForSelection(segments, { only: [6] }).map((s) => s.segmentId)).toEqual([3]);
  });

  it("keeps everything without a selection", () => {
    expect(segmentsForSelection(segments, {})).toHaveLength(3);
  });
});
