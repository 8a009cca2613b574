import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import type { PipelineConfig } from "../../config/pipelineConfig.js";
import { LocalOnlyUploader } from "../../publishing/localOnlyUploader.js";
import {
  FakeMediaTool,
  FakeSynthesizer,
  makeConfig,
  makeWorkdir,
  removeWorkdir,
  writeChapters,
  writeFakeClip,
  writeFakeImage,
} from "../../__testutils__/fakes.js";
import { createVideos, runPipeline } from "../runPipeline.js";

describe("runPipeline", () => {
  let workdir: string;
  let config: PipelineConfig;

  beforeEach(async () => {
    workdir = await makeWorkdir();
    config = makeConfig(workdir, { NARRATION_ENABLE_UPLOAD: "true", NARRATION_UPLOADER: "local" });
    await writeFakeImage(config.paths.coverImage, { width: 1280, height: 720 });
  });

  afterEach(async () => {
    await removeWorkdir(workdir);
  });

  function deps(synthesizer: FakeSynthesizer) {
    return { synthesizer, media: new FakeMediaTool(), uploader: new LocalOnlyUploader() };
  }

  const failChapter3 = (chapter: number) => (chapter === 3 ? new Error("fetch failed") : undefined);

  it("runs every stage and isolates a failing chapter", async () => {
    await writeChapters(config.paths.chaptersDir, [1, 2, 3, 4]);

    const { summary, ok } = await runPipeline({ config, deps: deps(new FakeSynthesizer(failChapter3)) });

    expect(ok).toBe(true);
    expect(summary.fatal_error).toBeNull();
    expect(summary.synthesis).toEqual({
      requested: 4,
      generated: 3,
      suspect: 0,
      failed: 1,
      skipped: 0,
      failed_chapters: [3],
      suspect_chapters: [],
    });
    expect(summary.durations).toEqual({ ok: 3, suspect: 0, failed: 1, total_seconds: 180 });
    expect(summary.packing).toEqual({ segments: 1, oversized: 0, excluded_chapters: [3] });
    expect(summary.video).toEqual({ requested: 1, rendered: 1, skipped: 0, failed: 0, failed_segments: [] });
    expect(summary.upload).toEqual({
      kind: "uploaded",
      uploader: "local-only",
      destination: "local:Audiobooks/Test",
      files: 1,
    });

    expect(await readdir(config.paths.videosDir)).toEqual(["001_ch1-4.mp4"]);
    const written = JSON.parse(await readFile(join(workdir, "run_summary.json"), "utf-8"));
    expect(written.book_id).toBe("testbook");
    expect(written.video.rendered).toBe(1);
  });

  it("does no finished work again on a second run", async () => {
    await writeChapters(config.paths.chaptersDir, [1, 2, 3]);
    await runPipeline({ config, deps: deps(new FakeSynthesizer()) });

    const synthesizer = new FakeSynthesizer();
    const second = deps(synthesizer);
    const { summary } = await runPipeline({ config, deps: second });

    expect(synthesizer.calls).toHaveLength(0);
    expect(second.media.renders).toHaveLength(0);
    expect(summary.synthesis?.skipped).toBe(3);
    expect(summary.video?.skipped).toBe(1);
  });

  it("re-renders a video once a chapter that failed inside it is recovered", async () => {
    await writeChapters(config.paths.chaptersDir, [1, 2, 3, 4]);
    await runPipeline({ config, deps: deps(new FakeSynthesizer(failChapter3)) });

    const second = deps(new FakeSynthesizer());
    const { summary } = await runPipeline({ config, deps: second });

    expect(summary.packing).toEqual({ segments: 1, oversized: 0, excluded_chapters: [] });
    expect(summary.video?.rendered).toBe(1);
    expect(second.media.renders).toHaveLength(1);
    expect(second.media.renders[0].audioPaths).toEqual(
      [1, 2, 3, 4].map((n) => join(config.paths.audioDir, `ch_${n}.mp3`))
    );
    expect(await readdir(config.paths.videosDir)).toEqual(["001_ch1-4.mp4"]);
  });

  it("stops with a fatal error when there are no chapters", async () => {
    const { summary, ok } = await runPipeline({ config, deps: deps(new FakeSynthesizer()) });

    expect(ok).toBe(false);
    expect(summary.fatal_error).toBe(`No chapter files found in ${config.paths.chaptersDir}`);
    expect(summary.synthesis).toBeNull();
    expect(summary.video).toBeNull();
  });

  it("measures clips first when packing without an index", async () => {
    for (const n of [1, 2]) await writeFakeClip(join(config.paths.audioDir, `ch_${n}.mp3`), 3000, 5000);
    await writeFakeClip(join(config.paths.audioDir, "ch_3.mp3"), 5000, 5000);

    const media = new FakeMediaTool();
    const { pack, video } = await createVideos({ config, media });

    expect(pack.segments.map((s) => s.memberChapters)).toEqual([[1, 2], [3]]);
    expect(video.counts.rendered).toBe(2);
    expect((await readFile(config.paths.durationIndex, "utf-8")).split("\n")[1]).toBe(
      "1,Unknown Title,3000.000,5000,0.0,ok"
    );
  });

  it("packs measured durations at the precision of the index", async () => {
    const row = (chapter: number, durationSeconds: number) => ({
      chapter,
      title: `Chapter ${chapter}`,
      durationSeconds,
      sizeBytes: 5000,
      expectedSeconds: 60,
      flag: "ok" as const,
    });

    const { pack } = await createVideos({
      config,
      media: new FakeMediaTool(),
      records: [row(1, 3600.0004), row(2, 3600)],
    });

    expect(pack.segments.map((s) => s.memberChapters)).toEqual([[1, 2]]);
    expect(pack.segments[0].totalDurationSeconds).toBe(7200);
  });

  it("renders only the segments touching a selection", async () => {
    for (const n of [1, 2, 3]) await writeFakeClip(join(config.paths.audioDir, `ch_${n}.mp3`), 3000, 5000);

    const media = new FakeMediaTool();
    const { pack, video } = await createVideos({ config, media, selection: { start: 3 } });

    expect(pack.segments).toHaveLength(2);
    expect(video.outcomes.map((o) => o.segment.segmentId)).toEqual([2]);
    expect(await readdir(config.paths.videosDir)).toEqual(["002_ch3-3.mp4"]);
  });
});
