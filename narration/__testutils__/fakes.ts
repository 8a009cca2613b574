import { mkdtemp, mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { loadPipelineConfig, type BookCatalog, type PipelineConfig } from "../config/pipelineConfig.js";
import type { ImageSize, MediaTool } from "../media/ffmpegTool.js";
import type { SpeechSynthesizer, SynthesisRequest } from "../audio/speech/types.js";

// Fake media files are plain text with a header the fake probe understands,
// padded with spaces to the requested byte size.

export async function writeFakeClip(path: string, seconds: number, bytes = 4096): Promise<void> {
  const header = `FAKEAUDIO duration=${seconds}\n`;
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, header.padEnd(Math.max(bytes, header.length), " "));
}

export async function writeFakeImage(path: string, size: ImageSize): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `FAKEIMAGE size=${size.width}x${size.height}\n`);
}

export class FakeMediaTool implements MediaTool {
  renders: Array<{ imagePath: string; audioPaths: string[]; outputPath: string }> = [];
  crops: Array<{ inputPath: string; outputPath: string; width: number; height: number }> = [];
  probes: string[] = [];
  videoBytes = 4096;
  /** Render calls for output paths matching this fail. */
  failRender: ((outputPath: string) => boolean) | null = null;

  async probeDurationSeconds(path: string): Promise<number> {
    this.probes.push(path);
    const m = (await readFile(path, "utf-8")).match(/^FAKEAUDIO duration=([\d.]+)/);
    if (!m) throw new Error(`invalid data found when processing input ${path}`);
    return Number(m[1]);
  }

  async probeImageSize(path: string): Promise<ImageSize> {
    const m = (await readFile(path, "utf-8")).match(/^FAKEIMAGE size=(\d+)x(\d+)/);
    if (!m) throw new Error(`not an image: ${path}`);
    return { width: Number(m[1]), height: Number(m[2]) };
  }

  async cropImage(params: { inputPath: string; outputPath: string; width: number; height: number }): Promise<void> {
    this.crops.push(params);
    await writeFakeImage(params.outputPath, { width: params.width, height: params.height });
  }

  async renderStillVideo(params: { imagePath: string; audioPaths: string[]; outputPath: string }): Promise<void> {
    this.renders.push(params);
    if (this.failRender && this.failRender(params.outputPath)) {
      throw new Error("ffmpeg exited with code 1");
    }
    await writeFile(params.outputPath, "FAKEVIDEO\n".padEnd(this.videoBytes, " "));
  }
}

export type FakeTake = { seconds: number; bytes?: number } | Error;

/**
 * Synthesizer whose output per (chapter, attempt) is scripted. Unscripted
 * calls produce `defaultSeconds` of audio.
 */
export class FakeSynthesizer implements SpeechSynthesizer {
  name = "fake";
  calls: SynthesisRequest[] = [];
  inFlight = 0;
  maxInFlight = 0;
  private attempts = new Map<number, number>();

  constructor(
    private readonly script: (chapter: number, attempt: number) => FakeTake | undefined = () => undefined,
    private readonly defaultSeconds = 60,
    private readonly delayMs = 0
  ) {}

  callsFor(chapter: number): number {
    return this.calls.filter((c) => c.chapter === chapter).length;
  }

  async synthesize(request: SynthesisRequest): Promise<void> {
    this.calls.push(request);
    const attempt = (this.attempts.get(request.chapter) ?? 0) + 1;
    this.attempts.set(request.chapter, attempt);

    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      await new Promise((r) => setTimeout(r, this.delayMs));
      const take = this.script(request.chapter, attempt) ?? { seconds: this.defaultSeconds };
      if (take instanceof Error) throw take;
      await writeFakeClip(request.outputPath, take.seconds, take.bytes ?? 4096);
    } finally {
      this.inFlight--;
    }
  }
}

export const TEST_CATALOG: BookCatalog = {
  testbook: {
    name: "Test Book",
    epubFile: "test.epub",
    coverImage: "cover.jpg",
    remoteFolder: "Audiobooks/Test",
    targetVideoDurationMinutes: 120,
    voice: "en-US-AndrewNeural",
    speechRate: "+0%",
  },
};

export async function makeWorkdir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "narration-test-"));
}

export async function removeWorkdir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Config for tests: rate +0% and 150 wpm, so 150 words -> 60 s expected and
 * anything under 30 s is suspect; byte floors are 1000; no retry backoff.
 */
export function makeConfig(workdir: string, env: Record<string, string> = {}): PipelineConfig {
  return loadPipelineConfig({
    env: {
      NARRATION_BOOK_ID: "testbook",
      NARRATION_WORKDIR: workdir,
      NARRATION_AUDIO_CONCURRENCY: "3",
      NARRATION_MAX_RETRIES: "3",
      NARRATION_RETRY_BASE_MS: "0",
      NARRATION_VIDEO_MAX_WORKERS: "2",
      NARRATION_SUSPECT_MIN_BYTES: "1000",
      NARRATION_MIN_VIDEO_BYTES: "1000",
      NARRATION_ENABLE_UPLOAD: "false",
      ...env,
    },
    catalog: TEST_CATALOG,
  });
}

/** "Chapter N" title line plus filler: `words` words in total. */
export function chapterText(index: number, words = 150): string {
  const filler = Array.from({ length: Math.max(words - 2, 0) }, () => "word").join(" ");
  return `Chapter ${index}\n${filler}\n`;
}

export async function writeChapters(
  chaptersDir: string,
  indices: number[],
  words = 150,
  pad = 0
): Promise<void> {
  await mkdir(chaptersDir, { recursive: true });
  for (const i of indices) {
    const name = `ch_${String(i).padStart(pad, "0")}.txt`;
    await writeFile(join(chaptersDir, name), chapterText(i, words));
  }
}
