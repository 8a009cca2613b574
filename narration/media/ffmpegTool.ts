import { execFileRunner, type CommandRunner } from "../lib/commandRunner.js";

export type ImageSize = { width: number; height: number };

/**
 * Everything the pipeline needs from the external media tool.
 * Durations always come from here, never from file sizes.
 */
export interface MediaTool {
  probeDurationSeconds(path: string): Promise<number>;
  probeImageSize(path: string): Promise<ImageSize>;
  /** Crop to the given (even) dimensions and write a PNG. */
  cropImage(params: { inputPath: string; outputPath: string; width: number; height: number }): Promise<void>;
  /** Concatenate clips in order under a still image into one video file. */
  renderStillVideo(params: { imagePath: string; audioPaths: string[]; outputPath: string }): Promise<void>;
}

export class FfmpegMediaTool implements MediaTool {
  constructor(
    private readonly run: CommandRunner = execFileRunner,
    private readonly binaries: { ffmpeg: string; ffprobe: string } = { ffmpeg: "ffmpeg", ffprobe: "ffprobe" }
  ) {}

  async probeDurationSeconds(path: string): Promise<number> {
    const { stdout } = await this.run(this.binaries.ffprobe, [
      "-v",
      "error",
      "-show_entries",
      "format=duration",
      "-of",
      "default=noprint_wrappers=1:nokey=1",
      path,
    ]);

    const s = stdout.trim();
    const dur = Number(s);
    if (!s || !Number.isFinite(dur) || dur < 0) {
      throw new Error(`ffprobe returned invalid duration for ${path}: "${s}"`);
    }
    return dur;
  }

  async probeImageSize(path: string): Promise<ImageSize> {
    const { stdout } = await this.run(this.binaries.ffprobe, [
      "-v",
      "error",
      "-select_streams",
      "v:0",
      "-show_entries",
      "stream=width,height",
      "-of",
      "csv=s=x:p=0",
      path,
    ]);

    // e.g. "1601x2400"
    const m = stdout.trim().match(/^(\d+)x(\d+)/);
    if (!m) {
      throw new Error(`ffprobe returned no image size for ${path}: "${stdout.trim()}"`);
    }
    return { width: Number(m[1]), height: Number(m[2]) };
  }

  async cropImage(params: { inputPath: string; outputPath: string; width: number; height: number }): Promise<void> {
    await this.run(this.binaries.ffmpeg, [
      "-y",
      "-i",
      params.inputPath,
      "-vf",
      `crop=${params.width}:${params.height}:0:0`,
      "-frames:v",
      "1",
      params.outputPath,
    ]);
  }

  async renderStillVideo(params: { imagePath: string; audioPaths: string[]; outputPath: string }): Promise<void> {
    const { imagePath, audioPaths, outputPath } = params;
    if (audioPaths.length === 0) {
      throw new Error("Cannot render: no audio inputs");
    }

    await this.run(this.binaries.ffmpeg, buildStillVideoArgs({ imagePath, audioPaths, outputPath }));
  }
}

/**
 * Image loops at 1 fps for the whole audio length; audio inputs are joined
 * with the concat filter so differing MP3 headers do not matter.
 */
export function buildStillVideoArgs(params: {
  imagePath: string;
  audioPaths: string[];
  outputPath: string;
}): string[] {
  const { imagePath, audioPaths, outputPath } = params;
  const inputs = audioPaths.flatMap((p) => ["-i", p]);
  const audioLabels = audioPaths.map((_, i) => `[${i + 1}:a]`).join("");
  const filter = `${audioLabels}concat=n=${audioPaths.length}:v=0:a=1[outa]`;

  return [
    "-y",
    "-loop",
    "1",
    "-framerate",
    "1",
    "-i",
    imagePath,
    ...inputs,
    "-filter_complex",
    filter,
    "-map",
    "0:v",
    "-map",
    "[outa]",
    "-c:v",
    "libx264",
    "-tune",
    "stillimage",
    "-r",
    "1",
    "-pix_fmt",
    "yuv420p",
    "-c:a",
    "aac",
    "-b:a",
    "192k",
    "-shortest",
    "-f",
    "mp4",
    outputPath,
  ];
}
