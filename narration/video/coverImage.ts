import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { partialPathFor } from "../artifacts/artifactPaths.js";
import { discardPartial, fileSize, finalizeArtifact } from "../artifacts/artifactValidity.js";
import type { MediaTool } from "../media/ffmpegTool.js";
import { isErrnoException } from "../lib/commandRunner.js";
import { PreconditionError } from "../lib/errors.js";

export const NORMALIZED_COVER_NAME = "cover_even.png";
export const NORMALIZED_COVER_SOURCE_NAME = "cover_even.json";

const CoverSourceSchema = z.object({
  path: z.string(),
  sizeBytes: z.number().int().nonnegative(),
  mtimeMs: z.number(),
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

type CoverSource = z.infer<typeof CoverSourceSchema>;

export function evenDimensions(size: { width: number; height: number }): { width: number; height: number } {
  return { width: size.width - (size.width % 2), height: size.height - (size.height % 2) };
}

async function readCoverSource(path: string): Promise<CoverSource | null> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (e) {
    if (isErrnoException(e) && e.code === "ENOENT") return null;
    throw e;
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return null;
  }
  const parsed = CoverSourceSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

function sameSource(a: CoverSource, b: CoverSource): boolean {
  return (
    a.path === b.path &&
    a.sizeBytes === b.sizeBytes &&
    a.mtimeMs === b.mtimeMs &&
    a.width === b.width &&
    a.height === b.height
  );
}

async function cachedCoverUsable(params: {
  cachedPath: string;
  sourcePath: string;
  source: CoverSource;
  even: { width: number; height: number };
  media: MediaTool;
}): Promise<boolean> {
  const size = await fileSize(params.cachedPath);
  if (size === null || size === 0) return false;

  const recorded = await readCoverSource(params.sourcePath);
  if (!recorded || !sameSource(recorded, params.source)) return false;

  try {
    const cached = await params.media.probeImageSize(params.cachedPath);
    return cached.width === params.even.width && cached.height === params.even.height;
  } catch {
    return false;
  }
}

/**
 * Return a cover path whose width and height are both even (H.264 with
 * yuv420p rejects odd sizes). An odd-sized cover is cropped by one pixel
 * row/column into the cache dir, next to a record of the source it came
 * from. The cached copy is reused only while that record still matches the
 * cover (path, size, mtime, dimensions) and the copy probes at the even size.
 */
export async function prepareCoverImage(params: {
  coverPath: string;
  cacheDir: string;
  media: MediaTool;
}): Promise<{ path: string; normalized: boolean }> {
  const { coverPath, cacheDir, media } = params;

  const size = await fileSize(coverPath);
  if (size === null || size === 0) {
    throw new PreconditionError("cover image", `Cover image not found: ${coverPath}`);
  }

  const original = await media.probeImageSize(coverPath);
  const even = evenDimensions(original);
  if (even.width === original.width && even.height === original.height) {
    return { path: coverPath, normalized: false };
  }
  if (even.width === 0 || even.height === 0) {
    throw new PreconditionError("cover image", `Cover image ${coverPath} is too small (${original.width}x${original.height})`);
  }

  const cachedPath = join(cacheDir, NORMALIZED_COVER_NAME);
  const sourcePath = join(cacheDir, NORMALIZED_COVER_SOURCE_NAME);
  const source: CoverSource = {
    path: coverPath,
    sizeBytes: size,
    mtimeMs: (await stat(coverPath)).mtimeMs,
    width: original.width,
    height: original.height,
  };
  if (await cachedCoverUsable({ cachedPath, sourcePath, source, even, media })) {
    return { path: cachedPath, normalized: true };
  }

  await mkdir(cacheDir, { recursive: true });
  const partial = partialPathFor(cachedPath);
  try {
    await media.cropImage({ inputPath: coverPath, outputPath: partial, width: even.width, height: even.height });
    await finalizeArtifact(partial, cachedPath);
  } catch (e) {
    await discardPartial(partial);
    throw new PreconditionError(
      "cover image",
      `Could not normalize cover ${coverPath} to ${even.width}x${even.height}: ${e instanceof Error ? e.message : String(e)}`
    );
  }

  await writeFile(sourcePath, JSON.stringify(source, null, 2) + "\n", "utf-8");
  console.log(`[video] cover normalized ${original.width}x${original.height} -> ${even.width}x${even.height}`);
  return { path: cachedPath, normalized: true };
}
