import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { z } from "zod";
import { clipPath, partialPathFor } from "../artifacts/artifactPaths.js";
import { fileSize, finalizeArtifact } from "../artifacts/artifactValidity.js";
import type { MediaTool } from "../media/ffmpegTool.js";
import { isErrnoException } from "../lib/commandRunner.js";

// A rendered video only stays valid while the clips it was made from are
// unchanged. The record of what went into each video lives in the cache dir
// so the videos dir holds nothing but videos.

export const SEGMENT_MANIFEST_DIR = "segments";

const ClipFingerprintSchema = z.object({
  chapter: z.number().int().nonnegative(),
  sizeBytes: z.number().int().nonnegative(),
  durationSeconds: z.number().nonnegative(),
});

export const SegmentManifestSchema = z.object({
  video: z.string(),
  clips: z.array(ClipFingerprintSchema),
});

export type ClipFingerprint = z.infer<typeof ClipFingerprintSchema>;
export type SegmentManifest = z.infer<typeof SegmentManifestSchema>;

export function segmentManifestPath(cacheDir: string, videoName: string): string {
  return join(cacheDir, SEGMENT_MANIFEST_DIR, videoName.replace(/\.mp4$/, ".json"));
}

/** Size and probed duration of every member clip, or null if any clip is missing or unreadable. */
export async function fingerprintClips(
  chapters: number[],
  audioDir: string,
  media: MediaTool
): Promise<ClipFingerprint[] | null> {
  const out: ClipFingerprint[] = [];
  for (const chapter of chapters) {
    const path = clipPath(audioDir, chapter);
    const sizeBytes = await fileSize(path);
    if (sizeBytes === null || sizeBytes === 0) return null;
    let seconds: number;
    try {
      seconds = await media.probeDurationSeconds(path);
    } catch {
      return null;
    }
    out.push({ chapter, sizeBytes, durationSeconds: Number(seconds.toFixed(3)) });
  }
  return out;
}

export function sameClips(a: ClipFingerprint[], b: ClipFingerprint[]): boolean {
  if (a.length !== b.length) return false;
  return a.every(
    (x, i) => x.chapter === b[i].chapter && x.sizeBytes === b[i].sizeBytes && x.durationSeconds === b[i].durationSeconds
  );
}

/** Missing or malformed reads as null: the video it describes is then treated as stale. */
export async function readSegmentManifest(path: string): Promise<SegmentManifest | null> {
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
  const parsed = SegmentManifestSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export async function writeSegmentManifest(path: string, manifest: SegmentManifest): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const partial = partialPathFor(path);
  await writeFile(partial, JSON.stringify(manifest, null, 2) + "\n", "utf-8");
  await finalizeArtifact(partial, path);
}
