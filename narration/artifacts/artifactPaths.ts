import { join } from "node:path";

export function clipFileName(chapter: number): string {
  return `ch_${chapter}.mp3`;
}

export function clipPath(audioDir: string, chapter: number): string {
  return join(audioDir, clipFileName(chapter));
}

const CLIP_FILE = /^ch_(\d+)\.mp3$/;

export function parseClipFileName(name: string): number | null {
  const m = name.match(CLIP_FILE);
  return m ? Number.parseInt(m[1], 10) : null;
}

export function videoFileName(segment: { segmentId: number; memberChapters: number[] }): string {
  const first = segment.memberChapters[0];
  const last = segment.memberChapters[segment.memberChapters.length - 1];
  return `${String(segment.segmentId).padStart(3, "0")}_ch${first}-${last}.mp4`;
}

/**
 * `videos/001_ch1-3.mp4` -> `videos/001_ch1-3.partial.mp4`.
 * The extension stays last so tools still infer the container.
 */
export function partialPathFor(finalPath: string): string {
  const dot = finalPath.lastIndexOf(".");
  const slash = Math.max(finalPath.lastIndexOf("/"), finalPath.lastIndexOf("\\"));
  if (dot <= slash) return `${finalPath}.partial`;
  return `${finalPath.slice(0, dot)}.partial${finalPath.slice(dot)}`;
}

export function isPartialFileName(name: string): boolean {
  return /\.partial(\.[^.]+)?$/.test(name);
}
