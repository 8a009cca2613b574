import { readdir } from "node:fs/promises";
import { isPartialFileName } from "../artifacts/artifactPaths.js";

export async function listFinishedVideos(dir: string): Promise<string[]> {
  const names = await readdir(dir);
  return names.filter((n) => n.endsWith(".mp4") && !isPartialFileName(n)).sort();
}
