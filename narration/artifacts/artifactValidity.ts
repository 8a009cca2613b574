import { readdir, rename, rm, stat } from "node:fs/promises";
import { join } from "node:path";
import type { SanityThresholds } from "../config/pipelineConfig.js";
import type { MediaTool } from "../media/ffmpegTool.js";
import { isErrnoException } from "../lib/commandRunner.js";
import { isPartialFileName } from "./artifactPaths.js";

export type ArtifactKind = "clip" | "video";

export type ArtifactCheck =
  | { valid: true; sizeBytes: number; durationSeconds: number | null }
  | { valid: false; reason: "missing" | "empty" | "too_short" | "too_small" | "unreadable"; detail?: string };

/**
 * One "existing valid output" rule per artifact kind. Every stage asks the
 * same question through this before doing work for a unit.
 */
export interface ArtifactRule {
  kind: ArtifactKind;
  check(path: string): Promise<ArtifactCheck>;
}

export async function fileSize(path: string): Promise<number | null> {
  try {
    const s = await stat(path);
    return s.isFile() ? s.size : null;
  } catch (e) {
    if (isErrnoException(e) && e.code === "ENOENT") return null;
    throw e;
  }
}

export function clipRule(media: MediaTool, thresholds: Pick<SanityThresholds, "minClipSeconds">): ArtifactRule {
  return {
    kind: "clip",
    async check(path) {
      const size = await fileSize(path);
      if (size === null) return { valid: false, reason: "missing" };
      if (size === 0) return { valid: false, reason: "empty" };

      let durationSeconds: number;
      try {
        durationSeconds = await media.probeDurationSeconds(path);
      } catch (e) {
        return { valid: false, reason: "unreadable", detail: e instanceof Error ? e.message : String(e) };
      }
      if (durationSeconds < thresholds.minClipSeconds) {
        return { valid: false, reason: "too_short", detail: `${durationSeconds}s < ${thresholds.minClipSeconds}s` };
      }
      return { valid: true, sizeBytes: size, durationSeconds };
    },
  };
}

export function videoRule(thresholds: Pick<SanityThresholds, "minVideoBytes">): ArtifactRule {
  return {
    kind: "video",
    async check(path) {
      const size = await fileSize(path);
      if (size === null) return { valid: false, reason: "missing" };
      if (size === 0) return { valid: false, reason: "empty" };
      if (size < thresholds.minVideoBytes) {
        return { valid: false, reason: "too_small", detail: `${size} bytes < ${thresholds.minVideoBytes}` };
      }
      return { valid: true, sizeBytes: size, durationSeconds: null };
    },
  };
}

/**
 * Skip decision for one unit: a forced unit is always redone, anything else
 * is skipped when its output already passes the rule.
 */
export async function shouldSkip(
  rule: ArtifactRule,
  path: string,
  forced: boolean
): Promise<{ skip: true; check: Extract<ArtifactCheck, { valid: true }> } | { skip: false; check: ArtifactCheck | null }> {
  if (forced) return { skip: false, check: null };
  const check = await rule.check(path);
  if (check.valid) return { skip: true, check };
  return { skip: false, check };
}

/** Move a completed temp file over its final name (same directory, so rename is atomic). */
export async function finalizeArtifact(partialPath: string, finalPath: string): Promise<void> {
  await rename(partialPath, finalPath);
}

export async function discardPartial(partialPath: string): Promise<void> {
  await rm(partialPath, { force: true });
}

/** Remove `*.partial.*` leftovers of an interrupted run. Returns the removed names. */
export async function removeStalePartials(dir: string): Promise<string[]> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (e) {
    if (isErrnoException(e) && e.code === "ENOENT") return [];
    throw e;
  }
  const stale = names.filter(isPartialFileName);
  await Promise.all(stale.map((name) => rm(join(dir, name), { force: true })));
  return stale;
}
