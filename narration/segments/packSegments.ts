import type { DurationRecord } from "../durations/durationIndex.js";

export type VideoSegment = {
  segmentId: number;
  memberChapters: number[];
  totalDurationSeconds: number;
  /** Set when one chapter alone is longer than the target. */
  oversized: boolean;
};

export type PackResult = {
  segments: VideoSegment[];
  /** Chapters with no usable clip; listed, never packed. */
  excluded: number[];
};

/**
 * Greedy left-to-right packing of chapters into duration-bounded segments.
 *
 * A chapter joins the open segment unless that would push it past the target
 * and the segment already has a member; then the segment closes and the
 * chapter starts the next one. A chapter longer than the target therefore
 * sits alone. Chapters are never split or reordered, gaps in numbering are
 * ignored, and ids are assigned 1..n after packing so identical input always
 * gives identical boundaries.
 */
export function packSegments(records: DurationRecord[], targetSeconds: number): PackResult {
  if (!(targetSeconds > 0)) {
    throw new Error(`target duration must be positive, got ${targetSeconds}`);
  }

  const sorted = [...records].sort((a, b) => a.chapter - b.chapter);
  const excluded: number[] = [];
  const groups: Array<{ members: number[]; total: number }> = [];
  let current: { members: number[]; total: number } | null = null;

  for (const r of sorted) {
    if (r.flag === "failed") {
      excluded.push(r.chapter);
      continue;
    }

    if (current && current.members.length > 0 && current.total + r.durationSeconds > targetSeconds) {
      groups.push(current);
      current = null;
    }
    if (!current) current = { members: [], total: 0 };
    current.members.push(r.chapter);
    current.total += r.durationSeconds;
  }
  if (current && current.members.length > 0) groups.push(current);

  const segments = groups.map((g, i) => ({
    segmentId: i + 1,
    memberChapters: g.members,
    totalDurationSeconds: g.total,
    oversized: g.members.length === 1 && g.total > targetSeconds,
  }));

  return { segments, excluded };
}

export function describeSegment(segment: VideoSegment): string {
  const first = segment.memberChapters[0];
  const last = segment.memberChapters[segment.memberChapters.length - 1];
  const mins = Math.floor(segment.totalDurationSeconds / 60);
  const range = first === last ? `chapter ${first}` : `chapters ${first}-${last}`;
  return `#${segment.segmentId}: ${range} (${segment.memberChapters.length} chapter(s), ${mins} min${segment.oversized ? ", oversized" : ""})`;
}
