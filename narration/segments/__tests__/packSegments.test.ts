import { describe, it, expect } from "vitest";
import type { DurationRecord } from "../../durations/durationIndex.js";
import { describeSegment, packSegments } from "../packSegments.js";

function rec(chapter: number, minutes: number, flag: DurationRecord["flag"] = "ok"): DurationRecord {
  return {
    chapter,
    title: `Chapter ${chapter}`,
    durationSeconds: minutes * 60,
    sizeBytes: 1_000_000,
    expectedSeconds: minutes * 60,
    flag,
  };
}

const TARGET = 120 * 60;

describe("packSegments", () => {
  it("closes a segment when the next chapter would exceed the target", () => {
    const { segments, excluded } = packSegments([rec(1, 40), rec(2, 40), rec(3, 40), rec(4, 40)], TARGET);

    expect(excluded).toEqual([]);
    expect(segments.map((s) => s.memberChapters)).toEqual([[1, 2, 3], [4]]);
    expect(segments.map((s) => s.segmentId)).toEqual([1, 2]);
    expect(segments[0].totalDurationSeconds).toBe(7200);
    expect(segments[1].totalDurationSeconds).toBe(2400);
  });

  it("puts a chapter longer than the target alone and marks it oversized", () => {
    const { segments } = packSegments([rec(1, 30), rec(2, 150), rec(3, 30)], TARGET);

    expect(segments.map((s) => s.memberChapters)).toEqual([[1], [2], [3]]);
    expect(segments.map((s) => s.oversized)).toEqual([false, true, false]);
  });

  it("starts with an oversized chapter without emitting an empty segment", () => {
    const { segments } = packSegments([rec(1, 150), rec(2, 10)], TARGET);
    expect(segments.map((s) => s.memberChapters)).toEqual([[1], [2]]);
  });

  it("treats gaps in chapter numbering as adjacency", () => {
    const { segments } = packSegments([rec(5, 60), rec(1, 60), rec(4, 60), rec(2, 60)], TARGET);
    expect(segments.map((s) => s.memberChapters)).toEqual([[1, 2], [4, 5]]);
  });

  it("excludes failed chapters and packs the rest", () => {
    const { segments, excluded } = packSegments([rec(1, 50), rec(2, 0, "failed"), rec(3, 50)], TARGET);
    expect(excluded).toEqual([2]);
    expect(segments.map((s) => s.memberChapters)).toEqual([[1, 3]]);
  });

  it("keeps suspect chapters in the pack", () => {
    const { segments } = packSegments([rec(1, 1, "suspect"), rec(2, 10)], TARGET);
    expect(segments.map((s) => s.memberChapters)).toEqual([[1, 2]]);
  });

  it("returns no segments for no chapters", () => {
    expect(packSegments([], TARGET)).toEqual({ segments: [], excluded: [] });
  });

  it("allows a segment to land exactly on the target", () => {
    const { segments } = packSegments([rec(1, 60), rec(2, 60), rec(3, 1)], TARGET);
    expect(segments.map((s) => s.memberChapters)).toEqual([[1, 2], [3]]);
  });

  it("rejects a non-positive target", () => {
    expect(() => packSegments([rec(1, 10)], 0)).toThrow(/target duration must be positive/);
  });

  it("covers every usable chapter exactly once, in order, within the target", () => {
    let seed = 7;
    const next = () => {
      seed = (seed * 1103515245 + 12345) % 2147483648;
      return seed / 2147483648;
    };

    for (let run = 0; run < 20; run++) {
      const records: DurationRecord[] = [];
      let chapter = 0;
      const count = 1 + Math.floor(next() * 40);
      for (let i = 0; i < count; i++) {
        chapter += 1 + Math.floor(next() * 3);
        records.push(rec(chapter, Math.round(next() * 160)));
      }

      const { segments } = packSegments(records, TARGET);
      const flattened = segments.flatMap((s) => s.memberChapters);
      expect(flattened).toEqual(records.map((r) => r.chapter));

      for (const s of segments) {
        expect(s.memberChapters.length).toBeGreaterThan(0);
        if (s.memberChapters.length > 1) expect(s.totalDurationSeconds).toBeLessThanOrEqual(TARGET);
        expect(s.oversized).toBe(s.totalDurationSeconds > TARGET);
      }
      expect(packSegments(records, TARGET)).toEqual(packSegments(records, TARGET));
    }
  });
});

describe("describeSegment", () => {
  it("summarizes range, count and minutes", () => {
    const { segments } = packSegments([rec(3, 40), rec(4, 41)], TARGET);
    expect(describeSegment(segments[0])).toBe("#1: chapters 3-4 (2 chapter(s), 81 min)");
  });

  it("flags a single oversized chapter", () => {
    const { segments } = packSegments([rec(9, 150)], TARGET);
    expect(describeSegment(segments[0])).toBe("#1: chapter 9 (1 chapter(s), 150 min, oversized)");
  });
});
