import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { ConfigError } from "../../lib/errors.js";
import { makeWorkdir, removeWorkdir } from "../../__testutils__/fakes.js";
import {
  formatDurationIndex,
  parseCsvLine,
  parseDurationIndex,
  readDurationIndex,
  writeDurationIndex,
  type DurationRecord,
} from "../durationIndex.js";

const records: DurationRecord[] = [
  { chapter: 2, title: 'The "Long" Night, Part 1', durationSeconds: 1234.5, sizeBytes: 2_000_000, expectedSeconds: 1300, flag: "ok" },
  { chapter: 1, title: "Arrival", durationSeconds: 12, sizeBytes: 90_000, expectedSeconds: 900.25, flag: "suspect" },
  { chapter: 3, title: "Unknown Title", durationSeconds: 0, sizeBytes: 0, expectedSeconds: 0, flag: "failed" },
];

describe("duration index CSV", () => {
  it("writes sorted rows with quoted titles and fixed precision", () => {
    expect(formatDurationIndex(records)).toBe(
      [
        "chapter,title,duration_seconds,size_bytes,expected_seconds,flag",
        "1,Arrival,12.000,90000,900.3,suspect",
        '2,"The ""Long"" Night, Part 1",1234.500,2000000,1300.0,ok',
        "3,Unknown Title,0.000,0,0.0,failed",
        "",
      ].join("\n")
    );
  });

  it("flattens line breaks in titles", () => {
    const text = formatDurationIndex([{ ...records[1], title: "Two\nLines" }]);
    expect(text.split("\n")[1]).toBe("1,Two Lines,12.000,90000,900.3,suspect");
  });

  it("reads back what it writes", () => {
    const parsed = parseDurationIndex(formatDurationIndex(records));
    expect(parsed.map((r) => r.chapter)).toEqual([1, 2, 3]);
    expect(parsed[1]).toEqual(records[0]);
    expect(parsed[0].expectedSeconds).toBe(900.3);
  });

  it("splits quoted fields", () => {
    expect(parseCsvLine('7,"a, ""b""",x')).toEqual(["7", 'a, "b"', "x"]);
  });

  it("rejects a foreign header", () => {
    expect(() => parseDurationIndex("chapter,duration\n1,2\n")).toThrow(ConfigError);
  });

  it("names the line of a malformed row", () => {
    const text = "chapter,title,duration_seconds,size_bytes,expected_seconds,flag\n1,A,10,100,10,ok\n2,B,abc,100,10,ok\n";
    expect(() => parseDurationIndex(text, "idx.csv")).toThrow(/^idx\.csv line 3: durationSeconds/);
  });

  it("reads an empty file as no rows", () => {
    expect(parseDurationIndex("")).toEqual([]);
  });

  describe("on disk", () => {
    let dir: string;
    beforeEach(async () => {
      dir = await makeWorkdir();
    });
    afterEach(async () => {
      await removeWorkdir(dir);
    });

    it("treats a missing index as empty and round-trips a written one", async () => {
      const path = join(dir, "chapter_durations.csv");
      expect(await readDurationIndex(path)).toEqual([]);
      await writeDurationIndex(path, records);
      expect((await readDurationIndex(path)).map((r) => r.flag)).toEqual(["suspect", "ok", "failed"]);
    });
  });
});
