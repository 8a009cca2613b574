import { afterEach, describe, it, expect, vi } from "vitest";
import { pipelineLogHelpers } from "../pipelineLog.js";

describe("pipelineLog", () => {
  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("writes one timestamped JSON line per event", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-03-04T05:06:07Z"));
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    pipelineLogHelpers.synthesisFailed({
      book_id: "rtoc",
      chapter: 12,
      attempt: 3,
      error_code: "tts_timeout",
      error_message: "request timed out",
    });

    expect(log).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(log.mock.calls[0][0]))).toEqual({
      timestamp: "2026-03-04T05:06:07.000Z",
      event: "chapter.synthesis.failed",
      book_id: "rtoc",
      chapter: 12,
      attempt: 3,
      error_code: "tts_timeout",
      error_message: "request timed out",
    });
  });
});
