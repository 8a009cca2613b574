// Sanity checks on synthesized clips.
// The TTS service truncates silently under load, so a success return is not
// trusted: duration is compared against what the chapter's word count implies.

import type { SanityThresholds } from "../../config/pipelineConfig.js";

export type QaResult =
  | { ok: true; expectedSeconds: number }
  | { ok: false; errorClass: "qa_too_short" | "qa_too_small"; message: string; expectedSeconds: number };

export function estimateSpeechSeconds(params: {
  wordCount: number;
  wordsPerMinute: number;
  rateMultiplier: number;
}): number {
  const { wordCount, wordsPerMinute, rateMultiplier } = params;
  if (wordCount <= 0) return 0;
  return (wordCount / (wordsPerMinute * rateMultiplier)) * 60;
}

export function qaClip(params: {
  chapter: number;
  durationSeconds: number;
  sizeBytes: number;
  wordCount: number;
  rateMultiplier: number;
  thresholds: Pick<SanityThresholds, "suspectDurationRatio" | "suspectMinBytes" | "wordsPerMinute">;
}): QaResult {
  const { chapter, durationSeconds, sizeBytes, wordCount, rateMultiplier, thresholds } = params;
  const expectedSeconds = estimateSpeechSeconds({
    wordCount,
    wordsPerMinute: thresholds.wordsPerMinute,
    rateMultiplier,
  });

  const minSeconds = expectedSeconds * thresholds.suspectDurationRatio;
  if (durationSeconds < minSeconds) {
    return {
      ok: false,
      errorClass: "qa_too_short",
      message: `chapter ${chapter} duration ${durationSeconds.toFixed(1)}s < ${minSeconds.toFixed(1)}s (${wordCount} words, expected ~${expectedSeconds.toFixed(1)}s)`,
      expectedSeconds,
    };
  }

  if (sizeBytes < thresholds.suspectMinBytes) {
    return {
      ok: false,
      errorClass: "qa_too_small",
      message: `chapter ${chapter} clip is ${sizeBytes} bytes < ${thresholds.suspectMinBytes}`,
      expectedSeconds,
    };
  }

  return { ok: true, expectedSeconds };
}
