import { join } from "node:path";
import type { PipelineConfig } from "../../config/pipelineConfig.js";
import type { Chapter } from "../../chapters/chapterStore.js";
import { countWords } from "../../chapters/chapterStore.js";
import { clipPath, partialPathFor } from "../../artifacts/artifactPaths.js";
import { discardPartial, fileSize, finalizeArtifact } from "../../artifacts/artifactValidity.js";
import type { MediaTool } from "../../media/ffmpegTool.js";
import { PreconditionError, TransientSynthesisError } from "../../lib/errors.js";
import { pipelineLogHelpers } from "../../lib/pipelineLog.js";
import type { SpeechSynthesizer } from "../speech/types.js";
import { qaClip } from "./audioQa.js";
import { classifyError, decideRetry, sleep, type ErrorClass } from "./retryPolicy.js";
import type { SynthesisOutcome } from "./audioTypes.js";

export type SynthesisSettings = Pick<
  PipelineConfig,
  "bookId" | "book" | "rateMultiplier" | "maxRetries" | "retryBaseMs" | "thresholds"
> & { audioDir: string };

export type SynthesisDeps = {
  synthesizer: SpeechSynthesizer;
  media: MediaTool;
  sleep?: (ms: number) => Promise<void>;
};

type Candidate = { path: string; durationSeconds: number; sizeBytes: number; reason: string };

/**
 * Synthesize one chapter with bounded retries.
 *
 * Each attempt writes to a `.partial` file which only becomes `ch_<n>.mp3`
 * after it passes QA, so an interrupted run never leaves a half-written clip
 * under the final name. When every attempt comes back short, the longest
 * one is kept and reported as suspect.
 */
export async function synthesizeChapter(params: {
  chapter: Chapter;
  settings: SynthesisSettings;
  deps: SynthesisDeps;
}): Promise<SynthesisOutcome> {
  const { chapter, settings, deps } = params;
  const wait = deps.sleep ?? sleep;
  const index = chapter.index;
  const finalPath = clipPath(settings.audioDir, index);
  const partialPath = partialPathFor(finalPath);
  const candidatePath = join(settings.audioDir, `ch_${index}.candidate.partial.mp3`);
  const wordCount = countWords(chapter.text);

  if (wordCount === 0) {
    const reason = `Chapter ${index} text is empty`;
    pipelineLogHelpers.synthesisFailed({
      book_id: settings.bookId,
      chapter: index,
      attempt: 0,
      error_code: "precondition",
      error_message: reason,
    });
    return { kind: "failed", chapter: index, reason, errorClass: "precondition", attempts: 0 };
  }

  let best: Candidate | null = null;
  let lastError: { errorClass: ErrorClass; message: string } = { errorClass: "worker_error", message: "not attempted" };
  let attempt = 0;

  for (attempt = 1; attempt <= settings.maxRetries; attempt++) {
    pipelineLogHelpers.synthesisStarted({ book_id: settings.bookId, chapter: index, attempt });

    try {
      await deps.synthesizer.synthesize({
        chapter: index,
        text: chapter.text,
        voice: settings.book.voice,
        rate: settings.book.speechRate,
        outputPath: partialPath,
      });

      const sizeBytes = (await fileSize(partialPath)) ?? 0;
      if (sizeBytes === 0) {
        throw new TransientSynthesisError(index, "TTS produced an empty file", "tts_empty_output");
      }

      const durationSeconds = await deps.media.probeDurationSeconds(partialPath);
      const qa = qaClip({
        chapter: index,
        durationSeconds,
        sizeBytes,
        wordCount,
        rateMultiplier: settings.rateMultiplier,
        thresholds: settings.thresholds,
      });

      if (qa.ok) {
        await finalizeArtifact(partialPath, finalPath);
        if (best) await discardPartial(best.path);
        pipelineLogHelpers.synthesisSucceeded({
          book_id: settings.bookId,
          chapter: index,
          attempt,
          duration_seconds: durationSeconds,
          size_bytes: sizeBytes,
          path: finalPath,
        });
        console.log(`[synthesis] chapter ${index} finished -> ch_${index}.mp3 (${durationSeconds.toFixed(1)}s, attempt ${attempt})`);
        return {
          kind: "generated",
          chapter: index,
          clip: { chapter: index, path: finalPath, durationSeconds, sizeBytes, status: "generated" },
          attempts: attempt,
        };
      }

      pipelineLogHelpers.synthesisSuspect({
        book_id: settings.bookId,
        chapter: index,
        attempt,
        duration_seconds: durationSeconds,
        expected_seconds: qa.expectedSeconds,
        reason: qa.message,
      });

      if (!best || durationSeconds > best.durationSeconds) {
        await finalizeArtifact(partialPath, candidatePath);
        best = { path: candidatePath, durationSeconds, sizeBytes, reason: qa.message };
      } else {
        await discardPartial(partialPath);
      }
      lastError = { errorClass: "qa_too_short", message: qa.message };
    } catch (e) {
      await discardPartial(partialPath);
      lastError = classifyError(e);
      console.error(
        `[synthesis] chapter ${index} error (attempt ${attempt}/${settings.maxRetries}): ${lastError.message}`
      );
      if (e instanceof PreconditionError) break;
    }

    const decision = decideRetry({
      attempt,
      maxAttempts: settings.maxRetries,
      errorClass: lastError.errorClass,
      baseMs: settings.retryBaseMs,
    });
    if (!decision.shouldRetry) break;
    await wait(decision.backoffMs);
  }

  const attempts = Math.min(attempt, settings.maxRetries);

  if (best) {
    await finalizeArtifact(best.path, finalPath);
    console.warn(`[synthesis] chapter ${index} kept as SUSPECT after ${attempts} attempt(s): ${best.reason}`);
    return {
      kind: "suspect",
      chapter: index,
      clip: {
        chapter: index,
        path: finalPath,
        durationSeconds: best.durationSeconds,
        sizeBytes: best.sizeBytes,
        status: "suspect",
      },
      reason: best.reason,
      attempts,
    };
  }

  pipelineLogHelpers.synthesisFailed({
    book_id: settings.bookId,
    chapter: index,
    attempt: attempts,
    error_code: lastError.errorClass,
    error_message: lastError.message,
  });
  console.error(`[synthesis] chapter ${index} FAILED after ${attempts} attempt(s)`);
  return { kind: "failed", chapter: index, reason: lastError.message, errorClass: lastError.errorClass, attempts };
}
