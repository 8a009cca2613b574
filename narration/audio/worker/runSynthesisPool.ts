import type { ChapterRef } from "../../chapters/chapterStore.js";
import { readChapter } from "../../chapters/chapterStore.js";
import type { MissingChapter } from "../../chapters/chapterSelection.js";
import { clipPath } from "../../artifacts/artifactPaths.js";
import { clipRule, removeStalePartials, shouldSkip } from "../../artifacts/artifactValidity.js";
import { pipelineLogHelpers } from "../../lib/pipelineLog.js";
import { runPool } from "../../lib/workerPool.js";
import { classifyError } from "./retryPolicy.js";
import { synthesizeChapter, type SynthesisDeps, type SynthesisSettings } from "./synthesizeChapter.js";
import type { SynthesisCounts, SynthesisOutcome, SynthesisReport } from "./audioTypes.js";

export function countOutcomes(outcomes: SynthesisOutcome[]): SynthesisCounts {
  const counts: SynthesisCounts = { requested: outcomes.length, generated: 0, suspect: 0, failed: 0, skipped: 0 };
  for (const o of outcomes) counts[o.kind]++;
  return counts;
}

/**
 * Fixed-size pool of synthesis workers, one chapter per unit of work.
 *
 * Chapters whose clip already passes the clip rule are skipped unless they
 * are in `forced`. A failing chapter never stops the others. Every requested
 * chapter (including explicitly requested ones with no source file) ends up
 * with exactly one outcome.
 */
export async function runSynthesisPool(params: {
  chapters: ChapterRef[];
  forced?: Set<number>;
  missing?: MissingChapter[];
  concurrency: number;
  settings: SynthesisSettings;
  deps: SynthesisDeps;
}): Promise<SynthesisReport> {
  const { chapters, concurrency, settings, deps } = params;
  const forced = params.forced ?? new Set<number>();
  const rule = clipRule(deps.media, settings.thresholds);

  const stale = await removeStalePartials(settings.audioDir);
  if (stale.length > 0) {
    console.log(`[synthesis] removed ${stale.length} partial file(s) from an interrupted run`);
  }

  console.log(
    `[synthesis] ${chapters.length} chapter(s) requested, ${forced.size} forced, starting with ${concurrency} worker(s)`
  );

  const results = await runPool(chapters, concurrency, async (ref): Promise<SynthesisOutcome> => {
    const path = clipPath(settings.audioDir, ref.index);
    const decision = await shouldSkip(rule, path, forced.has(ref.index));
    if (decision.skip) {
      pipelineLogHelpers.synthesisSkipped({ book_id: settings.bookId, chapter: ref.index, path });
      return {
        kind: "skipped",
        chapter: ref.index,
        clip: {
          chapter: ref.index,
          path,
          durationSeconds: decision.check.durationSeconds ?? 0,
          sizeBytes: decision.check.sizeBytes,
          status: "generated",
        },
      };
    }

    const chapter = await readChapter(ref);
    return synthesizeChapter({ chapter, settings, deps });
  });

  const outcomes: SynthesisOutcome[] = results.map((r) => {
    if (r.ok) return r.value;
    const { errorClass, message } = classifyError(r.error);
    pipelineLogHelpers.synthesisFailed({
      book_id: settings.bookId,
      chapter: r.item.index,
      attempt: 0,
      error_code: errorClass,
      error_message: message,
    });
    console.error(`[synthesis] chapter ${r.item.index} could not be processed: ${message}`);
    return { kind: "failed", chapter: r.item.index, reason: message, errorClass, attempts: 0 };
  });

  for (const m of params.missing ?? []) {
    console.warn(`[synthesis] ${m.reason}`);
    outcomes.push({ kind: "failed", chapter: m.chapter, reason: m.reason, errorClass: "precondition", attempts: 0 });
  }

  outcomes.sort((a, b) => a.chapter - b.chapter);
  const counts = countOutcomes(outcomes);

  console.log(
    `[synthesis] done: generated=${counts.generated} suspect=${counts.suspect} failed=${counts.failed} skipped=${counts.skipped}`
  );

  return { outcomes, counts };
}
