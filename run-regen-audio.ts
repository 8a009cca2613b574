import "dotenv/config";
import { readRegenerateList } from "./narration/chapters/chapterSelection.js";
import { createSpeechSynthesizer } from "./narration/audio/speech/synthesizerFactory.js";
import { FfmpegMediaTool } from "./narration/media/ffmpegTool.js";
import { parseStageArgs } from "./narration/lib/cliArgs.js";
import { loadConfigFromEnv, reportFatal } from "./narration/runner/bootstrap.js";
import { generateAudio } from "./narration/runner/runPipeline.js";

// Usage: tsx run-regen-audio.ts [--only 3,7] [--concurrency N]
// Without --only, reads chapters_to_regenerate.txt (one chapter per line).
// Runs at the lower regeneration concurrency so the retry is not truncated again.
async function main() {
  const { selection, concurrency } = parseStageArgs(process.argv.slice(2));
  const config = await loadConfigFromEnv(process.env);

  const only =
    selection.only && selection.only.length > 0
      ? selection.only
      : await readRegenerateList(config.paths.regenerateList);
  if (only.length === 0) {
    console.log(`[synthesis] nothing to regenerate (${config.paths.regenerateList} is empty)`);
    return;
  }

  console.log(`[synthesis] regenerating chapter(s): ${only.join(", ")}`);
  const report = await generateAudio({
    config,
    deps: { synthesizer: createSpeechSynthesizer(config, process.env), media: new FfmpegMediaTool() },
    selection: { ...selection, only },
    concurrency: concurrency ?? config.regenConcurrency,
  });
  process.exit(report.counts.failed > 0 ? 1 : 0);
}

main().catch((e) => reportFatal("synthesis", e));
