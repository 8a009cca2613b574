import "dotenv/config";
import { createSpeechSynthesizer } from "./narration/audio/speech/synthesizerFactory.js";
import { FfmpegMediaTool } from "./narration/media/ffmpegTool.js";
import { parseStageArgs } from "./narration/lib/cliArgs.js";
import { loadConfigFromEnv, reportFatal } from "./narration/runner/bootstrap.js";
import { generateAudio } from "./narration/runner/runPipeline.js";

// Usage: tsx run-gen-audio.ts [--start N] [--end N] [--only 3,7] [--concurrency N]
async function main() {
  const { selection, concurrency } = parseStageArgs(process.argv.slice(2));
  const config = await loadConfigFromEnv(process.env);

  const report = await generateAudio({
    config,
    deps: { synthesizer: createSpeechSynthesizer(config, process.env), media: new FfmpegMediaTool() },
    selection,
    concurrency: concurrency ?? undefined,
  });

  if (report.counts.suspect > 0) {
    console.log("[synthesis] suspect chapters can be regenerated with: npm run regen-audio");
  }
  process.exit(report.counts.failed > 0 ? 1 : 0);
}

main().catch((e) => reportFatal("synthesis", e));
