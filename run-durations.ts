import "dotenv/config";
import { writeFile } from "node:fs/promises";
import { FfmpegMediaTool } from "./narration/media/ffmpegTool.js";
import { formatRegenerateList, suspectChapters } from "./narration/durations/durationReport.js";
import { readDurationIndex } from "./narration/durations/durationIndex.js";
import { parseStageArgs } from "./narration/lib/cliArgs.js";
import { loadConfigFromEnv, reportFatal } from "./narration/runner/bootstrap.js";
import { measureDurations } from "./narration/runner/runPipeline.js";

// Usage:
//   tsx run-durations.ts [--start N] [--end N] [--only 3,7] [--write-regen-list]
//   tsx run-durations.ts --suspects     print suspect chapters from the existing index
async function main() {
  const { selection, flags } = parseStageArgs(process.argv.slice(2));
  const config = await loadConfigFromEnv(process.env);

  if (flags.has("suspects")) {
    const records = await readDurationIndex(config.paths.durationIndex);
    for (const chapter of suspectChapters(records)) console.log(chapter);
    return;
  }

  const analysis = await measureDurations({ config, media: new FfmpegMediaTool(), selection });

  if (flags.has("write-regen-list")) {
    const suspects = suspectChapters(analysis.records);
    await writeFile(config.paths.regenerateList, formatRegenerateList(suspects), "utf-8");
    console.log(`[durations] wrote ${suspects.length} chapter(s) to ${config.paths.regenerateList}`);
  }
}

main().catch((e) => reportFatal("durations", e));
