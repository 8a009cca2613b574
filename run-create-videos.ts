import "dotenv/config";
import { FfmpegMediaTool } from "./narration/media/ffmpegTool.js";
import { parseStageArgs } from "./narration/lib/cliArgs.js";
import { loadConfigFromEnv, reportFatal } from "./narration/runner/bootstrap.js";
import { createVideos } from "./narration/runner/runPipeline.js";

// Usage: tsx run-create-videos.ts [--start N] [--end N] [--only 3,7]
// --only re-renders the segments containing those chapters even if their video exists.
async function main() {
  const { selection } = parseStageArgs(process.argv.slice(2));
  const config = await loadConfigFromEnv(process.env);

  const { video } = await createVideos({ config, media: new FfmpegMediaTool(), selection });
  console.log(`[video] output directory: ${config.paths.videosDir}`);
  process.exit(video.counts.failed > 0 ? 1 : 0);
}

main().catch((e) => reportFatal("video", e));
