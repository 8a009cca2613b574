import "dotenv/config";
import { parseStageArgs } from "./narration/lib/cliArgs.js";
import { createPipelineDeps, loadConfigFromEnv, reportFatal } from "./narration/runner/bootstrap.js";
import { runPipeline } from "./narration/runner/runPipeline.js";

// Usage: tsx run-pipeline.ts [--start N] [--end N] [--only 3,7]
async function main() {
  const { selection } = parseStageArgs(process.argv.slice(2));
  const config = await loadConfigFromEnv(process.env);
  const deps = createPipelineDeps(config, process.env);

  const started = Date.now();
  const { ok } = await runPipeline({ config, deps, selection });
  console.log(`[pipeline] finished in ${((Date.now() - started) / 60000).toFixed(1)} min`);
  process.exit(ok ? 0 : 1);
}

main().catch((e) => reportFatal("pipeline", e));
