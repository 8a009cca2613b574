import "dotenv/config";
import { createUploader } from "./narration/publishing/uploadVideos.js";
import { loadConfigFromEnv, reportFatal } from "./narration/runner/bootstrap.js";
import { uploadStage } from "./narration/runner/runPipeline.js";

// Usage: tsx run-upload.ts
async function main() {
  const config = await loadConfigFromEnv(process.env);
  const outcome = await uploadStage({ config, uploader: createUploader(config, process.env) });
  process.exit(outcome.kind === "failed" ? 1 : 0);
}

main().catch((e) => reportFatal("upload", e));
