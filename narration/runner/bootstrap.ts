import { resolve } from "node:path";
import { loadBookCatalog, loadPipelineConfig, type PipelineConfig } from "../config/pipelineConfig.js";
import { createSpeechSynthesizer } from "../audio/speech/synthesizerFactory.js";
import { FfmpegMediaTool } from "../media/ffmpegTool.js";
import { createUploader } from "../publishing/uploadVideos.js";
import { ConfigError } from "../lib/errors.js";
import type { PipelineDeps } from "./runPipeline.js";

/**
 * Build the run configuration from the process environment. Entry scripts
 * call this once; nothing below them reads env.
 */
export async function loadConfigFromEnv(env: Record<string, string | undefined>): Promise<PipelineConfig> {
  const catalogPath = resolve(env.NARRATION_BOOKS_FILE ?? "books.json");
  const catalog = await loadBookCatalog(catalogPath);
  return loadPipelineConfig({ env, catalog });
}

export function createPipelineDeps(config: PipelineConfig, env: Record<string, string | undefined>): PipelineDeps {
  return {
    synthesizer: createSpeechSynthesizer(config, env),
    media: new FfmpegMediaTool(),
    uploader: createUploader(config, env),
  };
}

/** Exit code for a failed script: 2 for bad configuration, 1 otherwise. */
export function reportFatal(tag: string, e: unknown): never {
  const name = e instanceof Error ? e.name : "Error";
  console.error(`[${tag}] ${name}: ${e instanceof Error ? e.message : String(e)}`);
  process.exit(e instanceof ConfigError ? 2 : 1);
}
