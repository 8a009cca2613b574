import type { PipelineConfig } from "../../config/pipelineConfig.js";
import { AzureSpeechSynthesizer } from "./azureSpeechTts.js";
import { EdgeTtsCliSynthesizer } from "./edgeTtsCli.js";
import type { SpeechSynthesizer } from "./types.js";

export function createSpeechSynthesizer(
  config: Pick<PipelineConfig, "ttsProvider">,
  env: Record<string, string | undefined>
): SpeechSynthesizer {
  switch (config.ttsProvider) {
    case "azure":
      return new AzureSpeechSynthesizer(env);
    case "edge-tts":
      return new EdgeTtsCliSynthesizer();
  }
}
