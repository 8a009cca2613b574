import { rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { execFileRunner, isErrnoException, type CommandRunner } from "../../lib/commandRunner.js";
import { PreconditionError, TransientSynthesisError } from "../../lib/errors.js";
import type { SpeechSynthesizer, SynthesisRequest } from "./types.js";

/**
 * Drives the `edge-tts` command line tool. Chapter text goes through a temp
 * file because whole chapters overflow a single argv entry.
 */
export class EdgeTtsCliSynthesizer implements SpeechSynthesizer {
  name = "edge-tts";

  constructor(
    private readonly run: CommandRunner = execFileRunner,
    private readonly binary: string = "edge-tts"
  ) {}

  async synthesize(request: SynthesisRequest): Promise<void> {
    const textPath = join(
      tmpdir(),
      `narration_ch${request.chapter}_${Date.now()}_${Math.random().toString(16).slice(2)}.txt`
    );

    try {
      await writeFile(textPath, request.text, "utf-8");

      await this.run(this.binary, [
        "--voice",
        request.voice,
        // "=" form so a negative rate is not read as a flag
        `--rate=${request.rate}`,
        "--file",
        textPath,
        "--write-media",
        request.outputPath,
      ]);
    } catch (e) {
      if (isErrnoException(e) && e.code === "ENOENT") {
        throw new PreconditionError(`chapter ${request.chapter}`, `${this.binary} is not installed`);
      }
      throw new TransientSynthesisError(
        request.chapter,
        `edge-tts failed: ${e instanceof Error ? e.message : String(e)}`
      );
    } finally {
      await rm(textPath, { force: true });
    }
  }
}
