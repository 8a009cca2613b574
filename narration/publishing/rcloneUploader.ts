import { commandExists, execFileRunner, type CommandRunner } from "../lib/commandRunner.js";
import { UpstreamUnavailableError, errorMessage } from "../lib/errors.js";
import { listFinishedVideos } from "./listFinishedVideos.js";
import type { Uploader, UploadResult } from "./types.js";

/**
 * One-way copy through rclone (`rclone copy`, never `sync`: remote files
 * that are gone locally stay where they are).
 */
export class RcloneUploader implements Uploader {
  name = "rclone";

  constructor(
    private readonly remote: string,
    private readonly run: CommandRunner = execFileRunner,
    private readonly transfers: number = 4
  ) {}

  async upload(input: { localDir: string; destination: string }): Promise<UploadResult> {
    const target = `${this.remote}:${input.destination}`;

    if (!(await commandExists(this.run, "rclone", ["version"]))) {
      throw new UpstreamUnavailableError(target, "rclone is not installed");
    }

    let remotes: string;
    try {
      remotes = (await this.run("rclone", ["listremotes"])).stdout;
    } catch (e) {
      throw new UpstreamUnavailableError(target, `rclone listremotes failed: ${errorMessage(e)}`);
    }
    const configured = remotes.split(/\r?\n/).map((l) => l.trim());
    if (!configured.includes(`${this.remote}:`)) {
      throw new UpstreamUnavailableError(target, `rclone remote "${this.remote}:" is not configured (run: rclone config)`);
    }

    const files = await listFinishedVideos(input.localDir);

    try {
      await this.run("rclone", [
        "copy",
        input.localDir,
        target,
        "--filter",
        "- *.partial.*",
        "--filter",
        "+ *.mp4",
        "--filter",
        "- *",
        "--transfers",
        String(this.transfers),
      ]);
    } catch (e) {
      throw new UpstreamUnavailableError(target, `rclone copy failed: ${errorMessage(e)}`);
    }

    return { destination: target, files: files.length };
  }
}
