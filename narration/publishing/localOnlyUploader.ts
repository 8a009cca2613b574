import type { Uploader, UploadResult } from "./types.js";
import { listFinishedVideos } from "./listFinishedVideos.js";

/**
 * No-op uploader for local runs and tests. Reports what would have been sent.
 */
export class LocalOnlyUploader implements Uploader {
  name = "local-only";

  async upload(input: { localDir: string; destination: string }): Promise<UploadResult> {
    const files = await listFinishedVideos(input.localDir);
    return {
      destination: `local:${input.destination}`,
      files: files.length,
      metadata: { note: "Local-only uploader: nothing was copied" },
    };
  }
}
