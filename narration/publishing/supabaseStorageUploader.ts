import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { getSupabaseClient } from "../lib/supabaseClient.js";
import { UpstreamUnavailableError, errorMessage } from "../lib/errors.js";
import { listFinishedVideos } from "./listFinishedVideos.js";
import type { Uploader, UploadResult } from "./types.js";

export type StorageBucket = {
  upload(
    path: string,
    body: Buffer,
    options: { contentType: string; upsert: boolean }
  ): Promise<{ error: { message: string } | null }>;
};

/**
 * Uploads each finished video into a Supabase storage bucket under the
 * book's remote folder. Upserts, so re-running after a partial upload is safe.
 */
export class SupabaseStorageUploader implements Uploader {
  name = "supabase";
  private readonly openBucket: () => StorageBucket;

  constructor(
    private readonly bucket: string,
    env: Record<string, string | undefined>,
    openBucket?: () => StorageBucket
  ) {
    this.openBucket = openBucket ?? (() => getSupabaseClient(env).storage.from(this.bucket));
  }

  async upload(input: { localDir: string; destination: string }): Promise<UploadResult> {
    const target = `${this.bucket}/${input.destination}`;

    let storage: StorageBucket;
    try {
      storage = this.openBucket();
    } catch (e) {
      throw new UpstreamUnavailableError(target, errorMessage(e));
    }

    const files = await listFinishedVideos(input.localDir);
    for (const name of files) {
      const bytes = await readFile(join(input.localDir, name));
      const remotePath = `${input.destination.replace(/\/+$/, "")}/${name}`;
      const { error } = await storage.upload(remotePath, bytes, { contentType: "video/mp4", upsert: true });
      if (error) {
        throw new UpstreamUnavailableError(target, `Upload of ${name} failed: ${error.message}`);
      }
      console.log(`[upload] ${name} -> ${this.bucket}/${remotePath}`);
    }

    return { destination: target, files: files.length };
  }
}
