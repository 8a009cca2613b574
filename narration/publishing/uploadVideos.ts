import type { PipelineConfig } from "../config/pipelineConfig.js";
import { errorMessage } from "../lib/errors.js";
import { pipelineLogHelpers } from "../lib/pipelineLog.js";
import { LocalOnlyUploader } from "./localOnlyUploader.js";
import { RcloneUploader } from "./rcloneUploader.js";
import { SupabaseStorageUploader } from "./supabaseStorageUploader.js";
import type { Uploader } from "./types.js";

export type UploadSettings = Pick<PipelineConfig, "bookId" | "book" | "paths" | "upload">;

export type UploadOutcome =
  | { kind: "disabled" }
  | { kind: "uploaded"; uploader: string; destination: string; files: number }
  | { kind: "failed"; uploader: string; destination: string; reason: string };

export function createUploader(settings: UploadSettings, env: Record<string, string | undefined>): Uploader {
  switch (settings.upload.uploader) {
    case "rclone":
      return new RcloneUploader(settings.upload.rcloneRemote);
    case "supabase":
      return new SupabaseStorageUploader(settings.upload.supabaseBucket, env);
    case "local":
      return new LocalOnlyUploader();
  }
}

/**
 * Copy the video directory to the book's remote folder. Never throws: an
 * unreachable or misconfigured destination is reported and local outputs
 * stay as they are.
 */
export async function uploadVideos(params: { settings: UploadSettings; uploader: Uploader }): Promise<UploadOutcome> {
  const { settings, uploader } = params;
  const destination = settings.book.remoteFolder;

  if (!settings.upload.enabled) {
    console.log("[upload] disabled (set NARRATION_ENABLE_UPLOAD=true to enable)");
    return { kind: "disabled" };
  }

  pipelineLogHelpers.uploadStarted({ book_id: settings.bookId, destination, uploader: uploader.name });

  try {
    const result = await uploader.upload({ localDir: settings.paths.videosDir, destination });
    pipelineLogHelpers.uploadSucceeded({
      book_id: settings.bookId,
      destination: result.destination,
      uploader: uploader.name,
      files: result.files,
    });
    console.log(`[upload] ${result.files} video(s) copied to ${result.destination}`);
    return { kind: "uploaded", uploader: uploader.name, destination: result.destination, files: result.files };
  } catch (e) {
    const reason = errorMessage(e);
    pipelineLogHelpers.uploadFailed({
      book_id: settings.bookId,
      destination,
      error_code: e instanceof Error ? e.name : "upload_error",
      error_message: reason,
    });
    console.error(`[upload] failed: ${reason}`);
    return { kind: "failed", uploader: uploader.name, destination, reason };
  }
}
