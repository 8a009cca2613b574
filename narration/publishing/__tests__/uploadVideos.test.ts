import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import type { PipelineConfig } from "../../config/pipelineConfig.js";
import type { CommandRunner } from "../../lib/commandRunner.js";
import { UpstreamUnavailableError } from "../../lib/errors.js";
import { makeConfig, makeWorkdir, removeWorkdir } from "../../__testutils__/fakes.js";
import { LocalOnlyUploader } from "../localOnlyUploader.js";
import { RcloneUploader } from "../rcloneUploader.js";
import { SupabaseStorageUploader, type StorageBucket } from "../supabaseStorageUploader.js";
import { createUploader, uploadVideos } from "../uploadVideos.js";

const mockFrom = vi.fn();

vi.mock("../../lib/supabaseClient.js", () => ({
  getSupabaseClient: () => ({ storage: { from: (bucket: string) => mockFrom(bucket) } }),
}));

function fakeRclone(remotes: string, failCopy = false) {
  const calls: Array<{ command: string; args: string[] }> = [];
  const run: CommandRunner = async (command, args) => {
    calls.push({ command, args });
    if (args[0] === "listremotes") return { stdout: remotes, stderr: "" };
    if (args[0] === "copy" && failCopy) throw new Error("Failed to copy: 403 Forbidden");
    return { stdout: "", stderr: "" };
  };
  return { run, calls };
}

describe("uploaders", () => {
  let workdir: string;
  let config: PipelineConfig;

  beforeEach(async () => {
    workdir = await makeWorkdir();
    config = makeConfig(workdir, { NARRATION_ENABLE_UPLOAD: "true" });
    await mkdir(config.paths.videosDir, { recursive: true });
    await writeFile(join(config.paths.videosDir, "002_ch4-4.mp4"), "video-2");
    await writeFile(join(config.paths.videosDir, "001_ch1-3.mp4"), "video-1");
    await writeFile(join(config.paths.videosDir, "003_ch5-5.partial.mp4"), "half");
    mockFrom.mockReset();
  });

  afterEach(async () => {
    await removeWorkdir(workdir);
  });

  describe("RcloneUploader", () => {
    it("copies finished videos to the configured remote", async () => {
      const { run, calls } = fakeRclone("gdrive:\nbackup:\n");
      const result = await new RcloneUploader("gdrive", run).upload({
        localDir: config.paths.videosDir,
        destination: "Audiobooks/Test",
      });

      expect(result).toEqual({ destination: "gdrive:Audiobooks/Test", files: 2 });
      expect(calls.map((c) => c.args[0])).toEqual(["version", "listremotes", "copy"]);
      expect(calls[2].args).toEqual([
        "copy",
        config.paths.videosDir,
        "gdrive:Audiobooks/Test",
        "--filter",
        "- *.partial.*",
        "--filter",
        "+ *.mp4",
        "--filter",
        "- *",
        "--transfers",
        "4",
      ]);
    });

    it("refuses when the remote is not configured", async () => {
      const { run, calls } = fakeRclone("backup:\n");
      await expect(
        new RcloneUploader("gdrive", run).upload({ localDir: config.paths.videosDir, destination: "x" })
      ).rejects.toThrow('rclone remote "gdrive:" is not configured (run: rclone config)');
      expect(calls.some((c) => c.args[0] === "copy")).toBe(false);
    });

    it("refuses when rclone is not installed", async () => {
      const run: CommandRunner = async () => {
        throw Object.assign(new Error("spawn rclone ENOENT"), { code: "ENOENT" });
      };
      await expect(
        new RcloneUploader("gdrive", run).upload({ localDir: config.paths.videosDir, destination: "x" })
      ).rejects.toBeInstanceOf(UpstreamUnavailableError);
    });
  });

  describe("SupabaseStorageUploader", () => {
    it("upserts each finished video under the destination folder", async () => {
      const upload = vi.fn<StorageBucket["upload"]>(async () => ({ error: null }));
      mockFrom.mockReturnValue({ upload });

      const result = await new SupabaseStorageUploader("videos", { SUPABASE_URL: "http://localhost" }).upload({
        localDir: config.paths.videosDir,
        destination: "Audiobooks/Test/",
      });

      expect(mockFrom).toHaveBeenCalledWith("videos");
      expect(result).toEqual({ destination: "videos/Audiobooks/Test/", files: 2 });
      expect(upload.mock.calls.map((c) => [c[0], c[1].toString(), c[2]])).toEqual([
        ["Audiobooks/Test/001_ch1-3.mp4", "video-1", { contentType: "video/mp4", upsert: true }],
        ["Audiobooks/Test/002_ch4-4.mp4", "video-2", { contentType: "video/mp4", upsert: true }],
      ]);
    });

    it("turns a storage error into an upstream failure", async () => {
      const bucket: StorageBucket = { upload: async () => ({ error: { message: "Bucket not found" } }) };
      const uploader = new SupabaseStorageUploader("videos", {}, () => bucket);

      await expect(uploader.upload({ localDir: config.paths.videosDir, destination: "a" })).rejects.toThrow(
        "Upload of 001_ch1-3.mp4 failed: Bucket not found"
      );
    });
  });

  describe("uploadVideos", () => {
    it("does nothing when uploads are disabled", async () => {
      const disabled = makeConfig(workdir, { NARRATION_ENABLE_UPLOAD: "false" });
      const uploader = new LocalOnlyUploader();
      const spy = vi.spyOn(uploader, "upload");

      expect(await uploadVideos({ settings: disabled, uploader })).toEqual({ kind: "disabled" });
      expect(spy).not.toHaveBeenCalled();
    });

    it("reports the uploaded file count", async () => {
      expect(await uploadVideos({ settings: config, uploader: new LocalOnlyUploader() })).toEqual({
        kind: "uploaded",
        uploader: "local-only",
        destination: "local:Audiobooks/Test",
        files: 2,
      });
    });

    it("reports a failure without throwing and leaves local files alone", async () => {
      const { run } = fakeRclone("gdrive:\n", true);
      const outcome = await uploadVideos({ settings: config, uploader: new RcloneUploader("gdrive", run) });

      expect(outcome).toEqual({
        kind: "failed",
        uploader: "rclone",
        destination: "Audiobooks/Test",
        reason: "rclone copy failed: Failed to copy: 403 Forbidden",
      });
    });

    it("builds the configured uploader", () => {
      expect(createUploader(config, {}).name).toBe("rclone");
      expect(createUploader(makeConfig(workdir, { NARRATION_UPLOADER: "local" }), {}).name).toBe("local-only");
      expect(createUploader(makeConfig(workdir, { NARRATION_UPLOADER: "supabase" }), {}).name).toBe("supabase");
    });
  });
});
