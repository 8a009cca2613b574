/**
 * Upload adapter interface.
 *
 * Implementations copy the local video directory one way to a remote
 * destination. Local files are never modified.
 */
export type UploadResult = {
  destination: string;
  files: number;
  metadata?: Record<string, unknown>;
};

export interface Uploader {
  name: string;

  /**
   * Copy every finished video under `localDir` to `destination`.
   * Rejects with UpstreamUnavailableError when the remote cannot be reached
   * or is not configured.
   */
  upload(input: { localDir: string; destination: string }): Promise<UploadResult>;
}
