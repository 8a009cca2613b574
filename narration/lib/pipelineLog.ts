/**
 * Structured logging for pipeline lifecycle events.
 *
 * Emits one JSON line per event next to the human-readable console output.
 */

export type PipelineLogEvent =
  | "chapter.synthesis.started"
  | "chapter.synthesis.succeeded"
  | "chapter.synthesis.suspect"
  | "chapter.synthesis.failed"
  | "chapter.synthesis.skipped"
  | "segment.render.started"
  | "segment.render.succeeded"
  | "segment.render.failed"
  | "segment.render.skipped"
  | "upload.started"
  | "upload.succeeded"
  | "upload.failed";

export type PipelineLogData = {
  event: PipelineLogEvent;
  book_id?: string;
  chapter?: number;
  segment_id?: number;
  attempt?: number;
  duration_seconds?: number;
  size_bytes?: number;
  path?: string;
  error_code?: string;
  error_message?: string;
  [key: string]: unknown;
};

export function pipelineLog(data: PipelineLogData): void {
  const logEntry = {
    timestamp: new Date().toISOString(),
    ...data,
  };

  console.log(JSON.stringify(logEntry));
}

export const pipelineLogHelpers = {
  synthesisStarted(params: { book_id: string; chapter: number; attempt: number }): void {
    pipelineLog({ event: "chapter.synthesis.started", ...params });
  },

  synthesisSucceeded(params: {
    book_id: string;
    chapter: number;
    attempt: number;
    duration_seconds: number;
    size_bytes: number;
    path: string;
  }): void {
    pipelineLog({ event: "chapter.synthesis.succeeded", ...params });
  },

  synthesisSuspect(params: {
    book_id: string;
    chapter: number;
    attempt: number;
    duration_seconds: number;
    expected_seconds: number;
    reason: string;
  }): void {
    pipelineLog({ event: "chapter.synthesis.suspect", ...params });
  },

  synthesisFailed(params: {
    book_id: string;
    chapter: number;
    attempt: number;
    error_code: string;
    error_message: string;
  }): void {
    pipelineLog({ event: "chapter.synthesis.failed", ...params });
  },

  synthesisSkipped(params: { book_id: string; chapter: number; path: string }): void {
    pipelineLog({ event: "chapter.synthesis.skipped", ...params });
  },

  renderStarted(params: { book_id: string; segment_id: number; chapters: number }): void {
    pipelineLog({ event: "segment.render.started", ...params });
  },

  renderSucceeded(params: { book_id: string; segment_id: number; duration_seconds: number; path: string }): void {
    pipelineLog({ event: "segment.render.succeeded", ...params });
  },

  renderFailed(params: { book_id: string; segment_id: number; error_code: string; error_message: string }): void {
    pipelineLog({ event: "segment.render.failed", ...params });
  },

  renderSkipped(params: { book_id: string; segment_id: number; path: string }): void {
    pipelineLog({ event: "segment.render.skipped", ...params });
  },

  uploadStarted(params: { book_id: string; destination: string; uploader: string }): void {
    pipelineLog({ event: "upload.started", ...params });
  },

  uploadSucceeded(params: { book_id: string; destination: string; uploader: string; files: number }): void {
    pipelineLog({ event: "upload.succeeded", ...params });
  },

  uploadFailed(params: { book_id: string; destination: string; error_code: string; error_message: string }): void {
    pipelineLog({ event: "upload.failed", ...params });
  },
};
