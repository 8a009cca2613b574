import type { ErrorClass } from "./retryPolicy.js";

export type AudioClipStatus = "pending" | "generated" | "failed" | "suspect";

export type AudioClip = {
  chapter: number;
  path: string;
  durationSeconds: number;
  sizeBytes: number;
  status: AudioClipStatus;
};

export type SynthesisOutcome =
  | { kind: "generated"; chapter: number; clip: AudioClip; attempts: number }
  | { kind: "suspect"; chapter: number; clip: AudioClip; reason: string; attempts: number }
  | { kind: "failed"; chapter: number; reason: string; errorClass: ErrorClass; attempts: number }
  | { kind: "skipped"; chapter: number; clip: AudioClip };

export type SynthesisCounts = {
  requested: number;
  generated: number;
  suspect: number;
  failed: number;
  skipped: number;
};

export type SynthesisReport = {
  outcomes: SynthesisOutcome[];
  counts: SynthesisCounts;
};
