import { PreconditionError, TransientSynthesisError } from "../../lib/errors.js";

export type RetryDecision = { shouldRetry: boolean; backoffMs: number };

export type ErrorClass =
  | "tts_rate_limited"
  | "tts_timeout"
  | "tts_network"
  | "tts_empty_output"
  | "qa_too_short"
  | "precondition"
  | "worker_error";

export function classifyError(e: unknown): { errorClass: ErrorClass; message: string } {
  const message = e instanceof Error ? e.message : String(e);
  const lower = message.toLowerCase();

  if (e instanceof PreconditionError) return { errorClass: "precondition", message };
  if (e instanceof TransientSynthesisError && e.errorClass === "tts_empty_output") {
    return { errorClass: "tts_empty_output", message };
  }

  if (message.includes("429") || lower.includes("rate limit") || lower.includes("too many requests")) {
    return { errorClass: "tts_rate_limited", message };
  }
  if (lower.includes("timeout") || lower.includes("etimedout") || lower.includes("timed out")) {
    return { errorClass: "tts_timeout", message };
  }
  if (lower.includes("fetch") || lower.includes("network") || lower.includes("econnreset") || lower.includes("enotfound")) {
    return { errorClass: "tts_network", message };
  }
  if (lower.includes("empty")) return { errorClass: "tts_empty_output", message };

  return { errorClass: "worker_error", message };
}

/**
 * Bounded retry with exponential backoff. `attempt` is 1-based.
 * Missing inputs are never retried: the same call would fail the same way.
 * Every other failure of the external service is retried with the same
 * parameters, including short output, since truncation is not signalled.
 */
export function decideRetry(params: {
  attempt: number;
  maxAttempts: number;
  errorClass: ErrorClass;
  baseMs: number;
}): RetryDecision {
  if (params.attempt >= params.maxAttempts) return { shouldRetry: false, backoffMs: 0 };
  if (params.errorClass === "precondition") return { shouldRetry: false, backoffMs: 0 };

  return { shouldRetry: true, backoffMs: params.baseMs * 2 ** (params.attempt - 1) };
}

export async function sleep(ms: number) {
  if (ms <= 0) return;
  await new Promise((r) => setTimeout(r, ms));
}
