/**
 * Error model for the narration pipeline.
 *
 * Per-unit errors (one chapter, one segment, one upload) are caught at the
 * pool boundary and turned into outcomes. ConfigError and NoChaptersError
 * are the only run-fatal ones.
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class NoChaptersError extends Error {
  constructor(public dir: string) {
    super(`No chapter files found in ${dir}`);
    this.name = "NoChaptersError";
  }
}

export class TransientSynthesisError extends Error {
  constructor(
    public chapter: number,
    message: string,
    public errorClass: string = "tts_error"
  ) {
    super(message);
    this.name = "TransientSynthesisError";
  }
}

export class PreconditionError extends Error {
  constructor(public unit: string, message: string) {
    super(message);
    this.name = "PreconditionError";
  }
}

export class AssemblyError extends Error {
  constructor(public segmentId: number, message: string) {
    super(message);
    this.name = "AssemblyError";
  }
}

export class UpstreamUnavailableError extends Error {
  constructor(public destination: string, message: string) {
    super(message);
    this.name = "UpstreamUnavailableError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
