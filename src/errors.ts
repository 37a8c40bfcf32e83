// Stream Courier - Error taxonomy
// Every failure a session can hit is one of these kinds. Components return
// them inside Result values; only collaborators (MediaSource, Transcoder,
// Outbox, fs) throw, and their exceptions are wrapped at the boundary.

import { StreamKind, type Result } from "./types.js";

export type WorkflowErrorKind =
  | "invalid_reference"
  | "metadata_fetch"
  | "no_streams"
  | "unknown_selector"
  | "size_limit_exceeded"
  | "download"
  | "transcode"
  | "delivery";

export abstract class WorkflowError extends Error {
  abstract readonly kind: WorkflowErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidReferenceError extends WorkflowError {
  readonly kind = "invalid_reference" as const;

  constructor(readonly reference: string, message = `"${reference}" is not a valid video URL`) {
    super(message);
  }
}

export class MetadataFetchError extends WorkflowError {
  readonly kind = "metadata_fetch" as const;
}

export class NoStreamsAvailableError extends WorkflowError {
  readonly kind = "no_streams" as const;

  constructor(readonly streamKind: StreamKind) {
    super(
      streamKind === StreamKind.VIDEO_PROGRESSIVE
        ? "No MP4 video streams available"
        : "No audio streams available",
    );
  }
}

export class UnknownSelectorError extends WorkflowError {
  readonly kind = "unknown_selector" as const;

  constructor(readonly tag: string) {
    super(`No stream found for ${tag}`);
  }
}

export class SizeLimitExceededError extends WorkflowError {
  readonly kind = "size_limit_exceeded" as const;

  constructor(
    readonly sizeBytes: number,
    readonly limitBytes: number,
    readonly overageBytes: number,
    readonly streamKind: StreamKind,
  ) {
    super(`File size ${sizeBytes} bytes exceeds the ${limitBytes} byte limit by ${overageBytes} bytes`);
  }
}

export class DownloadError extends WorkflowError {
  readonly kind = "download" as const;
}

export class TranscodeError extends WorkflowError {
  readonly kind = "transcode" as const;
}

export class DeliveryError extends WorkflowError {
  readonly kind = "delivery" as const;
}

export type SessionFailure =
  | InvalidReferenceError
  | MetadataFetchError
  | NoStreamsAvailableError
  | UnknownSelectorError
  | SizeLimitExceededError
  | DownloadError
  | TranscodeError
  | DeliveryError;

/** Raised at startup for invalid environment configuration. */
export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

// ─── Result helpers ─────────────────────────────────────────────────────────────

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/** Message of an unknown thrown value. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
