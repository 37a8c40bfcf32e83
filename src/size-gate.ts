// Stream Courier - Size Gate
// Admission check of an encoding's byte size against the delivery ceiling.
// Runs before any fetch; the orchestrator runs it again on the downloaded size.

import { SizeLimitExceededError } from "./errors.js";
import type { StreamKind } from "./types.js";

export type SizeVerdict =
  | { admitted: true }
  | { admitted: false; overageBytes: number };

/**
 * `sizeBytes <= limitBytes` is admitted; anything larger is rejected with the
 * number of bytes over the limit.
 */
export function admit(sizeBytes: number, limitBytes: number): SizeVerdict {
  if (sizeBytes <= limitBytes) {
    return { admitted: true };
  }
  return { admitted: false, overageBytes: sizeBytes - limitBytes };
}

/** The rejection for a stream the gate refuses, or null when it is admitted. */
export function checkSize(
  sizeBytes: number,
  limitBytes: number,
  streamKind: StreamKind,
): SizeLimitExceededError | null {
  const verdict = admit(sizeBytes, limitBytes);
  return verdict.admitted
    ? null
    : new SizeLimitExceededError(sizeBytes, limitBytes, verdict.overageBytes, streamKind);
}
