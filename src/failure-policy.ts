// Stream Courier - Failure policy
// One reply template and one next-state rule per failure kind.

import type { SessionFailure } from "./errors.js";
import { StreamKind } from "./types.js";
import { formatMegabytes } from "./utils.js";

/**
 * restart  → session cleared, back to AWAITING_URL
 * reselect → stay in AWAITING_RESOLUTION with the catalog intact
 */
export type FailureDisposition = "restart" | "reselect";

export interface FailureOutcome {
  reply: string;
  disposition: FailureDisposition;
}

export function describeFailure(e: SessionFailure): FailureOutcome {
  switch (e.kind) {
    case "invalid_reference":
      return {
        reply: `Error: ${e.message}. Send a video URL to try again.`,
        disposition: "restart",
      };
    case "metadata_fetch":
      return {
        reply: `Error: Could not fetch video details. Try again. (${e.message})`,
        disposition: "restart",
      };
    case "no_streams":
      return {
        reply: `${e.message} for this video. Send another URL.`,
        disposition: "restart",
      };
    case "unknown_selector":
      return {
        reply: `No stream found for ${e.tag}. Try another resolution.`,
        disposition: "reselect",
      };
    case "size_limit_exceeded": {
      const hint =
        e.streamKind === StreamKind.VIDEO_PROGRESSIVE
          ? "Choose a lower resolution or /cancel."
          : "Send another URL or /cancel.";
      return {
        reply:
          `File size (${formatMegabytes(e.sizeBytes)} MB) exceeds the ${formatMegabytes(e.limitBytes)} MB ` +
          `delivery limit by ${formatMegabytes(e.overageBytes)} MB. ${hint}`,
        disposition: "reselect",
      };
    }
    case "download":
      return { reply: `Error downloading: ${e.message}`, disposition: "restart" };
    case "transcode":
      return { reply: `Error converting audio to MP3: ${e.message}`, disposition: "restart" };
    case "delivery":
      return { reply: `Error sending file: ${e.message}`, disposition: "restart" };
    default: {
      const unreachable: never = e;
      throw new Error(`Unhandled failure kind: ${String(unreachable)}`);
    }
  }
}
