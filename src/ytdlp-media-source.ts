// Stream Courier - yt-dlp media source
// Resolves references with `yt-dlp -J` and fetches single formats with `yt-dlp -f`.
//
// Format mapping:
//   video codec + audio codec + height → VIDEO_PROGRESSIVE, tag "{height}p"
//   vcodec "none" + audio codec        → AUDIO_ONLY
//   anything else (video-only, storyboards) is dropped
// yt-dlp lists formats worst-first; the declared order here is best-first.

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { z } from "zod";
import { InvalidReferenceError, describeError } from "./errors.js";
import type { Logger } from "./logger.js";
import { createLogger } from "./logger.js";
import { StreamKind, type MediaRef, type MediaSource, type StreamDescriptor } from "./types.js";

const execFileAsync = promisify(execFile);

/** yt-dlp metadata for a long video easily exceeds the 1 MB default. */
const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

const UNSUPPORTED_REFERENCE = /Unsupported URL|is not a valid URL/i;

// ─── Process runner (injectable for tests) ──────────────────────────────────────

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (file: string, args: string[], signal: AbortSignal) => Promise<CommandOutput>;

export const runCommand: CommandRunner = async (file, args, signal) => {
  const { stdout, stderr } = await execFileAsync(file, args, {
    signal,
    maxBuffer: MAX_OUTPUT_BYTES,
    encoding: "utf8",
  });
  return { stdout, stderr };
};

// ─── Metadata schema ────────────────────────────────────────────────────────────

const FormatSchema = z.object({
  format_id: z.string().min(1),
  ext: z.string().default(""),
  vcodec: z.string().nullish(),
  acodec: z.string().nullish(),
  height: z.number().nullish(),
  fps: z.number().nullish(),
  filesize: z.number().nullish(),
  filesize_approx: z.number().nullish(),
});

const InfoSchema = z.object({
  id: z.string(),
  title: z.string().default("Untitled"),
  webpage_url: z.string().optional(),
  formats: z.array(FormatSchema).default([]),
});

export type YtDlpFormat = z.infer<typeof FormatSchema>;

function hasCodec(codec: string | null | undefined): boolean {
  return typeof codec === "string" && codec !== "" && codec !== "none";
}

/** Maps one yt-dlp format to a descriptor, or null when it is not offered. */
export function toDescriptor(format: YtDlpFormat): StreamDescriptor | null {
  const sizeBytes = Math.max(0, Math.round(format.filesize ?? format.filesize_approx ?? 0));

  if (hasCodec(format.vcodec) && hasCodec(format.acodec) && format.height) {
    return Object.freeze({
      resolutionTag: `${format.height}p`,
      fps: typeof format.fps === "number" ? Math.round(format.fps) : null,
      sizeBytes,
      kind: StreamKind.VIDEO_PROGRESSIVE,
      container: format.ext,
      sourceHandle: format.format_id,
    });
  }

  if (format.vcodec === "none" && hasCodec(format.acodec)) {
    return Object.freeze({
      resolutionTag: "",
      fps: null,
      sizeBytes,
      kind: StreamKind.AUDIO_ONLY,
      container: format.ext,
      sourceHandle: format.format_id,
    });
  }

  return null;
}

function stderrOf(error: unknown): string {
  if (error instanceof Error && "stderr" in error && typeof error.stderr === "string") {
    return error.stderr.trim();
  }
  return "";
}

/** Last "ERROR: ..." line of yt-dlp's stderr, else the error message. */
function toolFailure(error: unknown): Error {
  const lines = stderrOf(error).split("\n").filter((line) => line.startsWith("ERROR:"));
  const message = lines.length > 0 ? lines[lines.length - 1].replace(/^ERROR:\s*/, "") : describeError(error);
  return new Error(message, { cause: error });
}

// ─── YtDlpMediaSource ───────────────────────────────────────────────────────────

export interface YtDlpMediaSourceOptions {
  /** Path of the yt-dlp executable. Defaults to "yt-dlp" on PATH. */
  binary?: string;
  run?: CommandRunner;
  logger?: Logger;
}

export class YtDlpMediaSource implements MediaSource {
  private readonly binary: string;
  private readonly run: CommandRunner;
  private readonly logger: Logger;

  constructor(options: YtDlpMediaSourceOptions = {}) {
    this.binary = options.binary ?? "yt-dlp";
    this.run = options.run ?? runCommand;
    this.logger = options.logger ?? createLogger("YtDlpMediaSource");
  }

  async resolve(reference: string, signal: AbortSignal): Promise<MediaRef> {
    let stdout: string;
    try {
      ({ stdout } = await this.run(this.binary, ["-J", "--no-playlist", "--no-warnings", reference], signal));
    } catch (error) {
      if (UNSUPPORTED_REFERENCE.test(stderrOf(error))) {
        throw new InvalidReferenceError(reference, `"${reference}" is not a supported video URL`);
      }
      throw toolFailure(error);
    }

    let json: unknown;
    try {
      json = JSON.parse(stdout);
    } catch (error) {
      throw new Error("yt-dlp returned malformed metadata", { cause: error });
    }

    const parsed = InfoSchema.safeParse(json);
    if (!parsed.success) {
      throw new Error(
        `unexpected metadata from yt-dlp: ${parsed.error.issues.map((i) => `${i.path.join(".")} ${i.message}`).join(", ")}`,
      );
    }

    const info = parsed.data;
    const streams = info.formats
      .map(toDescriptor)
      .filter((descriptor): descriptor is StreamDescriptor => descriptor !== null)
      .reverse();

    this.logger.info(`Resolved ${info.id}: ${info.formats.length} formats, ${streams.length} usable`);
    return Object.freeze({
      reference: info.webpage_url ?? reference,
      id: info.id,
      title: info.title,
      streams: Object.freeze(streams),
    });
  }

  async fetch(
    mediaRef: MediaRef,
    descriptor: StreamDescriptor,
    destinationPath: string,
    signal: AbortSignal,
  ): Promise<void> {
    const args = [
      "-f", descriptor.sourceHandle,
      "-o", destinationPath,
      "--no-part",
      "--no-playlist",
      "--no-progress",
      "--no-warnings",
      "--quiet",
      mediaRef.reference,
    ];
    this.logger.info(`Fetching format ${descriptor.sourceHandle} of ${mediaRef.id}`);
    try {
      await this.run(this.binary, args, signal);
    } catch (error) {
      throw toolFailure(error);
    }
  }
}
