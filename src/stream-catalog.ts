// Stream Courier - Stream Catalog
// Resolves references through the MediaSource and turns its encodings into
// the listings a user picks from.
//
// Ordering of progressive video (deterministic, duplicates kept):
//   1. resolution height descending ("1080p" → 1080; unparseable tags last)
//   2. declared fps descending (unknown fps ranks as 0)
//   3. declared size descending
//   4. provider-declared order

import {
  InvalidReferenceError,
  MetadataFetchError,
  NoStreamsAvailableError,
  UnknownSelectorError,
  describeError,
  err,
  ok,
} from "./errors.js";
import type { Logger } from "./logger.js";
import { createLogger } from "./logger.js";
import { StreamKind, type MediaRef, type MediaSource, type Result, type StreamDescriptor } from "./types.js";
import { formatMegabytes, withTimeout } from "./utils.js";

/** Progressive encodings are only offered in this container. */
const PROGRESSIVE_CONTAINER = "mp4";

// ─── Ordering ───────────────────────────────────────────────────────────────────

/**
 * Numeric height of a resolution tag: "1080p" → 1080, "720p60" → 720.
 * Returns -1 for empty or unparseable tags.
 */
export function resolutionHeight(tag: string): number {
  const match = /^(\d+)p/i.exec(tag.trim());
  return match ? Number.parseInt(match[1], 10) : -1;
}

interface IndexedStream {
  descriptor: StreamDescriptor;
  index: number;
}

function compareIndexed(a: IndexedStream, b: IndexedStream): number {
  return (
    resolutionHeight(b.descriptor.resolutionTag) - resolutionHeight(a.descriptor.resolutionTag) ||
    (b.descriptor.fps ?? 0) - (a.descriptor.fps ?? 0) ||
    b.descriptor.sizeBytes - a.descriptor.sizeBytes ||
    a.index - b.index
  );
}

/** Sorts a copy of `streams` in catalog order. */
export function sortProgressive(streams: readonly StreamDescriptor[]): StreamDescriptor[] {
  return streams
    .map((descriptor, index) => ({ descriptor, index }))
    .sort(compareIndexed)
    .map((entry) => entry.descriptor);
}

// ─── Lookup and presentation ────────────────────────────────────────────────────

/**
 * First catalog entry carrying `tag`. With duplicate labels this is the
 * highest-ranked one (highest fps, then largest).
 */
export function findByTag(
  catalog: readonly StreamDescriptor[],
  tag: string,
): Result<StreamDescriptor, UnknownSelectorError> {
  const match = catalog.find((descriptor) => descriptor.resolutionTag === tag);
  return match ? ok(match) : err(new UnknownSelectorError(tag));
}

/** The provider lists its preferred audio encoding first. */
export function pickAudio(streams: readonly [StreamDescriptor, ...StreamDescriptor[]]): StreamDescriptor {
  return streams[0];
}

/**
 * One line per entry:
 *   1. 1080p @30fps (60.00 MB) - /res_1080p
 */
export function formatCatalogListing(catalog: readonly StreamDescriptor[]): string {
  return catalog
    .map((descriptor, i) => {
      const label = descriptor.resolutionTag || "Unknown";
      const fps = descriptor.fps !== null ? ` @${descriptor.fps}fps` : "";
      return `${i + 1}. ${label}${fps} (${formatMegabytes(descriptor.sizeBytes)} MB) - /res_${descriptor.resolutionTag}`;
    })
    .join("\n");
}

function isHttpUrl(reference: string): boolean {
  try {
    const url = new URL(reference);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

function nonEmpty(
  streams: StreamDescriptor[],
): streams is [StreamDescriptor, ...StreamDescriptor[]] {
  return streams.length > 0;
}

// ─── StreamCatalog ──────────────────────────────────────────────────────────────

export interface StreamCatalogOptions {
  /** Timeout for one metadata resolution. */
  timeoutMs: number;
  logger?: Logger;
}

export class StreamCatalog {
  private readonly logger: Logger;

  constructor(
    private readonly source: MediaSource,
    private readonly options: StreamCatalogOptions,
  ) {
    this.logger = options.logger ?? createLogger("StreamCatalog");
  }

  /**
   * Resolves a user-supplied reference. Text that is not an http(s) URL is
   * rejected without contacting the source.
   */
  async resolveMedia(
    reference: string,
    signal?: AbortSignal,
  ): Promise<Result<MediaRef, InvalidReferenceError | MetadataFetchError>> {
    const trimmed = reference.trim();
    if (!isHttpUrl(trimmed)) {
      return err(new InvalidReferenceError(trimmed));
    }

    try {
      const mediaRef = await withTimeout(
        (timeoutSignal) => this.source.resolve(trimmed, timeoutSignal),
        this.options.timeoutMs,
        signal,
      );
      this.logger.info(`Resolved ${trimmed}: "${mediaRef.title}" (${mediaRef.streams.length} encodings)`);
      return ok(mediaRef);
    } catch (error) {
      if (error instanceof InvalidReferenceError) {
        return err(error);
      }
      this.logger.warn(`Metadata fetch failed for ${trimmed}: ${describeError(error)}`);
      return err(new MetadataFetchError(describeError(error), { cause: error }));
    }
  }

  /** MP4 encodings carrying audio and video, in catalog order. */
  listProgressiveVideo(
    mediaRef: MediaRef,
  ): Result<readonly [StreamDescriptor, ...StreamDescriptor[]], NoStreamsAvailableError> {
    const sorted = sortProgressive(
      mediaRef.streams.filter(
        (s) => s.kind === StreamKind.VIDEO_PROGRESSIVE && s.container.toLowerCase() === PROGRESSIVE_CONTAINER,
      ),
    );
    return nonEmpty(sorted)
      ? ok(Object.freeze(sorted))
      : err(new NoStreamsAvailableError(StreamKind.VIDEO_PROGRESSIVE));
  }

  /** Audio-only encodings in provider-declared order. */
  listAudioOnly(
    mediaRef: MediaRef,
  ): Result<readonly [StreamDescriptor, ...StreamDescriptor[]], NoStreamsAvailableError> {
    const audio = mediaRef.streams.filter((s) => s.kind === StreamKind.AUDIO_ONLY);
    return nonEmpty(audio)
      ? ok(Object.freeze(audio))
      : err(new NoStreamsAvailableError(StreamKind.AUDIO_ONLY));
  }
}
