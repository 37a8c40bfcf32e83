// Stream Courier - Shared TypeScript interfaces and types
// Session state machine, stream catalog entries, intents and the collaborator
// interfaces (MediaSource, Transcoder, Outbox) the engine is wired against.

// ─── Session State Machine ──────────────────────────────────────────────────────

export enum ConversationState {
  AWAITING_URL = "awaiting_url",
  AWAITING_FORMAT = "awaiting_format",
  AWAITING_RESOLUTION = "awaiting_resolution",
}

// ─── Streams ────────────────────────────────────────────────────────────────────

export enum StreamKind {
  VIDEO_PROGRESSIVE = "video_progressive", // audio + video in one container
  AUDIO_ONLY = "audio_only",
}

export interface StreamDescriptor {
  /** "1080p", "720p"...; empty for audio-only encodings. */
  readonly resolutionTag: string;
  readonly fps: number | null;
  /** Declared size in bytes; 0 when the provider does not know it. */
  readonly sizeBytes: number;
  readonly kind: StreamKind;
  /** File extension of the encoding, e.g. "mp4" or "m4a". */
  readonly container: string;
  /** Provider token used to request the fetch (a yt-dlp format id). */
  readonly sourceHandle: string;
}

/** Opaque handle returned by a MediaSource for one resolved reference. */
export interface MediaRef {
  readonly reference: string;
  readonly id: string;
  readonly title: string;
  readonly streams: readonly StreamDescriptor[]; // provider-declared order
}

// ─── Session ────────────────────────────────────────────────────────────────────

export interface Session {
  id: string;
  state: ConversationState;
  mediaRef: MediaRef | null; // null only in AWAITING_URL
  catalog: readonly StreamDescriptor[] | null; // non-null only in AWAITING_RESOLUTION
}

/** Read-only copy handed to callers outside the engine. */
export type SessionSnapshot = Readonly<Session>;

// ─── Download artifacts ─────────────────────────────────────────────────────────

export type DeliveryKind = "video" | "audio";

export interface DownloadArtifact {
  path: string;
  kind: DeliveryKind;
  sizeBytes: number;
}

export interface DeliveryReceipt {
  kind: DeliveryKind;
  sizeBytes: number;
}

// ─── Inbound intents ────────────────────────────────────────────────────────────

export type Intent =
  | { type: "start" }
  | { type: "text"; reference: string }
  | { type: "select_video" }
  | { type: "select_audio" }
  | { type: "select_resolution"; tag: string }
  | { type: "cancel" }
  | { type: "unknown_command"; command: string };

// ─── Collaborators ──────────────────────────────────────────────────────────────

export interface MediaSource {
  /** Resolve a reference to metadata plus every enumerated encoding. */
  resolve(reference: string, signal: AbortSignal): Promise<MediaRef>;
  /** Fetch one encoding to `destinationPath`. */
  fetch(
    mediaRef: MediaRef,
    descriptor: StreamDescriptor,
    destinationPath: string,
    signal: AbortSignal,
  ): Promise<void>;
}

export interface TranscodeOptions {
  bitrateKbps: number;
  signal: AbortSignal;
}

export interface Transcoder {
  /** Produce a constant-bitrate MP3 at `outputPath`. */
  toMp3(inputPath: string, outputPath: string, options: TranscodeOptions): Promise<void>;
}

/** Outbound side of the messaging transport, bound to one conversation. */
export interface Outbox {
  reply(text: string): Promise<void>;
  /** Resolves once the transport confirms the send; rejects otherwise. */
  deliverFile(path: string, kind: DeliveryKind, signal: AbortSignal): Promise<void>;
}

// ─── Results ────────────────────────────────────────────────────────────────────

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}
