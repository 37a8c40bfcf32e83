// Stream Courier - Download Orchestrator
// Fetches a chosen encoding into session scratch space, transcodes audio to
// MP3, and hands the result to the transport for delivery.
//
// Pipeline per branch:
//   video: fetch → size re-check → deliver
//   audio: fetch raw → size re-check → MP3 transcode → drop raw → deliver
//
// Every collaborator call runs under the operation timeout. When a run*()
// call returns, the session's scratch directory is gone, whatever the outcome.

import { stat } from "node:fs/promises";
import type { CleanupManager, ScratchScope } from "./cleanup-manager.js";
import {
  DeliveryError,
  DownloadError,
  SizeLimitExceededError,
  TranscodeError,
  describeError,
  err,
  ok,
} from "./errors.js";
import type { Logger } from "./logger.js";
import { createLogger } from "./logger.js";
import { checkSize } from "./size-gate.js";
import type {
  DeliveryReceipt,
  DownloadArtifact,
  MediaRef,
  MediaSource,
  Outbox,
  Result,
  StreamDescriptor,
  Transcoder,
} from "./types.js";
import { withTimeout } from "./utils.js";

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface OrchestratorConfig {
  maxDeliveryBytes: number;
  operationTimeoutMs: number;
  audioBitrateKbps: number;
}

export interface DownloadOrchestratorDeps {
  mediaSource: MediaSource;
  transcoder: Transcoder;
  cleanup: CleanupManager;
  config: OrchestratorConfig;
  logger?: Logger;
}

export interface PipelineRequest {
  sessionId: string;
  mediaRef: MediaRef;
  descriptor: StreamDescriptor;
  outbox: Outbox;
  /** Aborts the pipeline (process shutdown). */
  signal?: AbortSignal;
}

export type VideoFailure = DownloadError | SizeLimitExceededError | DeliveryError;
export type AudioFailure = DownloadError | SizeLimitExceededError | TranscodeError | DeliveryError;

export class DownloadOrchestrator {
  private readonly logger: Logger;

  constructor(private readonly deps: DownloadOrchestratorDeps) {
    this.logger = deps.logger ?? createLogger("DownloadOrchestrator");
  }

  // ─── Full pipelines ─────────────────────────────────────────────────────────

  async runVideo(request: PipelineRequest): Promise<Result<DeliveryReceipt, VideoFailure>> {
    return this.inScope<VideoFailure>(request, async (scope) => {
      const artifact = await this.fetchVideo(request, scope);
      if (!artifact.ok) return artifact;

      await this.notify(request.outbox, `Downloaded ${request.descriptor.resolutionTag} video! Sending...`);
      return this.deliver(artifact.value, request, scope);
    });
  }

  async runAudio(request: PipelineRequest): Promise<Result<DeliveryReceipt, AudioFailure>> {
    return this.inScope<AudioFailure>(request, async (scope) => {
      const artifact = await this.fetchAudioAndTranscode(request, scope);
      if (!artifact.ok) return artifact;

      await this.notify(request.outbox, "Converted audio to MP3! Sending...");
      return this.deliver(artifact.value, request, scope);
    });
  }

  // ─── Steps ──────────────────────────────────────────────────────────────────

  async fetchVideo(
    request: PipelineRequest,
    scope: ScratchScope,
  ): Promise<Result<DownloadArtifact, DownloadError | SizeLimitExceededError>> {
    const videoPath = scope.allocate(request.descriptor.container || "mp4");

    const fetched = await this.download(request, videoPath);
    if (!fetched.ok) {
      await scope.discard(videoPath);
      return fetched;
    }

    const rejection = this.recheckSize(request.descriptor, fetched.value);
    if (rejection) {
      await scope.discard(videoPath);
      return err(rejection);
    }

    return ok<DownloadArtifact>({ path: videoPath, kind: "video", sizeBytes: fetched.value });
  }

  /**
   * Fetches the raw audio and converts it to a constant-bitrate MP3.
   * Only the MP3 is left registered in `scope` on success; nothing on failure.
   */
  async fetchAudioAndTranscode(
    request: PipelineRequest,
    scope: ScratchScope,
  ): Promise<Result<DownloadArtifact, DownloadError | SizeLimitExceededError | TranscodeError>> {
    const rawPath = scope.allocate(request.descriptor.container || "m4a");

    const fetched = await this.download(request, rawPath);
    if (!fetched.ok) {
      await scope.discard(rawPath);
      return fetched;
    }

    const rejection = this.recheckSize(request.descriptor, fetched.value);
    if (rejection) {
      await scope.discard(rawPath);
      return err(rejection);
    }

    const mp3Path = scope.allocate("mp3");
    const { audioBitrateKbps, operationTimeoutMs } = this.deps.config;
    try {
      await withTimeout(
        (signal) => this.deps.transcoder.toMp3(rawPath, mp3Path, { bitrateKbps: audioBitrateKbps, signal }),
        operationTimeoutMs,
        request.signal,
      );
    } catch (error) {
      this.logger.warn(`Transcode failed for session ${request.sessionId}: ${describeError(error)}`);
      await scope.discard(rawPath);
      await scope.discard(mp3Path);
      return err(new TranscodeError(describeError(error), { cause: error }));
    }

    await scope.discard(rawPath);

    const mp3Size = await sizeOf(mp3Path);
    if (mp3Size === null) {
      await scope.discard(mp3Path);
      return err(new TranscodeError("transcoder produced no output file"));
    }

    return ok<DownloadArtifact>({ path: mp3Path, kind: "audio", sizeBytes: mp3Size });
  }

  /**
   * Sends the artifact through the outbox, then deletes it whether the send
   * succeeded or not.
   */
  async deliver(
    artifact: DownloadArtifact,
    request: PipelineRequest,
    scope: ScratchScope,
  ): Promise<Result<DeliveryReceipt, DeliveryError>> {
    scope.handOff(artifact.path);
    try {
      await withTimeout(
        (signal) => request.outbox.deliverFile(artifact.path, artifact.kind, signal),
        this.deps.config.operationTimeoutMs,
        request.signal,
      );
      this.logger.info(`Delivered ${artifact.kind} (${artifact.sizeBytes} bytes) to session ${request.sessionId}`);
      return ok({ kind: artifact.kind, sizeBytes: artifact.sizeBytes });
    } catch (error) {
      this.logger.warn(`Delivery failed for session ${request.sessionId}: ${describeError(error)}`);
      return err(new DeliveryError(describeError(error), { cause: error }));
    } finally {
      await scope.discard(artifact.path);
    }
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private async inScope<E>(
    request: PipelineRequest,
    work: (scope: ScratchScope) => Promise<Result<DeliveryReceipt, E>>,
  ): Promise<Result<DeliveryReceipt, E | DownloadError>> {
    try {
      return await this.deps.cleanup.withScope(request.sessionId, work);
    } catch (error) {
      this.logger.error(`Pipeline error for session ${request.sessionId}: ${describeError(error)}`);
      return err(new DownloadError(describeError(error), { cause: error }));
    }
  }

  /** Fetches to `path`; yields the size on disk. */
  private async download(request: PipelineRequest, path: string): Promise<Result<number, DownloadError>> {
    const { mediaRef, descriptor } = request;
    try {
      await withTimeout(
        (signal) => this.deps.mediaSource.fetch(mediaRef, descriptor, path, signal),
        this.deps.config.operationTimeoutMs,
        request.signal,
      );
    } catch (error) {
      this.logger.warn(`Fetch of ${descriptor.sourceHandle} failed for session ${request.sessionId}: ${describeError(error)}`);
      return err(new DownloadError(describeError(error), { cause: error }));
    }

    const size = await sizeOf(path);
    if (size === null) {
      return err(new DownloadError("source produced no file"));
    }
    return ok(size);
  }

  /** Re-applies the size gate when the bytes on disk differ from the declared size. */
  private recheckSize(descriptor: StreamDescriptor, actualBytes: number): SizeLimitExceededError | null {
    if (actualBytes === descriptor.sizeBytes) return null;

    return checkSize(actualBytes, this.deps.config.maxDeliveryBytes, descriptor.kind);
  }

  private async notify(outbox: Outbox, text: string): Promise<void> {
    try {
      await outbox.reply(text);
    } catch (error) {
      this.logger.warn(`Failed to send progress reply: ${describeError(error)}`);
    }
  }
}

async function sizeOf(path: string): Promise<number | null> {
  try {
    const info = await stat(path);
    return info.isFile() ? info.size : null;
  } catch {
    return null;
  }
}
