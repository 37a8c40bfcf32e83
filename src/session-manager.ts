// Stream Courier - Session Manager
// Conversation state machine: owns every Session, checks each intent against
// the session's state and drives the catalog, size gate and download pipeline.
//
// Sessions are keyed by user id and created on first contact. Intents for one
// user are serialized by a per-user lock; a second intent waits behind the one
// in flight (the user is told it is queued). Different users never wait on
// each other.

import type { CleanupManager } from "./cleanup-manager.js";
import { APP_NAME } from "./config.js";
import type { DownloadOrchestrator } from "./download-orchestrator.js";
import { describeError, type SessionFailure } from "./errors.js";
import { describeFailure } from "./failure-policy.js";
import type { Logger } from "./logger.js";
import { createLogger } from "./logger.js";
import { KeyedMutex } from "./session-lock.js";
import { checkSize } from "./size-gate.js";
import { findByTag, formatCatalogListing, pickAudio, type StreamCatalog } from "./stream-catalog.js";
import {
  ConversationState,
  type Intent,
  type MediaRef,
  type Outbox,
  type Session,
  type SessionSnapshot,
  type StreamDescriptor,
} from "./types.js";

// ─── Replies ────────────────────────────────────────────────────────────────────

export const REPLIES = {
  welcome: `Welcome to ${APP_NAME}! Send a video URL to begin.`,
  cancelled: "Operation cancelled. Use /start to begin again.",
  done: "Done! Send another URL or /cancel to stop.",
  queued: "Still working on your previous request. This one will run when it finishes.",
  noMedia: "No video selected. Send a video URL first.",
  unexpected: "An unexpected error occurred. Send a video URL to start over.",
  shuttingDown: "The service is shutting down. Please try again later.",
} as const;

/** The single reply for an intent the current state does not accept. */
export function guidanceFor(state: ConversationState): string {
  switch (state) {
    case ConversationState.AWAITING_URL:
      return "Send a video URL to begin, or /cancel to stop.";
    case ConversationState.AWAITING_FORMAT:
      return "Choose format: /video (MP4) or /audio (MP3), or /cancel.";
    case ConversationState.AWAITING_RESOLUTION:
      return "Select a resolution by typing its command (e.g., /res_720p), or /cancel.";
  }
}

export function formatResolutionPrompt(catalog: readonly [StreamDescriptor, ...StreamDescriptor[]]): string {
  return (
    `Available resolutions:\n${formatCatalogListing(catalog)}\n\n` +
    `Select a resolution by typing the command (e.g., /res_${catalog[0].resolutionTag}).`
  );
}

// ─── Session transitions ────────────────────────────────────────────────────────
// The only writers of Session fields. Each keeps:
//   catalog !== null  ⇔  state === AWAITING_RESOLUTION
//   mediaRef !== null ⇔  state !== AWAITING_URL

function resetSession(session: Session): void {
  session.state = ConversationState.AWAITING_URL;
  session.mediaRef = null;
  session.catalog = null;
}

function enterFormat(session: Session, mediaRef: MediaRef): void {
  session.state = ConversationState.AWAITING_FORMAT;
  session.mediaRef = mediaRef;
  session.catalog = null;
}

function enterResolution(session: Session, catalog: readonly StreamDescriptor[]): void {
  session.state = ConversationState.AWAITING_RESOLUTION;
  session.catalog = catalog;
}

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface SessionManagerDeps {
  catalog: StreamCatalog;
  orchestrator: DownloadOrchestrator;
  cleanup: CleanupManager;
  /** Size gate limit in bytes. */
  maxDeliveryBytes: number;
  logger?: Logger;
}

/**
 * Transitions:
 *
 * AWAITING_URL        → AWAITING_FORMAT:     text(reference) resolved
 * AWAITING_FORMAT     → AWAITING_RESOLUTION: select_video with a non-empty catalog
 * AWAITING_FORMAT     → AWAITING_URL:        select_audio (whatever the outcome), or no video streams
 * AWAITING_RESOLUTION → AWAITING_URL:        select_resolution delivered, or download/delivery failed
 * AWAITING_RESOLUTION → AWAITING_RESOLUTION: unknown tag or size gate rejection
 *
 * start and cancel clear the session from ANY state → AWAITING_URL
 */
export class SessionManager {
  private readonly sessions: Map<string, Session> = new Map();
  private readonly locks = new KeyedMutex();
  private readonly inFlight: Map<string, AbortController> = new Map();
  private readonly deps: SessionManagerDeps;
  private readonly logger: Logger;
  private shuttingDown = false;

  constructor(deps: SessionManagerDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? createLogger("SessionManager");
  }

  /**
   * Processes one intent for `userId`, replying through `outbox`.
   * Never rejects: every failure ends in a reply and a defined state.
   */
  async handle(userId: string, intent: Intent, outbox: Outbox): Promise<void> {
    if (this.shuttingDown) {
      await this.reply(outbox, REPLIES.shuttingDown);
      return;
    }
    if (this.locks.isLocked(userId)) {
      await this.reply(outbox, REPLIES.queued);
    }

    await this.locks.runExclusive(userId, async () => {
      // shutdown() may have started while this intent was queued.
      if (this.shuttingDown) {
        await this.reply(outbox, REPLIES.shuttingDown);
        return;
      }
      const session = this.getOrCreateSession(userId);
      const controller = new AbortController();
      this.inFlight.set(userId, controller);
      try {
        await this.dispatch(session, intent, outbox, controller.signal);
      } catch (error) {
        this.logger.error(`Unexpected error in session ${userId} handling ${intent.type}: ${describeError(error)}`);
        resetSession(session);
        await this.reply(outbox, REPLIES.unexpected);
      } finally {
        this.inFlight.delete(userId);
      }
    });
  }

  /** A copy of the user's session, or undefined before first contact. */
  snapshot(userId: string): SessionSnapshot | undefined {
    const session = this.sessions.get(userId);
    return session ? { ...session } : undefined;
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  /**
   * Forgets the user's session once every intent queued for it has run.
   * Only an idle session (AWAITING_URL) is dropped, unless `discard` is set:
   * then the running pipeline is aborted and the session dropped in any state.
   *
   * @returns whether a session was removed
   */
  async release(userId: string, { discard = false }: { discard?: boolean } = {}): Promise<boolean> {
    if (discard) {
      this.inFlight.get(userId)?.abort();
    }
    return this.locks.runExclusive(userId, async () => {
      const session = this.sessions.get(userId);
      if (!session) return false;
      if (!discard && session.state !== ConversationState.AWAITING_URL) return false;

      this.sessions.delete(userId);
      await this.deps.cleanup.purgeSession(userId);
      this.logger.info(`Session ${userId} released`);
      return true;
    });
  }

  /**
   * Refuses new and queued intents, aborts running pipelines (their scratch cleanup
   * still runs) and waits until the lock queues are empty.
   */
  async shutdown(): Promise<void> {
    this.shuttingDown = true;
    for (const [userId, controller] of this.inFlight) {
      this.logger.info(`Aborting in-flight operation for session ${userId}`);
      controller.abort();
    }
    await this.locks.drain();
  }

  // ─── Dispatch ───────────────────────────────────────────────────────────────

  private getOrCreateSession(userId: string): Session {
    let session = this.sessions.get(userId);
    if (!session) {
      session = { id: userId, state: ConversationState.AWAITING_URL, mediaRef: null, catalog: null };
      this.sessions.set(userId, session);
      this.logger.info(`Session ${userId} created`);
    }
    return session;
  }

  private async dispatch(session: Session, intent: Intent, outbox: Outbox, signal: AbortSignal): Promise<void> {
    switch (intent.type) {
      case "start":
        resetSession(session);
        await this.reply(outbox, REPLIES.welcome);
        return;
      case "cancel":
        await this.cancel(session, outbox);
        return;
      case "text":
        if (session.state === ConversationState.AWAITING_URL) {
          return this.receiveReference(session, intent.reference, outbox, signal);
        }
        break;
      case "select_video":
        if (session.state === ConversationState.AWAITING_FORMAT) {
          return this.selectVideo(session, outbox);
        }
        break;
      case "select_audio":
        if (session.state === ConversationState.AWAITING_FORMAT) {
          return this.deliverAudio(session, outbox, signal);
        }
        break;
      case "select_resolution":
        if (session.state === ConversationState.AWAITING_RESOLUTION) {
          return this.deliverVideo(session, intent.tag, outbox, signal);
        }
        break;
      case "unknown_command":
        break;
    }

    this.logger.info(`Rejected ${intent.type} in state "${session.state}" for session ${session.id}`);
    await this.reply(outbox, guidanceFor(session.state));
  }

  // ─── Handlers ───────────────────────────────────────────────────────────────

  private async receiveReference(
    session: Session,
    reference: string,
    outbox: Outbox,
    signal: AbortSignal,
  ): Promise<void> {
    const resolved = await this.deps.catalog.resolveMedia(reference, signal);
    if (!resolved.ok) {
      await this.fail(session, resolved.error, outbox);
      return;
    }

    enterFormat(session, resolved.value);
    await this.reply(outbox, `Got it! Video: ${resolved.value.title}\nChoose format: /video (MP4) or /audio (MP3)`);
  }

  private async selectVideo(session: Session, outbox: Outbox): Promise<void> {
    const mediaRef = session.mediaRef;
    if (!mediaRef) {
      resetSession(session);
      await this.reply(outbox, REPLIES.noMedia);
      return;
    }

    const listed = this.deps.catalog.listProgressiveVideo(mediaRef);
    if (!listed.ok) {
      await this.fail(session, listed.error, outbox);
      return;
    }

    enterResolution(session, listed.value);
    await this.reply(outbox, formatResolutionPrompt(listed.value));
  }

  /** Fetch, transcode and deliver the preferred audio stream; always ends in AWAITING_URL. */
  private async deliverAudio(session: Session, outbox: Outbox, signal: AbortSignal): Promise<void> {
    const mediaRef = session.mediaRef;
    resetSession(session);
    if (!mediaRef) {
      await this.reply(outbox, REPLIES.noMedia);
      return;
    }

    const listed = this.deps.catalog.listAudioOnly(mediaRef);
    if (!listed.ok) {
      await this.fail(session, listed.error, outbox);
      return;
    }

    const descriptor = pickAudio(listed.value);
    const rejection = checkSize(descriptor.sizeBytes, this.deps.maxDeliveryBytes, descriptor.kind);
    if (rejection) {
      await this.fail(session, rejection, outbox);
      return;
    }

    const result = await this.deps.orchestrator.runAudio({ sessionId: session.id, mediaRef, descriptor, outbox, signal });
    if (!result.ok) {
      await this.fail(session, result.error, outbox);
      return;
    }
    await this.reply(outbox, REPLIES.done);
  }

  private async deliverVideo(session: Session, tag: string, outbox: Outbox, signal: AbortSignal): Promise<void> {
    const { mediaRef, catalog } = session;
    if (!mediaRef || !catalog) {
      resetSession(session);
      await this.reply(outbox, REPLIES.noMedia);
      return;
    }

    const found = findByTag(catalog, tag);
    if (!found.ok) {
      await this.fail(session, found.error, outbox);
      return;
    }

    const descriptor = found.value;
    const rejection = checkSize(descriptor.sizeBytes, this.deps.maxDeliveryBytes, descriptor.kind);
    if (rejection) {
      await this.fail(session, rejection, outbox);
      return;
    }

    const result = await this.deps.orchestrator.runVideo({ sessionId: session.id, mediaRef, descriptor, outbox, signal });
    if (!result.ok) {
      await this.fail(session, result.error, outbox);
      return;
    }

    resetSession(session);
    await this.reply(outbox, REPLIES.done);
  }

  private async cancel(session: Session, outbox: Outbox): Promise<void> {
    resetSession(session);
    await this.deps.cleanup.purgeSession(session.id);
    this.logger.info(`Session ${session.id} cancelled`);
    await this.reply(outbox, REPLIES.cancelled);
  }

  // ─── Helpers ────────────────────────────────────────────────────────────────

  /**
   * Applies the failure policy: one reply, one next state. "reselect" keeps
   * the session only while it still holds a catalog to reselect from.
   */
  private async fail(session: Session, error: SessionFailure, outbox: Outbox): Promise<void> {
    const outcome = describeFailure(error);
    if (outcome.disposition === "restart" || session.state !== ConversationState.AWAITING_RESOLUTION) {
      resetSession(session);
    }
    this.logger.info(`Session ${session.id}: ${error.kind} → ${session.state}`);
    await this.reply(outbox, outcome.reply);
  }

  private async reply(outbox: Outbox, text: string): Promise<void> {
    try {
      await outbox.reply(text);
    } catch (error) {
      this.logger.warn(`Failed to send reply: ${describeError(error)}`);
    }
  }
}
