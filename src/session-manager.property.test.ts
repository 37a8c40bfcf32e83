// Property-Based Tests for SessionManager
// Random intent sequences against the session invariants.

import { describe, it, expect, beforeAll, afterAll, vi } from "vitest";
import * as fc from "fast-check";
import { existsSync } from "node:fs";
import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CleanupManager } from "./cleanup-manager.js";
import { DownloadOrchestrator } from "./download-orchestrator.js";
import { SessionManager, guidanceFor } from "./session-manager.js";
import { StreamCatalog } from "./stream-catalog.js";
import {
  ConversationState,
  StreamKind,
  type Intent,
  type MediaRef,
  type MediaSource,
  type Outbox,
  type StreamDescriptor,
  type Transcoder,
} from "./types.js";

const MB = 1024 * 1024;
const LIMIT = 50 * MB;
const URL_A = "https://videos.example/watch?v=ref-A";
const URL_AUDIO_ONLY = "https://videos.example/watch?v=podcast";

function stream(tag: string, kind: StreamKind, sizeMb: number): StreamDescriptor {
  return {
    resolutionTag: tag,
    fps: kind === StreamKind.AUDIO_ONLY ? null : 30,
    sizeBytes: sizeMb * MB,
    kind,
    container: kind === StreamKind.AUDIO_ONLY ? "m4a" : "mp4",
    sourceHandle: `${kind}-${tag}`,
  };
}

const MEDIA: Record<string, MediaRef> = {
  [URL_A]: {
    reference: URL_A,
    id: "ref-A",
    title: "Clip A",
    streams: [
      stream("1080p", StreamKind.VIDEO_PROGRESSIVE, 60),
      stream("720p", StreamKind.VIDEO_PROGRESSIVE, 30),
      stream("", StreamKind.AUDIO_ONLY, 40),
    ],
  },
  [URL_AUDIO_ONLY]: {
    reference: URL_AUDIO_ONLY,
    id: "podcast",
    title: "Podcast",
    streams: [stream("", StreamKind.AUDIO_ONLY, 20)],
  },
};

const arbIntent: fc.Arbitrary<Intent> = fc.constantFrom<Intent>(
  { type: "start" },
  { type: "cancel" },
  { type: "text", reference: URL_A },
  { type: "text", reference: URL_AUDIO_ONLY },
  { type: "text", reference: "bad-ref" },
  { type: "text", reference: "https://videos.example/watch?v=missing" },
  { type: "select_video" },
  { type: "select_audio" },
  { type: "select_resolution", tag: "720p" },
  { type: "select_resolution", tag: "1080p" },
  { type: "select_resolution", tag: "480p" },
  { type: "unknown_command", command: "/help" },
);

function accepts(state: ConversationState, intent: Intent): boolean {
  switch (intent.type) {
    case "start":
    case "cancel":
      return true;
    case "text":
      return state === ConversationState.AWAITING_URL;
    case "select_video":
    case "select_audio":
      return state === ConversationState.AWAITING_FORMAT;
    case "select_resolution":
      return state === ConversationState.AWAITING_RESOLUTION;
    case "unknown_command":
      return false;
  }
}

describe("SessionManager (properties)", () => {
  let tmp: string;

  beforeAll(async () => {
    tmp = await mkdtemp(join(tmpdir(), "courier-session-props-"));
  });

  afterAll(async () => {
    await rm(tmp, { recursive: true, force: true });
  });

  function build(scratch: string): SessionManager {
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const source: MediaSource = {
      resolve: async (reference) => {
        const media = MEDIA[reference];
        if (!media) throw new Error("HTTP Error 404");
        return media;
      },
      fetch: async (_ref, _descriptor, destination) => {
        await writeFile(destination, Buffer.alloc(256));
      },
    };
    const transcoder: Transcoder = {
      toMp3: async (_input, output) => {
        await writeFile(output, Buffer.alloc(128));
      },
    };
    const cleanup = new CleanupManager(scratch, logger);
    const orchestrator = new DownloadOrchestrator({
      mediaSource: source,
      transcoder,
      cleanup,
      config: { maxDeliveryBytes: LIMIT, operationTimeoutMs: 1000, audioBitrateKbps: 192 },
      logger,
    });
    return new SessionManager({
      catalog: new StreamCatalog(source, { timeoutMs: 1000, logger }),
      orchestrator,
      cleanup,
      maxDeliveryBytes: LIMIT,
      logger,
    });
  }

  it("holds the state invariants, answers invalid intents with one guidance reply, and leaves no scratch files", async () => {
    let run = 0;
    await fc.assert(
      fc.asyncProperty(fc.array(arbIntent, { minLength: 1, maxLength: 12 }), async (intents) => {
        const scratch = join(tmp, `run-${run++}`);
        const manager = build(scratch);

        for (const intent of intents) {
          const before = manager.snapshot("alice");
          const state = before?.state ?? ConversationState.AWAITING_URL;
          const replies: string[] = [];
          const outbox: Outbox = {
            reply: async (text) => {
              replies.push(text);
            },
            deliverFile: async () => undefined,
          };

          await manager.handle("alice", intent, outbox);
          const after = manager.snapshot("alice");

          expect(after).toBeDefined();
          if (!after) return;
          expect(after.catalog !== null).toBe(after.state === ConversationState.AWAITING_RESOLUTION);
          expect(after.mediaRef === null).toBe(after.state === ConversationState.AWAITING_URL);

          if (!accepts(state, intent)) {
            expect(replies).toEqual([guidanceFor(state)]);
            if (before) expect(after).toEqual(before);
          }

          const leftovers = existsSync(scratch) ? await readdir(scratch) : [];
          expect(leftovers).toEqual([]);
        }
      }),
      { numRuns: 40 },
    );
  });
});
