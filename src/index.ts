// Stream Courier - Entry point
// Wires up the workflow engine and its collaborators and starts the server.

import "dotenv/config";
import { CleanupManager } from "./cleanup-manager.js";
import { APP_NAME, APP_VERSION, loadConfig, type AppConfig } from "./config.js";
import { DownloadOrchestrator } from "./download-orchestrator.js";
import { describeError } from "./errors.js";
import { FfmpegTranscoder } from "./ffmpeg-transcoder.js";
import { createAppServer } from "./server.js";
import { SessionManager } from "./session-manager.js";
import { StreamCatalog } from "./stream-catalog.js";
import { YtDlpMediaSource } from "./ytdlp-media-source.js";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

// ─── Validate configuration ─────────────────────────────────────────────────────

let config: AppConfig;
try {
  config = loadConfig(process.env);
} catch (error) {
  logFatal(describeError(error));
  process.exit(1);
}

logInit(`Configuration loaded (limit ${config.maxDeliveryBytes} bytes, timeout ${config.operationTimeoutMs} ms)`);

// ─── Prepare scratch storage ────────────────────────────────────────────────────

const cleanup = new CleanupManager(config.scratchDir);
try {
  await cleanup.prepare();
} catch (error) {
  logFatal(`Scratch directory "${config.scratchDir}" is not usable: ${describeError(error)}`);
  process.exit(1);
}

logInit(`Scratch storage ready at ${config.scratchDir}`);

// ─── Initialize pipeline components ─────────────────────────────────────────────

logInit(`Initializing YtDlpMediaSource (${config.ytDlpPath})...`);
const mediaSource = new YtDlpMediaSource({ binary: config.ytDlpPath });

logInit(`Initializing FfmpegTranscoder (${config.ffmpegPath ?? "ffmpeg on PATH"})...`);
const transcoder = new FfmpegTranscoder({ ffmpegPath: config.ffmpegPath });

const catalog = new StreamCatalog(mediaSource, { timeoutMs: config.operationTimeoutMs });

const orchestrator = new DownloadOrchestrator({
  mediaSource,
  transcoder,
  cleanup,
  config: {
    maxDeliveryBytes: config.maxDeliveryBytes,
    operationTimeoutMs: config.operationTimeoutMs,
    audioBitrateKbps: config.audioBitrateKbps,
  },
});

logInit("Wiring SessionManager...");
const sessionManager = new SessionManager({
  catalog,
  orchestrator,
  cleanup,
  maxDeliveryBytes: config.maxDeliveryBytes,
});

// ─── Start server ───────────────────────────────────────────────────────────────

const server = createAppServer({ sessionManager, maxFileBytes: config.maxDeliveryBytes });

try {
  await server.listen(config.port);
} catch (error) {
  logFatal(`Could not listen on port ${config.port}: ${describeError(error)}`);
  process.exit(1);
}

logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${config.port}`);
logInit("Pipeline: yt-dlp → size gate → ffmpeg (audio) → WebSocket delivery");
logInit("Ready for connections");

// ─── Shutdown ───────────────────────────────────────────────────────────────────

let stopping = false;

async function stop(signal: NodeJS.Signals): Promise<void> {
  if (stopping) return;
  stopping = true;
  logInit(`${signal} received, shutting down...`);
  await server.close();
  await sessionManager.shutdown();
  logInit("Shutdown complete");
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    stop(signal).then(
      () => process.exit(0),
      (error: unknown) => {
        logFatal(`Shutdown failed: ${describeError(error)}`);
        process.exit(1);
      },
    );
  });
}
