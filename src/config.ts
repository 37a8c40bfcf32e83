// Stream Courier - Configuration
// Environment variables (optionally loaded from .env) validated into AppConfig.

import { z } from "zod";
import { ConfigError } from "./errors.js";

export const APP_NAME = "Stream Courier";
export const APP_VERSION = "0.1.0";

/** 50 MiB: the attachment ceiling of the delivery transport. */
export const DEFAULT_MAX_DELIVERY_BYTES = 50 * 1024 * 1024;

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  MAX_DELIVERY_BYTES: z.coerce.number().int().positive().default(DEFAULT_MAX_DELIVERY_BYTES),
  SCRATCH_DIR: z.string().min(1).default("downloads"),
  OPERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  AUDIO_BITRATE_KBPS: z.coerce.number().int().min(32).max(320).default(192),
  YTDLP_PATH: z.string().min(1).default("yt-dlp"),
  FFMPEG_PATH: z.string().min(1).optional(),
});

export interface AppConfig {
  port: number;
  maxDeliveryBytes: number;
  scratchDir: string;
  operationTimeoutMs: number;
  audioBitrateKbps: number;
  ytDlpPath: string;
  ffmpegPath: string | undefined;
}

/**
 * Builds the application config from an environment map.
 * Empty strings count as unset so a blank line in .env falls back to the default.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      cleaned[key] = value.trim();
    }
  }

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    maxDeliveryBytes: vars.MAX_DELIVERY_BYTES,
    scratchDir: vars.SCRATCH_DIR,
    operationTimeoutMs: vars.OPERATION_TIMEOUT_MS,
    audioBitrateKbps: vars.AUDIO_BITRATE_KBPS,
    ytDlpPath: vars.YTDLP_PATH,
    ffmpegPath: vars.FFMPEG_PATH,
  };
}
