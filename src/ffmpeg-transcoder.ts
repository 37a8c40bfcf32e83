// Stream Courier - ffmpeg transcoder
// Audio → constant-bitrate MP3 through fluent-ffmpeg. Aborting the signal kills ffmpeg.

import ffmpeg from "fluent-ffmpeg";
import type { Logger } from "./logger.js";
import { createLogger } from "./logger.js";
import type { TranscodeOptions, Transcoder } from "./types.js";

export interface FfmpegTranscoderOptions {
  /** ffmpeg binary; fluent-ffmpeg's lookup (FFMPEG_PATH, PATH) when omitted. */
  ffmpegPath?: string;
  logger?: Logger;
}

export class FfmpegTranscoder implements Transcoder {
  private readonly logger: Logger;

  constructor(private readonly options: FfmpegTranscoderOptions = {}) {
    this.logger = options.logger ?? createLogger("FfmpegTranscoder");
  }

  toMp3(inputPath: string, outputPath: string, { bitrateKbps, signal }: TranscodeOptions): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (signal.aborted) {
        reject(new Error("transcode aborted before start"));
        return;
      }

      const command = ffmpeg(inputPath)
        .noVideo()
        .audioCodec("libmp3lame")
        .audioBitrate(bitrateKbps)
        .format("mp3")
        .outputOptions("-y")
        .output(outputPath);

      if (this.options.ffmpegPath) {
        command.setFfmpegPath(this.options.ffmpegPath);
      }

      const onAbort = () => {
        this.logger.warn(`Killing ffmpeg for ${inputPath}`);
        command.kill("SIGKILL");
      };
      signal.addEventListener("abort", onAbort, { once: true });

      command
        .on("start", (commandLine: string) => {
          this.logger.info(`Transcode started: ${commandLine}`);
        })
        .on("end", () => {
          signal.removeEventListener("abort", onAbort);
          this.logger.info(`Transcode completed: ${outputPath}`);
          resolve();
        })
        .on("error", (error: Error) => {
          signal.removeEventListener("abort", onAbort);
          this.logger.error(`Transcode failed: ${error.message}`);
          reject(error);
        })
        .run();
    });
  }
}
