import path from "path";
import { spawn } from "child_process";
import { EncodingError } from "../lib/errors";
import { logger as defaultLogger } from "../lib/logger";
import type { Log } from "../lib/logger";
import { MANIFEST_NAME, SEGMENT_PATTERN } from "./settings";
import type { MediaSettings, QualityVariant } from "./settings";

export interface Encoder {
  // Writes `<outputDir>/index.m3u8` and `<outputDir>/NNN.ts`; rejects with EncodingError.
  encodeVariant(inputPath: string, outputDir: string, variant: QualityVariant): Promise<void>;
  extractThumbnail(inputPath: string, outputPath: string): Promise<void>;
}

const STDERR_TAIL = 4000;

export const buildVariantArgs = (
  settings: MediaSettings,
  inputPath: string,
  outputDir: string,
  variant: QualityVariant,
): string[] => [
  "-y",
  "-i", inputPath,
  // height pinned, width follows the aspect ratio rounded to an even number
  "-vf", `scale=-2:${variant.height}`,
  "-c:v", "libx264",
  "-preset", "veryfast",
  "-c:a", settings.audio.codec,
  "-ar", String(settings.audio.sampleRate),
  "-b:a", settings.audio.bitrate,
  "-b:v", variant.videoBitrate,
  "-hls_time", String(settings.segmentSeconds),
  "-hls_playlist_type", settings.playlistType,
  // playlist is written to a temp file and renamed, readers never see a partial manifest
  "-hls_flags", "temp_file",
  "-hls_segment_filename", path.join(outputDir, SEGMENT_PATTERN),
  path.join(outputDir, MANIFEST_NAME),
];

export const buildThumbnailArgs = (
  settings: MediaSettings,
  inputPath: string,
  outputPath: string,
): string[] => [
  "-y",
  "-ss", String(settings.thumbnailAtSeconds),
  "-i", inputPath,
  "-frames:v", "1",
  outputPath,
];

export class FfmpegEncoder implements Encoder {
  constructor(
    private readonly settings: MediaSettings,
    private readonly ffmpegPath = "ffmpeg",
    private readonly logger: Log = defaultLogger,
  ) {}

  encodeVariant(inputPath: string, outputDir: string, variant: QualityVariant): Promise<void> {
    return this.run(buildVariantArgs(this.settings, inputPath, outputDir, variant), variant.name);
  }

  extractThumbnail(inputPath: string, outputPath: string): Promise<void> {
    return this.run(buildThumbnailArgs(this.settings, inputPath, outputPath), "thumbnail");
  }

  private run(args: string[], label: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.logger.debug({ label, args }, "spawning ffmpeg");

      const child = spawn(this.ffmpegPath, args, {
        stdio: ["ignore", "ignore", "pipe"],
        windowsHide: true,
      });

      let stderr = "";
      child.stderr?.on("data", (chunk: Buffer) => {
        stderr = (stderr + chunk.toString()).slice(-STDERR_TAIL);
      });

      child.on("error", (error) => {
        reject(new EncodingError(`ffmpeg (${label}) could not start: ${error.message}`, null));
      });

      child.on("close", (code) => {
        if (code === 0) {
          resolve();
          return;
        }
        this.logger.error({ label, code, stderr }, "ffmpeg failed");
        reject(new EncodingError(`ffmpeg (${label}) failed with exit code ${code}`, code, stderr));
      });
    });
  }
}
