import fs from "fs";
import path from "path";
import { NotFoundError } from "../lib/errors";
import { KeyedLock } from "../lib/keyedLock";
import { logger as defaultLogger } from "../lib/logger";
import type { Log } from "../lib/logger";
import type { VideoStore } from "../types";
import type { Encoder } from "./encoder";
import { THUMBNAIL_NAME, hlsBaseDirFor, videoOutputDir } from "./settings";
import type { MediaSettings } from "./settings";

export type TranscodeOutcome = "processed" | "skipped";

export interface TranscodePipelineDeps {
  settings: MediaSettings;
  store: VideoStore;
  encoder: Encoder;
  lock?: KeyedLock<number>;
  logger?: Log;
}

/**
 * Turns a video's source file into the HLS ladder plus a thumbnail and marks the
 * record processed. Encoder failures propagate untouched so the job runner can retry;
 * nothing is written to the store unless every rung succeeded.
 */
export class TranscodePipeline {
  private readonly settings: MediaSettings;
  private readonly store: VideoStore;
  private readonly encoder: Encoder;
  private readonly lock: KeyedLock<number>;
  private readonly logger: Log;

  constructor(deps: TranscodePipelineDeps) {
    this.settings = deps.settings;
    this.store = deps.store;
    this.encoder = deps.encoder;
    this.lock = deps.lock ?? new KeyedLock<number>();
    this.logger = deps.logger ?? defaultLogger;
  }

  async run(videoId: number): Promise<TranscodeOutcome> {
    const video = await this.store.findById(videoId);
    if (!video) throw new NotFoundError(`Video ${videoId} not found`);
    if (!video.sourceFilePath) {
      this.logger.info({ videoId }, "no source file, nothing to transcode");
      return "skipped";
    }

    const inputPath = path.resolve(this.settings.mediaRoot, video.sourceFilePath);
    return this.lock.runExclusive(videoId, () => this.transcode(videoId, inputPath));
  }

  private async transcode(videoId: number, inputPath: string): Promise<TranscodeOutcome> {
    const outBase = videoOutputDir(this.settings, videoId);
    await fs.promises.mkdir(outBase, { recursive: true });

    for (const variant of this.settings.ladder) {
      const variantDir = path.join(outBase, variant.name);
      await fs.promises.mkdir(variantDir, { recursive: true });
      this.logger.info({ videoId, variant: variant.name }, "encoding variant");
      await this.encoder.encodeVariant(inputPath, variantDir, variant);
    }

    const hlsBaseDir = hlsBaseDirFor(videoId);
    const thumbnailPath = await this.extractThumbnail(videoId, inputPath, outBase)
      ? `${hlsBaseDir}/${THUMBNAIL_NAME}`
      : null;

    await this.store.markProcessed(videoId, { hlsBaseDir, thumbnailPath });
    this.logger.info({ videoId, hlsBaseDir, thumbnailPath }, "video processed");
    return "processed";
  }

  // Cosmetic: a missing thumbnail never fails the run.
  private async extractThumbnail(videoId: number, inputPath: string, outBase: string): Promise<boolean> {
    const thumbPath = path.join(outBase, THUMBNAIL_NAME);
    try {
      await this.encoder.extractThumbnail(inputPath, thumbPath);
      const stat = await fs.promises.stat(thumbPath);
      return stat.isFile();
    } catch (error) {
      this.logger.warn({ videoId, err: error }, "thumbnail extraction failed");
      return false;
    }
  }
}
