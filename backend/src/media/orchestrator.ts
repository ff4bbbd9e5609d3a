import { logger as defaultLogger } from "../lib/logger";
import type { Log } from "../lib/logger";
import { TRANSCODE_JOB } from "../lib/queue";
import type { JobQueue } from "../lib/queue";
import type { VideoStore } from "../types";

export interface CreatedOptions {
  // true only when the call follows an insert; updates never enqueue
  created: boolean;
}

export class TranscodeOrchestrator {
  constructor(
    private readonly store: VideoStore,
    private readonly queue: JobQueue,
    private readonly logger: Log = defaultLogger,
  ) {}

  /**
   * Enqueues one transcode job for a freshly inserted video that has a source file
   * and is not processed yet. Resolves once the job is queued, not when it runs.
   */
  async onAssetCreated(videoId: number, options: CreatedOptions): Promise<boolean> {
    if (!options.created) return false;

    const video = await this.store.findById(videoId);
    if (!video || !video.sourceFilePath || video.processed) {
      this.logger.debug({ videoId }, "transcode not required");
      return false;
    }

    await this.queue.enqueue(TRANSCODE_JOB, videoId);
    this.logger.info({ videoId }, "transcode queued");
    return true;
  }
}
