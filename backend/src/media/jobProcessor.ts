import type { Job } from "bullmq";
import type { Log } from "../lib/logger";
import { TRANSCODE_JOB } from "../lib/queue";
import { MAX_VIDEO_ID } from "./settings";
import type { TranscodeJobData } from "../types";
import type { TranscodePipeline } from "./transcodePipeline";

export type TranscodeJob = Pick<Job<TranscodeJobData>, "id" | "name" | "data" | "attemptsMade">;

// Consumer side of the transcode job: validates the payload and runs the pipeline.
export const createJobProcessor =
  (pipeline: TranscodePipeline, logger: Log) => async (job: TranscodeJob): Promise<void> => {
    if (job.name !== TRANSCODE_JOB) {
      throw new Error(`Unknown job ${job.name}`);
    }
    const { videoId } = job.data;
    if (!Number.isSafeInteger(videoId) || videoId < 1 || videoId > MAX_VIDEO_ID) {
      throw new Error(`Job ${job.id} has invalid videoId ${String(videoId)}`);
    }

    logger.info({ jobId: job.id, videoId, attempt: job.attemptsMade + 1 }, "starting transcode");
    try {
      const outcome = await pipeline.run(videoId);
      logger.info({ jobId: job.id, videoId, outcome }, "transcode finished");
    } catch (error) {
      // rethrown so BullMQ records the failure and schedules a retry
      logger.error({ jobId: job.id, videoId, err: error }, "transcode failed");
      throw error;
    }
  };
