import { Queue, Worker } from "bullmq";
import type { Job } from "bullmq";
import IORedis from "ioredis";
import type { TranscodeJobData } from "../types";

export const QUEUE_NAME = "video-transcoding";
export const TRANSCODE_JOB = "transcode_video";

export type JobName = typeof TRANSCODE_JOB;

// Enqueue side of the job contract; consumers see `TranscodeJobData`.
export interface JobQueue {
  enqueue(jobName: JobName, videoId: number): Promise<void>;
}

export const createRedisConnection = (redisUrl: string): IORedis =>
  new IORedis(redisUrl, {
    // BullMQ blocks on Redis and requires this to be disabled
    maxRetriesPerRequest: null,
  });

export class BullJobQueue implements JobQueue {
  private readonly queue: Queue<TranscodeJobData>;

  constructor(connection: IORedis) {
    this.queue = new Queue<TranscodeJobData>(QUEUE_NAME, { connection });
  }

  async enqueue(jobName: JobName, videoId: number): Promise<void> {
    await this.queue.add(
      jobName,
      { videoId },
      {
        attempts: 3,
        backoff: { type: "exponential", delay: 1000 },
        removeOnComplete: 1000,
      },
    );
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}

export const createWorker = (
  connection: IORedis,
  processor: (job: Job<TranscodeJobData>) => Promise<void>,
  concurrency = 1,
): Worker<TranscodeJobData> =>
  new Worker<TranscodeJobData>(QUEUE_NAME, processor, {
    connection,
    concurrency,
    // seconds to long-poll an empty queue
    drainDelay: 5,
    // transcodes run for minutes; keep the lock alive without hammering Redis
    lockDuration: 60000,
    lockRenewTime: 15000,
    metrics: {
      maxDataPoints: 0,
    },
  });
