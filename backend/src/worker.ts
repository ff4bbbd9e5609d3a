import { loadConfig } from "./config";
import { PgVideoStore, createPool } from "./lib/db";
import { createLogger } from "./lib/logger";
import { createRedisConnection, createWorker } from "./lib/queue";
import { createJobProcessor } from "./media/jobProcessor";
import { FfmpegEncoder } from "./media/encoder";
import { createMediaSettings } from "./media/settings";
import { TranscodePipeline } from "./media/transcodePipeline";

const main = () => {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const settings = createMediaSettings(config.mediaRoot);

  const pool = createPool(config.dbUrl);
  const pipeline = new TranscodePipeline({
    settings,
    store: new PgVideoStore(pool),
    encoder: new FfmpegEncoder(settings, config.ffmpegPath, logger),
    logger,
  });

  const worker = createWorker(
    createRedisConnection(config.redisUrl),
    createJobProcessor(pipeline, logger),
    config.workerConcurrency,
  );

  worker.on("failed", (job, err) => {
    logger.warn({ jobId: job?.id, err }, "job failed");
  });

  const shutdown = () => {
    logger.info("worker shutting down");
    Promise.all([worker.close(), pool.end()]).then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, "worker shutdown failed");
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  logger.info({ mediaRoot: settings.mediaRoot }, "worker started");
};

main();
