import { buildServer } from "./app";
import { loadConfig } from "./config";
import { PgVideoStore, applySchema, createPool } from "./lib/db";
import { BullJobQueue, createRedisConnection } from "./lib/queue";
import { AssetServer } from "./media/assetServer";
import { TranscodeOrchestrator } from "./media/orchestrator";
import { PathResolver } from "./media/pathResolver";
import { createMediaSettings } from "./media/settings";

const start = async () => {
  const config = loadConfig();
  const settings = createMediaSettings(config.mediaRoot);

  const pool = createPool(config.dbUrl);
  const store = new PgVideoStore(pool);
  const queue = new BullJobQueue(createRedisConnection(config.redisUrl));

  const server = buildServer(
    {
      mediaRoot: settings.mediaRoot,
      store,
      assets: new AssetServer(new PathResolver(settings)),
      orchestrator: new TranscodeOrchestrator(store, queue),
      maxUploadBytes: config.maxUploadBytes,
    },
    { logger: { level: config.logLevel } },
  );

  server.addHook("onClose", async () => {
    await queue.close();
    await pool.end();
  });

  try {
    await applySchema(pool);
    await server.listen({ port: config.port, host: config.host });
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      server.close().then(
        () => process.exit(0),
        (err: unknown) => {
          server.log.error(err);
          process.exit(1);
        },
      );
    });
  }
};

start().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
