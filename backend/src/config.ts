import dotenv from "dotenv";
import path from "path";
dotenv.config();

export interface AppConfig {
  port: number;
  host: string;
  dbUrl: string;
  redisUrl: string;
  mediaRoot: string;
  ffmpegPath: string;
  logLevel: string;
  workerConcurrency: number;
  maxUploadBytes: number;
}

const checkEnv = (env: NodeJS.ProcessEnv, key: string): string => {
  const value = env[key];
  if (!value) {
    throw new Error(`Missing environment variable: ${key}`);
  }
  return value;
};

const positiveInt = (raw: string | undefined, fallback: number): number => {
  const parsed = Number(raw);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => ({
  port: positiveInt(env.PORT, 8080),
  host: env.HOST || "0.0.0.0",
  dbUrl: checkEnv(env, "DATABASE_URL"),
  redisUrl: checkEnv(env, "REDIS_URL"),
  // resolved once so every path derived from it is absolute
  mediaRoot: path.resolve(env.MEDIA_ROOT || "media"),
  ffmpegPath: env.FFMPEG_PATH || "ffmpeg",
  logLevel: env.LOG_LEVEL || "info",
  workerConcurrency: positiveInt(env.WORKER_CONCURRENCY, 1),
  maxUploadBytes: positiveInt(env.MAX_UPLOAD_MB, 2048) * 1024 * 1024,
});
