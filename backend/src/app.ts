import Fastify from "fastify";
import type { FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";
import { HttpError } from "./lib/errors";
import { videoRoutes } from "./routes/videos";
import type { VideoRoutesOptions } from "./routes/videos";

export interface BuildServerOptions {
  logger?: FastifyServerOptions["logger"];
}

export function buildServer(deps: VideoRoutesOptions, options: BuildServerOptions = {}) {
  const server = Fastify({
    logger: options.logger ?? true,
    bodyLimit: 1048576 * 10,
    ignoreTrailingSlash: true,
  });

  server.register(cors, {
    origin: "*",
    methods: ["GET", "POST"],
  });

  server.setErrorHandler((error, req, reply) => {
    if (error instanceof HttpError) {
      // 404s share one body so a traversal attempt reads like a missing file
      const message = error.statusCode === 404 ? "Not found" : error.message;
      return reply.code(error.statusCode).send({ error: message });
    }
    // fastify's own client errors: malformed JSON, body too large, unsupported type
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.code(error.statusCode).send({ error: error.message });
    }
    req.log.error(error);
    return reply.code(500).send({ error: "Internal Server Error" });
  });

  server.setNotFoundHandler((_req, reply) => reply.code(404).send({ error: "Not found" }));

  server.get("/", async () => {
    return { status: "OK", service: "HLS media backend" };
  });

  server.register(videoRoutes, deps);

  return server;
}
