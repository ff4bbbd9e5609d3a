import path from "path";
import type { FastifyInstance, FastifyReply } from "fastify";
import { NotFoundError, ValidationError } from "../lib/errors";
import { discardUpload, receiveVideoUpload } from "../lib/uploads";
import type { AssetServer, ServedAsset } from "../media/assetServer";
import type { TranscodeOrchestrator } from "../media/orchestrator";
import { MAX_VIDEO_ID } from "../media/settings";
import type {
  ManifestParams,
  SegmentParams,
  VideoParams,
  VideoRecord,
  VideoStore,
} from "../types";

export interface VideoRoutesOptions {
  mediaRoot: string;
  store: VideoStore;
  assets: AssetServer;
  orchestrator: TranscodeOrchestrator;
  maxUploadBytes: number;
}

// ids beyond the int4 column range cannot exist, so they are a 404 rather than a database error
const parseVideoId = (raw: string): number => {
  if (!/^\d{1,10}$/.test(raw)) throw new NotFoundError();
  const id = Number(raw);
  if (id > MAX_VIDEO_ID) throw new NotFoundError();
  return id;
};

const requiredText = (value: unknown, field: string, max: number): string => {
  if (typeof value !== "string" || value.trim() === "") {
    throw new ValidationError(`Missing ${field}`);
  }
  if (value.length > max) throw new ValidationError(`${field} is too long`);
  return value.trim();
};

const optionalText = (value: unknown, field: string, max: number): string => {
  if (value === undefined || value === null) return "";
  if (typeof value !== "string") throw new ValidationError(`${field} must be a string`);
  if (value.length > max) throw new ValidationError(`${field} is too long`);
  return value.trim();
};

const thumbnailUrl = (video: VideoRecord): string =>
  video.thumbnailPath ? `/api/video/${video.id}/thumbnail` : "";

const sendAsset = (reply: FastifyReply, asset: ServedAsset) =>
  reply
    .header("Content-Type", asset.contentType)
    .header("Content-Length", asset.size)
    .send(asset.stream);

export async function videoRoutes(server: FastifyInstance, opts: VideoRoutesOptions) {
  const { store, assets, orchestrator } = opts;
  const mediaRoot = path.resolve(opts.mediaRoot);

  // the multipart stream is consumed by the upload handler, not by fastify
  server.addContentTypeParser("multipart/form-data", (_req, _payload, done) => done(null));

  server.get("/api/video", async () => {
    const videos = await store.list();
    return videos.map((video) => ({
      id: video.id,
      createdAt: video.createdAt.toISOString(),
      title: video.title,
      description: video.description,
      category: video.category,
      thumbnailUrl: thumbnailUrl(video),
    }));
  });

  server.post("/api/video/upload", async (req, reply) => {
    const upload = await receiveVideoUpload(req.raw, { mediaRoot, maxBytes: opts.maxUploadBytes });

    let video: VideoRecord;
    try {
      const title = requiredText(upload.fields.get("title"), "title", 255);
      const category = requiredText(upload.fields.get("category"), "category", 100);
      const description = optionalText(upload.fields.get("description"), "description", 10000);
      video = await store.create({ title, description, category, sourceFilePath: upload.sourceFilePath });
    } catch (error) {
      await discardUpload(upload);
      throw error;
    }

    await orchestrator.onAssetCreated(video.id, { created: true });

    req.log.info(`Video ${video.id} uploaded (${upload.bytes} bytes).`);
    return reply.code(201).send({ id: video.id, processed: video.processed });
  });

  server.get<{ Params: VideoParams }>("/api/video/status/:videoId", async (req) => {
    const video = await store.findById(parseVideoId(req.params.videoId));
    if (!video) throw new NotFoundError();
    return { id: video.id, processed: video.processed, hlsBaseDir: video.hlsBaseDir };
  });

  server.get<{ Params: VideoParams }>("/api/video/:videoId/thumbnail", async (req, reply) => {
    const asset = await assets.serveThumbnail(parseVideoId(req.params.videoId));
    return sendAsset(reply, asset);
  });

  server.get<{ Params: ManifestParams }>(
    "/api/video/:videoId/:resolution/index.m3u8",
    async (req, reply) => {
      const { videoId, resolution } = req.params;
      const asset = await assets.serveManifest(parseVideoId(videoId), resolution);
      return sendAsset(reply, asset);
    },
  );

  server.get<{ Params: SegmentParams }>(
    "/api/video/:videoId/:resolution/:segment",
    async (req, reply) => {
      const { videoId, resolution, segment } = req.params;
      const asset = await assets.serveSegment(parseVideoId(videoId), resolution, segment);
      return sendAsset(reply, asset);
    },
  );
}
