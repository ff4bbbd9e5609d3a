import fs from "fs";
import type { Readable } from "stream";
import { NotFoundError } from "../lib/errors";
import { MANIFEST_NAME } from "./settings";
import type { PathResolver } from "./pathResolver";

export const MANIFEST_CONTENT_TYPE = "application/vnd.apple.mpegurl";
export const SEGMENT_CONTENT_TYPE = "video/MP2T";
export const THUMBNAIL_CONTENT_TYPE = "image/jpeg";

export interface ServedAsset {
  stream: Readable;
  contentType: string;
  size: number;
}

// Read side of the HLS package. Only ever throws NotFoundError.
export class AssetServer {
  constructor(private readonly resolver: PathResolver) {}

  async serveManifest(videoId: number, quality: string): Promise<ServedAsset> {
    const filePath = this.resolver.resolve(videoId, quality, MANIFEST_NAME);
    return openAsset(filePath, MANIFEST_CONTENT_TYPE);
  }

  async serveSegment(videoId: number, quality: string, filename: string): Promise<ServedAsset> {
    const filePath = this.resolver.resolve(videoId, quality, filename);
    return openAsset(filePath, SEGMENT_CONTENT_TYPE);
  }

  async serveThumbnail(videoId: number): Promise<ServedAsset> {
    const filePath = this.resolver.resolveThumbnail(videoId);
    return openAsset(filePath, THUMBNAIL_CONTENT_TYPE);
  }
}

// The stream reads from the handle opened here, so a file replaced or removed after
// this point still serves the bytes that were found.
const openAsset = async (filePath: string, contentType: string): Promise<ServedAsset> => {
  const handle = await fs.promises.open(filePath, "r").catch(() => null);
  if (!handle) throw new NotFoundError();

  const stat = await handle.stat().catch(() => null);
  if (!stat || !stat.isFile()) {
    await handle.close();
    throw new NotFoundError();
  }
  return { stream: handle.createReadStream(), contentType, size: stat.size };
};
