import fs from "fs";
import os from "os";
import path from "path";
import type { Readable } from "stream";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { NotFoundError } from "../../lib/errors";
import {
  AssetServer,
  MANIFEST_CONTENT_TYPE,
  SEGMENT_CONTENT_TYPE,
  THUMBNAIL_CONTENT_TYPE,
} from "../assetServer";
import { PathResolver } from "../pathResolver";
import { createMediaSettings } from "../settings";

const readAll = async (stream: Readable): Promise<string> => {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
};

describe("AssetServer", () => {
  let root: string;
  let server: AssetServer;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "asset-server-"));
    server = new AssetServer(new PathResolver(createMediaSettings(root)));

    const dir360 = path.join(root, "hls", "1", "360p");
    fs.mkdirSync(dir360, { recursive: true });
    fs.writeFileSync(path.join(dir360, "index.m3u8"), "#EXTM3U\n");
    fs.writeFileSync(path.join(dir360, "000.ts"), "segment-bytes");
    fs.mkdirSync(path.join(dir360, "nested"));
    fs.writeFileSync(path.join(root, "hls", "1", "thumb.jpg"), "jpeg");
    fs.writeFileSync(path.join(root, "secret.txt"), "do not serve");
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("streams the manifest with the HLS playlist content type", async () => {
    const asset = await server.serveManifest(1, "360p");
    expect(asset.contentType).toBe(MANIFEST_CONTENT_TYPE);
    expect(asset.size).toBe(8);
    expect(await readAll(asset.stream)).toBe("#EXTM3U\n");
  });

  it("streams 480p requests from the 360p files", async () => {
    const asset = await server.serveManifest(1, "480p");
    expect(await readAll(asset.stream)).toBe("#EXTM3U\n");
  });

  it("streams segments as video/MP2T", async () => {
    const asset = await server.serveSegment(1, "360p", "000.ts");
    expect(asset.contentType).toBe(SEGMENT_CONTENT_TYPE);
    expect(asset.size).toBe(13);
    expect(await readAll(asset.stream)).toBe("segment-bytes");
  });

  it("serves the thumbnail as jpeg", async () => {
    const asset = await server.serveThumbnail(1);
    expect(asset.contentType).toBe(THUMBNAIL_CONTENT_TYPE);
    expect(await readAll(asset.stream)).toBe("jpeg");
  });

  it("returns NotFound for files that are not on disk", async () => {
    await expect(server.serveManifest(1, "720p")).rejects.toBeInstanceOf(NotFoundError);
    await expect(server.serveManifest(2, "360p")).rejects.toBeInstanceOf(NotFoundError);
    await expect(server.serveSegment(1, "360p", "001.ts")).rejects.toBeInstanceOf(NotFoundError);
    await expect(server.serveThumbnail(2)).rejects.toBeInstanceOf(NotFoundError);
  });

  it("returns NotFound for directories", async () => {
    await expect(server.serveSegment(1, "360p", "nested")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("returns NotFound for traversal attempts and unknown qualities", async () => {
    await expect(server.serveSegment(1, "360p", "../../../secret.txt")).rejects.toBeInstanceOf(NotFoundError);
    await expect(server.serveSegment(1, "360p", "../../../etc/passwd")).rejects.toBeInstanceOf(NotFoundError);
    await expect(server.serveManifest(1, "240p")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("keeps streaming a segment that is removed after it was opened", async () => {
    const asset = await server.serveSegment(1, "360p", "000.ts");
    fs.unlinkSync(path.join(root, "hls", "1", "360p", "000.ts"));

    expect(asset.size).toBe(13);
    expect(await readAll(asset.stream)).toBe("segment-bytes");
  });
});
