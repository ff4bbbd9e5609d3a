import path from "path";
import { NotFoundError } from "../lib/errors";
import { HLS_DIR, THUMBNAIL_NAME } from "./settings";
import type { MediaSettings } from "./settings";

const FORBIDDEN_IN_NAME = /[/\\\0]/;

/**
 * Maps (videoId, quality, filename) to a file under `<mediaRoot>/hls/<id>/<variant>/`.
 *
 * Pure: no filesystem access. Every rejection is a NotFoundError so callers cannot
 * tell a bad label from a traversal attempt.
 */
export class PathResolver {
  constructor(private readonly settings: MediaSettings) {}

  resolve(videoId: number, requestedQuality: string, filename: string): string {
    const variant = this.aliasFor(requestedQuality);
    assertVideoId(videoId);
    if (!isLeafName(filename)) throw new NotFoundError();

    const base = path.resolve(this.settings.mediaRoot, HLS_DIR, String(videoId), variant);
    return contained(base, path.resolve(base, filename));
  }

  resolveThumbnail(videoId: number): string {
    assertVideoId(videoId);
    const base = path.resolve(this.settings.mediaRoot, HLS_DIR, String(videoId));
    return contained(base, path.resolve(base, THUMBNAIL_NAME));
  }

  aliasFor(requestedQuality: string): string {
    const aliases = this.settings.aliases;
    if (!Object.prototype.hasOwnProperty.call(aliases, requestedQuality)) {
      throw new NotFoundError("Unknown resolution");
    }
    return aliases[requestedQuality];
  }
}

const assertVideoId = (videoId: number): void => {
  if (!Number.isSafeInteger(videoId) || videoId < 0) throw new NotFoundError();
};

const isLeafName = (filename: string): boolean =>
  filename.length > 0 && filename !== "." && filename !== ".." && !FORBIDDEN_IN_NAME.test(filename);

const contained = (base: string, candidate: string): string => {
  if (!candidate.startsWith(base + path.sep)) throw new NotFoundError();
  return candidate;
};
