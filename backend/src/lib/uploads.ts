import fs from "fs";
import path from "path";
import { randomUUID } from "crypto";
import busboy from "busboy";
import type { Busboy, FileInfo } from "busboy";
import type { IncomingMessage } from "http";
import type { Readable } from "stream";
import { HttpError, ValidationError } from "./errors";

// Originals live beside the HLS tree, e.g. <mediaRoot>/videos/original/<uuid>.mp4
export const UPLOAD_DIR = "videos/original";
export const VIDEO_FILE_FIELD = "video_file";
export const VIDEO_EXTENSIONS = [".mp4", ".mov", ".m4v", ".mkv", ".webm", ".avi"];

export interface UploadOptions {
  mediaRoot: string;
  maxBytes: number;
}

export interface VideoUpload {
  fields: Map<string, string>;
  // relative to the media root, forward slashes
  sourceFilePath: string;
  absolutePath: string;
  originalFilename: string;
  bytes: number;
}

export class UploadTooLargeError extends HttpError {
  constructor(maxBytes: number) {
    super(`Upload exceeds ${Math.ceil(maxBytes / (1024 * 1024))}MB`, 413);
  }
}

export const discardUpload = (upload: VideoUpload): Promise<void> =>
  fs.promises.rm(upload.absolutePath, { force: true });

/**
 * Streams a multipart/form-data request to disk. Exactly one `video_file` part is
 * accepted; every other part is collected as a text field.
 */
export async function receiveVideoUpload(
  req: IncomingMessage,
  options: UploadOptions,
): Promise<VideoUpload> {
  const contentType = req.headers["content-type"];
  if (typeof contentType !== "string" || !contentType.toLowerCase().startsWith("multipart/form-data")) {
    throw new ValidationError("Expected multipart/form-data");
  }

  const uploadDir = path.join(options.mediaRoot, ...UPLOAD_DIR.split("/"));
  await fs.promises.mkdir(uploadDir, { recursive: true });

  return new Promise<VideoUpload>((resolve, reject) => {
    let bb: Busboy;
    try {
      bb = busboy({
        headers: req.headers,
        limits: { fileSize: options.maxBytes, files: 1, fields: 20, fieldSize: 64 * 1024 },
      });
    } catch (err) {
      reject(new ValidationError(err instanceof Error ? err.message : "Malformed multipart body"));
      return;
    }

    const fields = new Map<string, string>();
    let storedName: string | undefined;
    let originalFilename = "";
    let fileDone: Promise<void> | undefined;
    let writeStream: fs.WriteStream | undefined;
    let bytes = 0;
    let failed = false;

    const absolutePathOf = (name: string) => path.join(uploadDir, name);

    const fail = (err: Error) => {
      if (failed) return;
      failed = true;
      req.unpipe(bb);
      req.resume();
      const name = storedName;
      if (!name || !writeStream) {
        reject(err);
        return;
      }
      // drop the partial file before answering so a rejected upload leaves nothing behind
      writeStream.destroy();
      const closed = fileDone ?? Promise.resolve();
      closed
        .then(() => fs.promises.rm(absolutePathOf(name), { force: true }))
        .then(
          () => reject(err),
          () => reject(err),
        );
    };

    bb.on("file", (name: string, file: Readable, info: FileInfo) => {
      // an empty file input arrives as a part without a filename
      if (name !== VIDEO_FILE_FIELD || storedName || !info.filename) {
        file.resume();
        return;
      }

      originalFilename = info.filename;
      const ext = path.extname(originalFilename).toLowerCase();
      if (!VIDEO_EXTENSIONS.includes(ext)) {
        file.resume();
        fail(new ValidationError(`Unsupported video extension: ${ext || "none"}`));
        return;
      }

      storedName = `${randomUUID()}${ext}`;
      const out = fs.createWriteStream(absolutePathOf(storedName));
      writeStream = out;
      fileDone = new Promise<void>((done) => {
        out.on("close", done);
      });

      file.on("data", (chunk: Buffer) => {
        bytes += chunk.length;
      });
      file.on("limit", () => fail(new UploadTooLargeError(options.maxBytes)));
      file.on("error", (err: Error) => fail(err));
      out.on("error", (err: Error) => fail(err));

      file.pipe(out);
    });

    bb.on("field", (name: string, value: string) => {
      fields.set(name, value);
    });

    bb.on("filesLimit", () => fail(new ValidationError("Only one file is allowed")));
    bb.on("error", (err: Error) => fail(new ValidationError(err.message)));

    bb.on("finish", () => {
      if (failed) return;
      const name = storedName;
      if (!name || !fileDone) {
        fail(new ValidationError(`Missing ${VIDEO_FILE_FIELD}`));
        return;
      }
      fileDone.then(() => {
        if (failed) return;
        if (bytes === 0) {
          fail(new ValidationError(`${VIDEO_FILE_FIELD} is empty`));
          return;
        }
        resolve({
          fields,
          sourceFilePath: `${UPLOAD_DIR}/${name}`,
          absolutePath: absolutePathOf(name),
          originalFilename,
          bytes,
        });
      }, fail);
    });

    req.pipe(bb);
  });
}
