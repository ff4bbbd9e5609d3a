// Video record as the rest of the app sees it (camelCase, see lib/db.ts for the row shape)
export interface VideoRecord {
  id: number;
  createdAt: Date;
  title: string;
  description: string;
  category: string;
  // relative to the media root, e.g. "videos/original/clip.mp4"
  sourceFilePath: string | null;
  thumbnailPath: string | null;
  // "hls/<id>" once processed, "" before
  hlsBaseDir: string;
  processed: boolean;
}

export interface NewVideo {
  title: string;
  description: string;
  category: string;
  sourceFilePath: string | null;
}

// Fields written by the transcode pipeline in one transaction
export interface ProcessedUpdate {
  hlsBaseDir: string;
  thumbnailPath: string | null;
}

export interface VideoStore {
  findById(id: number): Promise<VideoRecord | null>;
  list(): Promise<VideoRecord[]>;
  create(input: NewVideo): Promise<VideoRecord>;
  markProcessed(id: number, update: ProcessedUpdate): Promise<void>;
}

// Data carried by a transcode job
export interface TranscodeJobData {
  videoId: number;
}

// Route params
export interface VideoParams {
  videoId: string;
}

export interface ManifestParams extends VideoParams {
  resolution: string;
}

export interface SegmentParams extends ManifestParams {
  segment: string;
}
