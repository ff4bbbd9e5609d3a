import path from "path";

export interface QualityVariant {
  name: string;
  height: number;
  videoBitrate: string;
}

export interface AudioProfile {
  codec: string;
  sampleRate: number;
  bitrate: string;
}

export type ResolutionAliases = Readonly<Record<string, string>>;

export interface MediaSettings {
  mediaRoot: string;
  ladder: readonly QualityVariant[];
  aliases: ResolutionAliases;
  audio: AudioProfile;
  segmentSeconds: number;
  playlistType: "vod";
  thumbnailAtSeconds: number;
}

// videos.id is a SERIAL (int4) column
export const MAX_VIDEO_ID = 2_147_483_647;

export const HLS_DIR = "hls";
export const MANIFEST_NAME = "index.m3u8";
export const SEGMENT_PATTERN = "%03d.ts";
export const THUMBNAIL_NAME = "thumb.jpg";

export const DEFAULT_LADDER: readonly QualityVariant[] = [
  { name: "360p", height: 360, videoBitrate: "800k" },
  { name: "720p", height: 720, videoBitrate: "2500k" },
  { name: "1080p", height: 1080, videoBitrate: "4500k" },
];

// Client-facing label -> stored variant. No 480p rendition is produced.
export const DEFAULT_ALIASES: ResolutionAliases = {
  "480p": "360p",
  "360p": "360p",
  "720p": "720p",
  "1080p": "1080p",
};

const freezeAll = <T extends object>(items: readonly T[]): readonly T[] =>
  Object.freeze(items.map((item) => Object.freeze({ ...item })));

export const createMediaSettings = (
  mediaRoot: string,
  overrides: Partial<Omit<MediaSettings, "mediaRoot">> = {},
): MediaSettings => {
  const ladder = overrides.ladder ?? DEFAULT_LADDER;
  const aliases = overrides.aliases ?? DEFAULT_ALIASES;

  const produced = new Set(ladder.map((variant) => variant.name));
  for (const [label, target] of Object.entries(aliases)) {
    if (!produced.has(target)) {
      throw new Error(`Alias ${label} points at ${target}, which the ladder does not produce`);
    }
  }

  return Object.freeze({
    mediaRoot: path.resolve(mediaRoot),
    ladder: freezeAll(ladder),
    aliases: Object.freeze({ ...aliases }),
    audio: Object.freeze(overrides.audio ?? { codec: "aac", sampleRate: 48000, bitrate: "128k" }),
    segmentSeconds: overrides.segmentSeconds ?? 4,
    playlistType: "vod" as const,
    thumbnailAtSeconds: overrides.thumbnailAtSeconds ?? 3,
  });
};

// Relative directory stored on the record, always with forward slashes.
export const hlsBaseDirFor = (videoId: number): string => `${HLS_DIR}/${videoId}`;

export const videoOutputDir = (settings: MediaSettings, videoId: number): string =>
  path.join(settings.mediaRoot, HLS_DIR, String(videoId));
