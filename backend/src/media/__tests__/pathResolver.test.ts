import path from "path";
import { describe, it, expect } from "vitest";
import { NotFoundError } from "../../lib/errors";
import { PathResolver } from "../pathResolver";
import { createMediaSettings } from "../settings";

const settings = createMediaSettings("/srv/media");
const resolver = new PathResolver(settings);
const variantDir = (id: number, name: string) => path.join(settings.mediaRoot, "hls", String(id), name);

describe("PathResolver.resolve", () => {
  it("composes mediaRoot/hls/<id>/<variant>/<filename>", () => {
    expect(resolver.resolve(7, "720p", "index.m3u8")).toBe(path.join(variantDir(7, "720p"), "index.m3u8"));
    expect(resolver.resolve(7, "1080p", "012.ts")).toBe(path.join(variantDir(7, "1080p"), "012.ts"));
  });

  it("serves 480p from the 360p directory", () => {
    for (const name of ["index.m3u8", "000.ts", "..ts"]) {
      expect(resolver.resolve(3, "480p", name)).toBe(resolver.resolve(3, "360p", name));
    }
    expect(resolver.resolve(3, "480p", "000.ts")).toBe(path.join(variantDir(3, "360p"), "000.ts"));
  });

  it.each(["240p", "4k", "", "360P", "__proto__", "constructor", "toString"])(
    "rejects unknown quality %j",
    (quality) => {
      expect(() => resolver.resolve(1, quality, "index.m3u8")).toThrow(NotFoundError);
    },
  );

  it.each([
    "../../../etc/passwd",
    "../index.m3u8",
    "..\\..\\secret",
    "sub/000.ts",
    "/etc/passwd",
    "..",
    ".",
    "",
    "000.ts\0.jpg",
  ])("rejects filename %j", (filename) => {
    expect(() => resolver.resolve(1, "360p", filename)).toThrow(NotFoundError);
  });

  it("keeps names made only of dots inside the variant directory", () => {
    const resolved = resolver.resolve(1, "720p", "....");
    expect(resolved).toBe(path.join(variantDir(1, "720p"), "...."));
    expect(resolved.startsWith(variantDir(1, "720p") + path.sep)).toBe(true);
  });

  it.each([-1, 1.5, Number.NaN, Number.MAX_SAFE_INTEGER + 1])("rejects video id %d", (id) => {
    expect(() => resolver.resolve(id, "360p", "index.m3u8")).toThrow(NotFoundError);
  });

  it("reports every rejection as a plain 404", () => {
    const attempts = [
      () => resolver.resolve(1, "240p", "index.m3u8"),
      () => resolver.resolve(1, "360p", "../x"),
    ];
    for (const attempt of attempts) {
      let caught: unknown;
      try {
        attempt();
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(NotFoundError);
      expect(caught).toMatchObject({ statusCode: 404 });
    }
  });
});

describe("PathResolver.resolveThumbnail", () => {
  it("points at thumb.jpg in the video's hls directory", () => {
    expect(resolver.resolveThumbnail(9)).toBe(path.join(settings.mediaRoot, "hls", "9", "thumb.jpg"));
  });
});

describe("createMediaSettings", () => {
  it("rejects an alias whose target is not produced", () => {
    expect(() =>
      createMediaSettings("/srv/media", { aliases: { "480p": "480p" } }),
    ).toThrow("Alias 480p points at 480p, which the ladder does not produce");
  });

  it("freezes the alias table and ladder", () => {
    expect(Object.isFrozen(settings.aliases)).toBe(true);
    expect(Object.isFrozen(settings.ladder)).toBe(true);
    expect(settings.ladder.map((v) => `${v.name}@${v.videoBitrate}`)).toEqual([
      "360p@800k",
      "720p@2500k",
      "1080p@4500k",
    ]);
  });
});
