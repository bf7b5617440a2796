import { describe, it, expect } from "@jest/globals";
import sharp from "sharp";
import { parseWallpaper, unwrap } from "../models.js";
import { generateThumbnailComposite } from "../thumbnails.js";
import { FakeTransport } from "./helpers/fake-transport.js";
import { wallpaperData } from "./helpers/fixtures.js";

function wallpapers(transport: FakeTransport, ids: string[]) {
  return ids.map((id) =>
    unwrap(
      parseWallpaper(
        wallpaperData({
          id,
          thumbs: {
            large: `https://th.wallhaven.cc/lg/${id}.jpg`,
            original: `https://th.wallhaven.cc/orig/${id}.jpg`,
            small: `https://th.wallhaven.cc/small/${id}.jpg`,
          },
        }),
        transport
      )
    )
  );
}

describe("thumbnails", () => {
  it("should return an empty string for no wallpapers", async () => {
    const transport = new FakeTransport();

    expect(await generateThumbnailComposite([], transport)).toBe("");
    expect(transport.requests).toHaveLength(0);
  });

  it("should return an empty string when every thumbnail fails", async () => {
    const transport = new FakeTransport(
      { status: 404 },
      { status: 0, error: new Error("timeout") }
    );

    const composite = await generateThumbnailComposite(
      wallpapers(transport, ["aaa111", "bbb222"]),
      transport
    );

    expect(composite).toBe("");
    expect(transport.requests.map((request) => request.url)).toEqual([
      "https://th.wallhaven.cc/small/aaa111.jpg",
      "https://th.wallhaven.cc/small/bbb222.jpg",
    ]);
  });

  it("should lay out the thumbnails that could be fetched", async () => {
    const thumbnail = await sharp({
      create: {
        width: 40,
        height: 20,
        channels: 3,
        background: { r: 200, g: 40, b: 40 },
      },
    })
      .png()
      .toBuffer();
    const transport = new FakeTransport(
      { status: 200, bytes: thumbnail },
      { status: 500 }
    );

    const composite = await generateThumbnailComposite(
      wallpapers(transport, ["aaa111", "bbb222"]),
      transport
    );
    const metadata = await sharp(Buffer.from(composite, "base64")).metadata();

    expect(metadata.format).toBe("jpeg");
    expect(metadata.width).toBe(808);
    expect(metadata.height).toBe(276);
  });
});
