import sharp from "sharp";
import { MAX_IMAGES_IN_COMPOSITE, THUMBNAIL_SIZE } from "./constants.js";
import { silentLogger, type Logger } from "./log.js";
import type { Wallpaper } from "./models.js";
import type { Transport } from "./transport.js";

// Grid configuration
const COLUMNS = 3;
const SPACING = 10;

function cellOrigin(index: number): { top: number; left: number } {
  const row = Math.floor(index / COLUMNS);
  const col = index % COLUMNS;
  return {
    top: row * THUMBNAIL_SIZE + (row + 1) * SPACING,
    left: col * THUMBNAIL_SIZE + (col + 1) * SPACING,
  };
}

function indexOverlay(index: number): Buffer {
  return Buffer.from(`
      <svg width="40" height="30">
        <text
          x="20"
          y="20"
          text-anchor="middle"
          font-family="Arial, sans-serif"
          font-size="20"
          font-weight="bold"
          fill="white"
          stroke="black"
          stroke-width="2"
          paint-order="stroke">
          ${index + 1}
        </text>
      </svg>
    `);
}

/**
 * Build a 3-column contact sheet of the wallpapers' small thumbnails with
 * their position overlaid, returned as base64 JPEG. Thumbnails are fetched
 * one at a time; ones that fail are left blank. Returns "" when nothing could
 * be drawn.
 */
export async function generateThumbnailComposite(
  wallpapers: readonly Wallpaper[],
  transport: Transport,
  logger: Logger = silentLogger
): Promise<string> {
  const limited = wallpapers.slice(0, MAX_IMAGES_IN_COMPOSITE);
  if (limited.length === 0) {
    return "";
  }

  const rows = Math.ceil(limited.length / COLUMNS);
  const canvasWidth = COLUMNS * THUMBNAIL_SIZE + (COLUMNS + 1) * SPACING;
  const canvasHeight = rows * THUMBNAIL_SIZE + (rows + 1) * SPACING;

  const layers: Array<{ input: Buffer; top: number; left: number }> = [];
  const overlays: Array<{ input: Buffer; top: number; left: number }> = [];

  for (const [index, wallpaper] of limited.entries()) {
    try {
      const response = await transport.get({ url: wallpaper.thumbs.small });
      if (response.status < 200 || response.status >= 300) {
        await response.cancel();
        logger.error(
          `Failed to fetch thumbnail ${index + 1} (${wallpaper.id}): HTTP ${response.status}`
        );
        continue;
      }

      // Resize to fit in the cell while keeping the aspect ratio
      const resized = await sharp(await response.buffer())
        .resize(THUMBNAIL_SIZE, THUMBNAIL_SIZE, {
          fit: "inside",
          background: { r: 255, g: 255, b: 255, alpha: 1 },
        })
        .toBuffer();

      const { top, left } = cellOrigin(index);
      layers.push({ input: resized, top, left });
      overlays.push({ input: indexOverlay(index), top: top + 5, left: left + 5 });
    } catch (error) {
      logger.error(`Error processing thumbnail ${index + 1} (${wallpaper.id})`, error);
    }
  }

  if (layers.length === 0) {
    return "";
  }

  const composite = await sharp({
    create: {
      width: canvasWidth,
      height: canvasHeight,
      channels: 4,
      background: { r: 255, g: 255, b: 255, alpha: 1 },
    },
  })
    .composite([...layers, ...overlays])
    .jpeg({ quality: 90 })
    .toBuffer();

  return composite.toString("base64");
}
