import { Bitmap1Bit } from "@core/types";
import { BitmapUtils } from "@services/canvas/BitmapUtils";
import font from "./fonts/font5x7.json";

/**
 * 5x7 pixel bitmap font for 1-bit canvases.
 *
 * Glyph rows come from fonts/font5x7.json, one string per row with "#" for
 * an ink pixel. Lowercase letters are drawn as uppercase. Characters without
 * a glyph advance like a space.
 */

const GLYPH_WIDTH = font.width;
const GLYPH_HEIGHT = font.height;
const GLYPH_SPACING = font.spacing;

const GLYPHS: ReadonlyMap<string, readonly string[]> = new Map(
  Object.entries(font.glyphs),
);

export interface BitmapTextOptions {
  /** Integer pixel multiplier (default 1) */
  scale?: number;
}

/**
 * Width in pixels of `text` rendered at `scale`
 */
export function calculateBitmapTextWidth(text: string, scale: number = 1): number {
  const count = [...text].length;
  if (count === 0) {
    return 0;
  }
  return count * GLYPH_WIDTH * scale + (count - 1) * GLYPH_SPACING * scale;
}

/**
 * Height in pixels of one line rendered at `scale`
 */
export function calculateBitmapTextHeight(scale: number = 1): number {
  return GLYPH_HEIGHT * scale;
}

/**
 * Draw `text` in black with its top-left corner at (x, y).
 * Pixels outside the bitmap are clipped.
 */
export function renderBitmapText(
  bitmap: Bitmap1Bit,
  text: string,
  x: number,
  y: number,
  options: BitmapTextOptions = {},
): void {
  const scale = Math.max(1, Math.round(options.scale ?? 1));
  const advance = (GLYPH_WIDTH + GLYPH_SPACING) * scale;
  let cursorX = Math.round(x);
  const originY = Math.round(y);

  for (const char of text) {
    const rows = GLYPHS.get(char.toUpperCase());
    if (rows) {
      rows.forEach((row, rowIndex) => {
        for (let col = 0; col < row.length; col++) {
          if (row[col] !== "#") {
            continue;
          }
          const px = cursorX + col * scale;
          const py = originY + rowIndex * scale;
          for (let dy = 0; dy < scale; dy++) {
            for (let dx = 0; dx < scale; dx++) {
              BitmapUtils.setPixel(bitmap, px + dx, py + dy);
            }
          }
        }
      });
    }
    cursorX += advance;
  }
}
