import { Bitmap1Bit, Point2D } from "@core/types";

/**
 * Drawing primitives for packed 1-bit bitmaps.
 *
 * Bits are packed MSB first, one row after another; a set bit is white.
 * Every primitive takes an `ink` flag: true paints black, false paints
 * white (used to punch cutouts into filled shapes). Coordinates outside
 * the bitmap are clipped.
 */
export class BitmapUtils {
  /**
   * Create a blank bitmap, white unless `fill` is set
   */
  static createBlankBitmap(
    width: number,
    height: number,
    fill: boolean = false,
  ): Bitmap1Bit {
    const bytesPerRow = Math.ceil(width / 8);
    const data = new Uint8Array(bytesPerRow * height);
    data.fill(fill ? 0x00 : 0xff);

    return {
      width,
      height,
      data,
      metadata: {
        createdAt: new Date(),
      },
    };
  }

  static getBytesPerRow(bitmap: Bitmap1Bit): number {
    return Math.ceil(bitmap.width / 8);
  }

  /**
   * Set one pixel (true = black)
   */
  static setPixel(
    bitmap: Bitmap1Bit,
    x: number,
    y: number,
    ink: boolean = true,
  ): void {
    if (x < 0 || x >= bitmap.width || y < 0 || y >= bitmap.height) {
      return;
    }

    const byteIndex = y * BitmapUtils.getBytesPerRow(bitmap) + (x >> 3);
    const bitIndex = 7 - (x & 7);

    if (ink) {
      bitmap.data[byteIndex] &= ~(1 << bitIndex);
    } else {
      bitmap.data[byteIndex] |= 1 << bitIndex;
    }
  }

  /**
   * Whether the pixel at (x, y) is black. Outside pixels read as white.
   */
  static isInk(bitmap: Bitmap1Bit, x: number, y: number): boolean {
    if (x < 0 || x >= bitmap.width || y < 0 || y >= bitmap.height) {
      return false;
    }
    const byteIndex = y * BitmapUtils.getBytesPerRow(bitmap) + (x >> 3);
    return ((bitmap.data[byteIndex] >> (7 - (x & 7))) & 1) === 0;
  }

  /**
   * Paint pixels [startX, endX) of row y using byte-level writes
   * @internal
   */
  static fillHorizontalSpan(
    bitmap: Bitmap1Bit,
    startX: number,
    endX: number,
    y: number,
    ink: boolean = true,
  ): void {
    const from = Math.max(0, Math.floor(startX));
    const to = Math.min(bitmap.width, Math.ceil(endX));
    if (y < 0 || y >= bitmap.height || to <= from) {
      return;
    }

    const data = bitmap.data;
    const rowOffset = y * BitmapUtils.getBytesPerRow(bitmap);
    const startByte = from >> 3;
    const startBit = from & 7;
    const endByte = (to - 1) >> 3;
    const endBit = (to - 1) & 7;

    const apply = (index: number, mask: number): void => {
      if (ink) {
        data[index] &= ~mask & 0xff;
      } else {
        data[index] |= mask;
      }
    };

    if (startByte === endByte) {
      const mask = ((1 << (8 - startBit)) - 1) & ~((1 << (7 - endBit)) - 1);
      apply(rowOffset + startByte, mask);
      return;
    }

    apply(rowOffset + startByte, (1 << (8 - startBit)) - 1);
    for (let b = startByte + 1; b < endByte; b++) {
      data[rowOffset + b] = ink ? 0x00 : 0xff;
    }
    apply(rowOffset + endByte, ~((1 << (7 - endBit)) - 1) & 0xff);
  }

  /**
   * Fill the rectangle with top-left (x, y) and the given size
   */
  static fillRect(
    bitmap: Bitmap1Bit,
    x: number,
    y: number,
    width: number,
    height: number,
    ink: boolean = true,
  ): void {
    const top = Math.max(0, Math.floor(y));
    const bottom = Math.min(bitmap.height, Math.floor(y + height));
    for (let row = top; row < bottom; row++) {
      BitmapUtils.fillHorizontalSpan(bitmap, x, x + width, row, ink);
    }
  }

  /**
   * Outline a rectangle with lines `thickness` pixels wide, drawn inward
   */
  static strokeRect(
    bitmap: Bitmap1Bit,
    x: number,
    y: number,
    width: number,
    height: number,
    thickness: number = 1,
  ): void {
    const t = Math.min(thickness, Math.floor(width / 2), Math.floor(height / 2));
    if (t <= 0) {
      BitmapUtils.fillRect(bitmap, x, y, width, height);
      return;
    }
    BitmapUtils.fillRect(bitmap, x, y, width, t);
    BitmapUtils.fillRect(bitmap, x, y + height - t, width, t);
    BitmapUtils.fillRect(bitmap, x, y + t, t, height - 2 * t);
    BitmapUtils.fillRect(bitmap, x + width - t, y + t, t, height - 2 * t);
  }

  /**
   * Fill the ellipse inscribed in the box [x0, x1) x [y0, y1)
   */
  static fillEllipse(
    bitmap: Bitmap1Bit,
    x0: number,
    y0: number,
    x1: number,
    y1: number,
    ink: boolean = true,
  ): void {
    const rx = (x1 - x0) / 2;
    const ry = (y1 - y0) / 2;
    if (rx <= 0 || ry <= 0) {
      return;
    }
    const cx = x0 + rx;
    const cy = y0 + ry;

    for (let row = Math.floor(y0); row < Math.ceil(y1); row++) {
      // Sample at the pixel centre
      const dy = (row + 0.5 - cy) / ry;
      if (dy * dy > 1) {
        continue;
      }
      const half = rx * Math.sqrt(1 - dy * dy);
      BitmapUtils.fillHorizontalSpan(
        bitmap,
        Math.round(cx - half),
        Math.round(cx + half),
        row,
        ink,
      );
    }
  }

  /**
   * Fill a triangle defined by three points (scan-line fill)
   */
  static fillTriangle(
    bitmap: Bitmap1Bit,
    p1: Point2D,
    p2: Point2D,
    p3: Point2D,
    ink: boolean = true,
  ): void {
    const [top, mid, bottom] = [p1, p2, p3]
      .map((p) => ({ x: Math.round(p.x), y: Math.round(p.y) }))
      .sort((a, b) => a.y - b.y);

    const startY = Math.max(top.y, 0);
    const endY = Math.min(bottom.y, bitmap.height - 1);

    for (let y = startY; y <= endY; y++) {
      let xStart =
        y < mid.y
          ? BitmapUtils.interpolateX(top, mid, y)
          : BitmapUtils.interpolateX(mid, bottom, y);
      let xEnd = BitmapUtils.interpolateX(top, bottom, y);

      if (xStart > xEnd) {
        [xStart, xEnd] = [xEnd, xStart];
      }

      BitmapUtils.fillHorizontalSpan(
        bitmap,
        Math.floor(xStart),
        Math.ceil(xEnd) + 1,
        y,
        ink,
      );
    }
  }

  /**
   * x coordinate of the segment p1-p2 at height y
   */
  static interpolateX(p1: Point2D, p2: Point2D, y: number): number {
    if (p2.y === p1.y) return p1.x;
    return p1.x + ((y - p1.y) * (p2.x - p1.x)) / (p2.y - p1.y);
  }
}
