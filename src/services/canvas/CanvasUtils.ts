import {
  Bitmap1Bit,
  Canvas,
  RgbCanvas,
  RgbColor,
  RgbImage,
  WHITE,
} from "@core/types";
import { BitmapUtils } from "./BitmapUtils";

/**
 * Helpers for the RGB stage of the pipeline and for moving between the
 * canvas kinds.
 */
export class CanvasUtils {
  static createRgbImage(
    width: number,
    height: number,
    background: RgbColor = WHITE,
  ): RgbImage {
    const data = new Uint8Array(width * height * 3);
    for (let i = 0; i < data.length; i += 3) {
      data[i] = background[0];
      data[i + 1] = background[1];
      data[i + 2] = background[2];
    }
    return { width, height, data };
  }

  static dimensions(canvas: Canvas): { width: number; height: number } {
    return canvas.kind === "mono"
      ? { width: canvas.bitmap.width, height: canvas.bitmap.height }
      : { width: canvas.image.width, height: canvas.image.height };
  }

  /**
   * Expand a 1-bit bitmap to RGB (black and white only)
   */
  static bitmapToRgb(bitmap: Bitmap1Bit): RgbImage {
    const image = CanvasUtils.createRgbImage(bitmap.width, bitmap.height);
    for (let y = 0; y < bitmap.height; y++) {
      for (let x = 0; x < bitmap.width; x++) {
        if (BitmapUtils.isInk(bitmap, x, y)) {
          const offset = (y * bitmap.width + x) * 3;
          image.data[offset] = 0;
          image.data[offset + 1] = 0;
          image.data[offset + 2] = 0;
        }
      }
    }
    return image;
  }

  /**
   * Return an RGB canvas. Mono canvases are converted, RGB ones returned
   * as they are.
   */
  static promoteToRgb(canvas: Canvas): RgbCanvas {
    if (canvas.kind === "rgb") {
      return canvas;
    }
    return { kind: "rgb", image: CanvasUtils.bitmapToRgb(canvas.bitmap) };
  }

  static setRgbPixel(image: RgbImage, x: number, y: number, color: RgbColor): void {
    if (x < 0 || x >= image.width || y < 0 || y >= image.height) {
      return;
    }
    const offset = (y * image.width + x) * 3;
    image.data[offset] = color[0];
    image.data[offset + 1] = color[1];
    image.data[offset + 2] = color[2];
  }

  static fillRgbRect(
    image: RgbImage,
    x: number,
    y: number,
    width: number,
    height: number,
    color: RgbColor,
  ): void {
    const x0 = Math.max(0, x);
    const y0 = Math.max(0, y);
    const x1 = Math.min(image.width, x + width);
    const y1 = Math.min(image.height, y + height);
    for (let row = y0; row < y1; row++) {
      for (let col = x0; col < x1; col++) {
        CanvasUtils.setRgbPixel(image, col, row, color);
      }
    }
  }

  /**
   * 1px outline of the rectangle [x, x + width) x [y, y + height)
   */
  static strokeRgbRect(
    image: RgbImage,
    x: number,
    y: number,
    width: number,
    height: number,
    color: RgbColor,
  ): void {
    CanvasUtils.fillRgbRect(image, x, y, width, 1, color);
    CanvasUtils.fillRgbRect(image, x, y + height - 1, width, 1, color);
    CanvasUtils.fillRgbRect(image, x, y, 1, height, color);
    CanvasUtils.fillRgbRect(image, x + width - 1, y, 1, height, color);
  }

  /**
   * Copy the black pixels of `stencil` onto `image` at (x, y) in `color`.
   * White stencil pixels leave the image untouched.
   */
  static drawStencil(
    image: RgbImage,
    stencil: Bitmap1Bit,
    x: number,
    y: number,
    color: RgbColor,
  ): void {
    for (let sy = 0; sy < stencil.height; sy++) {
      for (let sx = 0; sx < stencil.width; sx++) {
        if (BitmapUtils.isInk(stencil, sx, sy)) {
          CanvasUtils.setRgbPixel(image, x + sx, y + sy, color);
        }
      }
    }
  }

  /**
   * Raw pixel buffer and layout for handing a canvas to sharp
   */
  static toRaw(canvas: Canvas): {
    data: Buffer;
    width: number;
    height: number;
    channels: 3;
  } {
    const image =
      canvas.kind === "rgb" ? canvas.image : CanvasUtils.bitmapToRgb(canvas.bitmap);
    return {
      data: Buffer.from(image.data.buffer, image.data.byteOffset, image.data.byteLength),
      width: image.width,
      height: image.height,
      channels: 3,
    };
  }
}
