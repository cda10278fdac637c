import * as path from "path";
import sharp from "sharp";
import { Canvas } from "@core/types";
import { CanvasUtils } from "@services/canvas/CanvasUtils";
import { randomString } from "@utils/crypto";

const TEMP_SUFFIX_CHARSET = "abcdefghijklmnopqrstuvwxyz0123456789";

/**
 * Temporary file beside `outputPath`, unique per call so concurrent
 * writes to one filename do not share it
 */
export function temporaryPathFor(outputPath: string): string {
  const base = path.basename(outputPath, ".png");
  return path.join(
    path.dirname(outputPath),
    `.${base}.${randomString(8, TEMP_SUFFIX_CHARSET)}.tmp.png`,
  );
}

/**
 * sharp pipeline reading the canvas as raw RGB
 */
export function sharpFromCanvas(canvas: Canvas): sharp.Sharp {
  const raw = CanvasUtils.toRaw(canvas);
  return sharp(raw.data, {
    raw: { width: raw.width, height: raw.height, channels: raw.channels },
  });
}
