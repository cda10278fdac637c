import { IWatermarkService } from "@core/interfaces";
import { BLACK, Canvas, RgbCanvas, WHITE } from "@core/types";
import {
  WATERMARK_FONT_SCALE,
  WATERMARK_MARGIN,
  WATERMARK_PADDING,
} from "@core/constants";
import { BitmapUtils } from "@services/canvas/BitmapUtils";
import { CanvasUtils } from "@services/canvas/CanvasUtils";
import {
  calculateBitmapTextHeight,
  calculateBitmapTextWidth,
  renderBitmapText,
} from "@utils/bitmapFont";

export type WatermarkBox = {
  /** Top-left of the label text */
  textX: number;
  textY: number;
  textWidth: number;
  textHeight: number;
  /** Backing box, outline included */
  boxX: number;
  boxY: number;
  boxWidth: number;
  boxHeight: number;
};

/**
 * Where the label and its backing box go on a width x height canvas
 */
export function placeWatermark(label: string, width: number, height: number): WatermarkBox {
  const textWidth = calculateBitmapTextWidth(label, WATERMARK_FONT_SCALE);
  const textHeight = calculateBitmapTextHeight(WATERMARK_FONT_SCALE);
  const textX = width - textWidth - WATERMARK_MARGIN;
  const textY = height - textHeight - WATERMARK_MARGIN;

  // The box covers [text - padding, text end + padding] inclusive
  return {
    textX,
    textY,
    textWidth,
    textHeight,
    boxX: textX - WATERMARK_PADDING,
    boxY: textY - WATERMARK_PADDING,
    boxWidth: textWidth + 2 * WATERMARK_PADDING + 1,
    boxHeight: textHeight + 2 * WATERMARK_PADDING + 1,
  };
}

/**
 * Watermark Service
 *
 * Stamps the server label in black on a white, outlined box in the
 * bottom-right corner. Mono canvases are promoted to RGB first; RGB
 * canvases are drawn on in place.
 */
export class WatermarkService implements IWatermarkService {
  constructor(private readonly defaultLabel: string) {}

  watermark(canvas: Canvas, label: string = this.defaultLabel): RgbCanvas {
    const promoted = CanvasUtils.promoteToRgb(canvas);
    if (label.length === 0) {
      return promoted;
    }

    const { image } = promoted;
    const box = placeWatermark(label, image.width, image.height);

    CanvasUtils.fillRgbRect(image, box.boxX, box.boxY, box.boxWidth, box.boxHeight, WHITE);
    CanvasUtils.strokeRgbRect(image, box.boxX, box.boxY, box.boxWidth, box.boxHeight, BLACK);

    const stencil = BitmapUtils.createBlankBitmap(box.textWidth, box.textHeight);
    renderBitmapText(stencil, label, 0, 0, { scale: WATERMARK_FONT_SCALE });
    CanvasUtils.drawStencil(image, stencil, box.textX, box.textY, BLACK);

    return promoted;
  }
}
