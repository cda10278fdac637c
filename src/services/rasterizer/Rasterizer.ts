import { IRasterizer } from "@core/interfaces";
import {
  Canvas,
  ContentPayload,
  Result,
  failure,
  success,
} from "@core/types";
import { RenderError } from "@core/errors";
import { CANVAS_MAX_DIMENSION } from "@core/constants";
import { BitmapUtils } from "@services/canvas/BitmapUtils";
import { getLogger } from "@utils/logger";
import { htmlToText } from "./htmlText";
import { renderBigText } from "./BigTextRenderer";
import { renderDefaultLayout, renderPlainText } from "./TextRenderer";
import { decodeDataUri } from "./DataUriDecoder";

const logger = getLogger("Rasterizer");

/**
 * Rasterizer Implementation
 *
 * Text, HTML and big text are drawn on a 1-bit bitmap with the built-in
 * bitmap font. Data URIs are decoded by sharp onto an RGB canvas. Text
 * that is empty after normalization gets the default status layout.
 */
export class Rasterizer implements IRasterizer {
  constructor(private readonly now: () => Date = () => new Date()) {}

  async render(
    payload: ContentPayload,
    width: number,
    height: number,
  ): Promise<Result<Canvas>> {
    if (!Rasterizer.isValidDimension(width) || !Rasterizer.isValidDimension(height)) {
      return failure(RenderError.invalidDimensions(width, height));
    }

    logger.debug(`Rendering ${payload.kind} at ${width}x${height}`);

    switch (payload.kind) {
      case "text":
        return success(this.renderText(payload.text, width, height));
      case "html":
        return success(this.renderText(htmlToText(payload.raw), width, height));
      case "big_text": {
        const bitmap = BitmapUtils.createBlankBitmap(width, height);
        const layout = renderBigText(bitmap, payload.raw, payload.subtitle);
        logger.debug(
          `Big text: ${layout.cells.length} cells of ${layout.cellWidth}x${layout.cellHeight} from x=${layout.startX}`,
        );
        return success({ kind: "mono", bitmap });
      }
      case "data_uri": {
        const decoded = await decodeDataUri(payload.raw, width, height);
        if (!decoded.success) {
          return decoded;
        }
        return success({ kind: "rgb", image: decoded.data });
      }
    }
  }

  private renderText(text: string, width: number, height: number): Canvas {
    const bitmap = BitmapUtils.createBlankBitmap(width, height);
    if (text.trim().length === 0) {
      renderDefaultLayout(bitmap, this.now());
    } else {
      const drawn = renderPlainText(bitmap, text);
      logger.debug(`Drew ${drawn} text line(s)`);
    }
    return { kind: "mono", bitmap };
  }

  private static isValidDimension(value: number): boolean {
    return Number.isInteger(value) && value > 0 && value <= CANVAS_MAX_DIMENSION;
  }
}
