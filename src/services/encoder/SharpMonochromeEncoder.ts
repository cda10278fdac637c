import * as fs from "fs/promises";
import { IMonochromeEncoder } from "@core/interfaces";
import { Canvas, Result, failure, success } from "@core/types";
import { RenderError } from "@core/errors";
import { ENCODER_THRESHOLD } from "@core/constants";
import { getLogger } from "@utils/logger";
import { toError } from "@utils/typeGuards";
import { sharpFromCanvas, temporaryPathFor } from "./pngFiles";

const logger = getLogger("SharpEncoder");

/**
 * sharp Monochrome Encoder
 *
 * Used when no ImageMagick binary is installed. Thresholds the canvas and
 * writes a two-colour palette PNG, which libvips stores at 1 bit per pixel.
 */
export class SharpMonochromeEncoder implements IMonochromeEncoder {
  readonly name = "sharp";

  async encode(canvas: Canvas, outputPath: string): Promise<Result<void>> {
    const tempPath = temporaryPathFor(outputPath);

    try {
      await sharpFromCanvas(canvas)
        .greyscale()
        .threshold(ENCODER_THRESHOLD)
        .png({ palette: true, colours: 2 })
        .toFile(tempPath);
      await fs.rename(tempPath, outputPath);
    } catch (error) {
      logger.error(`Failed to encode ${outputPath}: ${toError(error).message}`);
      await fs.rm(tempPath, { force: true });
      return failure(RenderError.encodeFailed(outputPath, toError(error)));
    }

    logger.debug(`Encoded ${outputPath}`);
    return success(undefined);
  }
}
