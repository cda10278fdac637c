import * as fs from "fs/promises";
import { IMonochromeEncoder } from "@core/interfaces";
import { Canvas, Result, failure, success } from "@core/types";
import { RenderError } from "@core/errors";
import { ENCODER_DEFAULT_MAGICK_TIMEOUT_MS } from "@core/constants";
import { getLogger } from "@utils/logger";
import { MagickCommand, monochromeArgs, runMagick } from "@utils/imagemagick";
import { toError } from "@utils/typeGuards";
import { sharpFromCanvas, temporaryPathFor } from "./pngFiles";

const logger = getLogger("MagickEncoder");

/**
 * ImageMagick Monochrome Encoder
 *
 * Saves the canvas as an ordinary PNG next to the target, then has
 * ImageMagick quantize it to a stripped 1-bit PNG at the target path.
 * When ImageMagick fails or times out, the unquantized PNG is moved into
 * place instead, so a file exists at the target either way.
 */
export class MagickMonochromeEncoder implements IMonochromeEncoder {
  readonly name = "imagemagick";

  constructor(
    private readonly command: MagickCommand,
    private readonly timeoutMs: number = ENCODER_DEFAULT_MAGICK_TIMEOUT_MS,
  ) {}

  async encode(canvas: Canvas, outputPath: string): Promise<Result<void>> {
    const tempPath = temporaryPathFor(outputPath);

    try {
      await sharpFromCanvas(canvas).png().toFile(tempPath);
    } catch (error) {
      logger.error(`Failed to write ${tempPath}: ${toError(error).message}`);
      return failure(RenderError.encodeFailed(outputPath, toError(error)));
    }

    try {
      await runMagick(this.command, monochromeArgs(tempPath, outputPath), this.timeoutMs);
    } catch (error) {
      logger.warn(
        `Quantization failed, keeping the unquantized PNG for ${outputPath}: ${toError(error).message}`,
      );
      return this.moveIntoPlace(tempPath, outputPath);
    }

    try {
      await fs.unlink(tempPath);
    } catch (error) {
      logger.warn(`Could not remove ${tempPath}: ${toError(error).message}`);
    }

    logger.debug(`Encoded ${outputPath}`);
    return success(undefined);
  }

  private async moveIntoPlace(tempPath: string, outputPath: string): Promise<Result<void>> {
    try {
      await fs.rename(tempPath, outputPath);
      return success(undefined);
    } catch (error) {
      logger.error(`Failed to move ${tempPath} into place: ${toError(error).message}`);
      return failure(RenderError.encodeFailed(outputPath, toError(error)));
    }
  }
}
