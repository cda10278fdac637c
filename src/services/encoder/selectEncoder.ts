import { IMonochromeEncoder } from "@core/interfaces";
import { getLogger } from "@utils/logger";
import { detectImageMagick } from "@utils/imagemagick";
import { MagickMonochromeEncoder } from "./MagickMonochromeEncoder";
import { SharpMonochromeEncoder } from "./SharpMonochromeEncoder";

const logger = getLogger("EncoderSelection");

/**
 * Probe for ImageMagick once and pick the encoder for the process lifetime
 */
export async function selectEncoder(magickTimeoutMs: number): Promise<IMonochromeEncoder> {
  const command = await detectImageMagick();
  const encoder: IMonochromeEncoder = command
    ? new MagickMonochromeEncoder(command, magickTimeoutMs)
    : new SharpMonochromeEncoder();
  logger.info(`Monochrome encoder: ${encoder.name}`);
  return encoder;
}
