import sharp from "sharp";
import { Result, RgbColor, RgbImage, WHITE, failure, success } from "@core/types";
import { RenderError } from "@core/errors";
import { CanvasUtils } from "@services/canvas/CanvasUtils";
import { getLogger } from "@utils/logger";
import { toError } from "@utils/typeGuards";

const logger = getLogger("DataUriDecoder");

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Base64 payload of a data URI: everything after the first comma, or the
 * whole input when there is none. Whitespace is ignored.
 */
export function extractBase64Payload(raw: string): Result<Buffer> {
  const comma = raw.indexOf(",");
  const payload = (comma >= 0 ? raw.slice(comma + 1) : raw).replace(/\s+/g, "");

  if (payload.length === 0) {
    return failure(RenderError.invalidDataUri("empty payload"));
  }
  if (payload.length % 4 !== 0 || !BASE64_PATTERN.test(payload)) {
    return failure(RenderError.invalidDataUri("payload is not valid base64"));
  }

  return success(Buffer.from(payload, "base64"));
}

/**
 * Decode an image data URI and fit it onto a white RGB canvas of exactly
 * width x height. The image is shrunk with Lanczos3 to fit inside the
 * canvas, never enlarged, and centred.
 */
export async function decodeDataUri(
  raw: string,
  width: number,
  height: number,
): Promise<Result<RgbImage>> {
  const payload = extractBase64Payload(raw);
  if (!payload.success) {
    return payload;
  }

  let decoded: { data: Buffer; info: sharp.OutputInfo };
  try {
    decoded = await sharp(payload.data)
      .flatten({ background: { r: 255, g: 255, b: 255 } })
      .toColourspace("srgb")
      .resize(width, height, {
        fit: "inside",
        withoutEnlargement: true,
        kernel: sharp.kernel.lanczos3,
      })
      .removeAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });
  } catch (error) {
    logger.warn(`Data URI could not be decoded: ${toError(error).message}`);
    return failure(RenderError.imageDecodeFailed(toError(error)));
  }

  const { data, info } = decoded;
  logger.debug(
    `Decoded ${info.width}x${info.height} (${info.channels} channels) for ${width}x${height} canvas`,
  );

  const image = CanvasUtils.createRgbImage(width, height, WHITE);
  const offsetX = Math.floor((width - info.width) / 2);
  const offsetY = Math.floor((height - info.height) / 2);
  const channels = info.channels;

  for (let y = 0; y < info.height; y++) {
    for (let x = 0; x < info.width; x++) {
      const source = (y * info.width + x) * channels;
      const first = data[source];
      const color: RgbColor =
        channels >= 3 ? [first, data[source + 1], data[source + 2]] : [first, first, first];
      CanvasUtils.setRgbPixel(image, offsetX + x, offsetY + y, color);
    }
  }

  return success(image);
}
