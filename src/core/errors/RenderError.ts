import { BaseError } from "./BaseError";

/**
 * Rendering error codes
 */
export enum RenderErrorCode {
  INVALID_DATA_URI = "RENDER_INVALID_DATA_URI",
  IMAGE_DECODE_FAILED = "RENDER_IMAGE_DECODE_FAILED",
  INVALID_DIMENSIONS = "RENDER_INVALID_DIMENSIONS",
  ENCODE_FAILED = "RENDER_ENCODE_FAILED",
  UNKNOWN = "RENDER_UNKNOWN_ERROR",
}

/**
 * Raised while turning a content payload into a PNG
 */
export class RenderError extends BaseError {
  constructor(
    message: string,
    code: RenderErrorCode = RenderErrorCode.UNKNOWN,
    recoverable: boolean = false,
    context?: Record<string, unknown>,
  ) {
    super(message, code, recoverable, context);
  }

  /**
   * The payload is not valid base64
   */
  static invalidDataUri(reason: string): RenderError {
    return new RenderError(
      `Invalid data URI: ${reason}`,
      RenderErrorCode.INVALID_DATA_URI,
      false,
      { reason },
    );
  }

  /**
   * The decoded bytes are not an image sharp can read
   */
  static imageDecodeFailed(error: Error): RenderError {
    return new RenderError(
      `Failed to decode image: ${error.message}`,
      RenderErrorCode.IMAGE_DECODE_FAILED,
      false,
      { originalError: error.message },
    );
  }

  static invalidDimensions(width: number, height: number): RenderError {
    return new RenderError(
      `Invalid canvas dimensions: ${width}x${height}`,
      RenderErrorCode.INVALID_DIMENSIONS,
      false,
      { width, height },
    );
  }

  /**
   * Neither the external tool nor the fallback produced a file
   */
  static encodeFailed(path: string, error: Error): RenderError {
    return new RenderError(
      `Failed to encode ${path}: ${error.message}`,
      RenderErrorCode.ENCODE_FAILED,
      true,
      { path, originalError: error.message },
    );
  }
}
