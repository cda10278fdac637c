import {
  ErrorRequestHandler,
  Request,
  RequestHandler,
  Response,
} from "express";
import {
  ClientErrorResponse,
  ErrorResponse,
} from "@core/types";
import {
  RenderErrorCode,
  StorageErrorCode,
  WebError,
} from "@core/errors";
import { ERROR_RETRY_AFTER_SECONDS, WEB_IMAGES_URL_PATH } from "@core/constants";
import { getLogger } from "@utils/logger";
import { isBaseError, toError } from "@utils/typeGuards";

const logger = getLogger("HttpResponses");

/**
 * Error codes caused by what the caller sent
 */
const BAD_INPUT_CODES: ReadonlySet<string> = new Set<string>([
  RenderErrorCode.INVALID_DATA_URI,
  RenderErrorCode.IMAGE_DECODE_FAILED,
  RenderErrorCode.INVALID_DIMENSIONS,
  StorageErrorCode.INVALID_FILENAME,
]);

/**
 * HTTP status for errors the caller can fix, or null for server faults
 */
export function clientErrorStatus(error: Error): number | null {
  if (
    error instanceof WebError &&
    error.statusCode !== undefined &&
    error.statusCode >= 400 &&
    error.statusCode < 500
  ) {
    return error.statusCode;
  }
  if (isBaseError(error) && BAD_INPUT_CODES.has(error.code)) {
    return 400;
  }
  return null;
}

/**
 * Body of a 500 response. The message is passed through as-is; the
 * device API has no authentication boundary to hide it behind.
 */
export function internalErrorBody(error: Error): ErrorResponse {
  return {
    status: 2,
    error: "Internal Server Error",
    message: error.message,
    retry_after: ERROR_RETRY_AFTER_SECONDS,
  };
}

/**
 * Answer a failed Result: 4xx `{error}` for bad input, otherwise the
 * 500 envelope.
 */
export function sendFailure(res: Response, error: Error, action: string): void {
  const status = clientErrorStatus(error);
  if (status !== null) {
    logger.warn(`${action} rejected: ${error.message}`);
    const body: ClientErrorResponse = { error: error.message };
    res.status(status).json(body);
    return;
  }

  logger.error(`${action} failed:`, isBaseError(error) ? error.toJSON() : error);
  res.status(500).json(internalErrorBody(error));
}

/**
 * Absolute URL of a generated image, built from the request's protocol and
 * Host header so devices fetch it from the address they polled
 */
export function imageUrlFor(req: Request, filename: string): string {
  const host = req.get("host") ?? "localhost";
  return `${req.protocol}://${host}${WEB_IMAGES_URL_PATH}/${filename}.png`;
}

/**
 * Wrap an async controller method so a rejection reaches the error handler
 */
export function asyncRoute(
  handler: (req: Request, res: Response) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

/**
 * Fallback for unmatched routes
 */
export const notFoundHandler: RequestHandler = (req, res) => {
  const body: ClientErrorResponse = {
    error: `Not found: ${req.method} ${req.path}`,
  };
  res.status(404).json(body);
};

/**
 * Last-resort error handler. Body-parser rejections (malformed JSON,
 * oversized body) keep their 4xx status; everything else is a 500.
 */
export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  const error = toError(err);
  if (
    typeof err === "object" &&
    err !== null &&
    "status" in err &&
    typeof err.status === "number" &&
    err.status >= 400 &&
    err.status < 500
  ) {
    logger.warn(`${req.method} ${req.path} rejected: ${error.message}`);
    const body: ClientErrorResponse = { error: error.message };
    res.status(err.status).json(body);
    return;
  }

  const status = clientErrorStatus(error);
  if (status !== null) {
    const body: ClientErrorResponse = { error: error.message };
    res.status(status).json(body);
    return;
  }

  logger.error(`Unhandled error on ${req.method} ${req.path}:`, error);
  res.status(500).json(internalErrorBody(error));
};
