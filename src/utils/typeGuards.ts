/**
 * Type guards and utilities for safe type narrowing
 *
 * These replace `as` assertions with runtime checks that narrow properly.
 */

import { BaseError } from "@core/errors/BaseError";

/**
 * Convert an unknown caught value to an Error instance.
 *
 * @example
 * ```ts
 * try {
 *   await encoder.encode(canvas, path);
 * } catch (err) {
 *   logger.warn(toError(err).message);
 * }
 * ```
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  if (typeof error === "string") {
    return new Error(error);
  }
  if (typeof error === "object" && error !== null && "message" in error) {
    return new Error(String(error.message));
  }
  return new Error(String(error));
}

/**
 * Type guard for Node.js system errors (those carrying `code`, `errno` or
 * `syscall`).
 *
 * @example
 * ```ts
 * if (isNodeJSErrnoException(err) && err.code === "ENOENT") { ... }
 * ```
 */
export function isNodeJSErrnoException(
  error: unknown,
): error is NodeJS.ErrnoException {
  return (
    error instanceof Error &&
    ("code" in error || "errno" in error || "syscall" in error)
  );
}

/**
 * Type guard for BaseError subclasses
 */
export function isBaseError(error: unknown): error is BaseError {
  return error instanceof BaseError;
}
