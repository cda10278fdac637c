/**
 * Error classes for the Inkstand server
 *
 * Every custom error extends BaseError and carries a code, a timestamp,
 * optional context and a recoverable flag. User messages live in
 * ErrorMessages.ts.
 */

export * from "./BaseError";
export * from "./RenderError";
export * from "./StorageError";
export * from "./DeviceError";
export * from "./WebError";
export * from "./ConfigError";
export * from "./ErrorMessages";
