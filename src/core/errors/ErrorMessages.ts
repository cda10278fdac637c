/**
 * Centralized user-facing messages for every error code.
 *
 * Error codes are written as string literals here so this module does not
 * import the error classes (which import it).
 *
 * @example
 * ```typescript
 * import { getUserMessage } from "@errors/ErrorMessages";
 *
 * getUserMessage("RENDER_INVALID_DATA_URI");
 * // "The image data could not be decoded. Please send a base64 data URI."
 * ```
 */

/**
 * Render error user messages
 */
export const RENDER_ERROR_MESSAGES: Record<string, string> = {
  RENDER_INVALID_DATA_URI:
    "The image data could not be decoded. Please send a base64 data URI.",
  RENDER_IMAGE_DECODE_FAILED:
    "The image format is not supported. Please send a PNG, JPEG, GIF or WebP image.",
  RENDER_INVALID_DIMENSIONS: "Invalid canvas size.",
  RENDER_ENCODE_FAILED: "Failed to write the screen image. Please try again.",
  RENDER_UNKNOWN_ERROR: "Failed to render the screen. Please try again.",
};

/**
 * Storage error user messages
 */
export const STORAGE_ERROR_MESSAGES: Record<string, string> = {
  STORAGE_INVALID_FILENAME:
    "Invalid filename. Use letters, digits, dots, dashes and underscores.",
  STORAGE_DIRECTORY_CREATE_FAILED:
    "Failed to create the image directory. Please check permissions.",
  STORAGE_DATABASE_ERROR: "Device database error. Please try again.",
  STORAGE_UNKNOWN_ERROR: "Storage error occurred. Please try again.",
};

/**
 * Device error user messages
 */
export const DEVICE_ERROR_MESSAGES: Record<string, string> = {
  DEVICE_REGISTRATION_FAILED: "Failed to register the device. Please try again.",
  DEVICE_UNKNOWN_ERROR: "Device error occurred. Please try again.",
};

/**
 * Web error user messages
 */
export const WEB_ERROR_MESSAGES: Record<string, string> = {
  WEB_SERVER_START_FAILED:
    "Failed to start the server. Please check configuration.",
  WEB_PORT_IN_USE: "Server port is already in use. Please change the port.",
  WEB_SERVER_NOT_RUNNING: "Server is not running.",
  WEB_SERVER_STOP_FAILED: "Server did not shut down cleanly.",
  WEB_INVALID_PARAMETER: "Invalid value. Please check your input.",
  WEB_UNKNOWN_ERROR: "Server error occurred. Please try again.",
};

/**
 * Config error user messages
 */
export const CONFIG_ERROR_MESSAGES: Record<string, string> = {
  CONFIG_INVALID_VALUE: "Invalid configuration value. Please check the environment.",
  CONFIG_OUT_OF_RANGE: "Configuration value out of range. Please check the environment.",
  CONFIG_UNKNOWN_ERROR: "Configuration error occurred.",
};

/**
 * Every error code mapped to its user message
 */
export const ERROR_MESSAGES: Record<string, string> = {
  ...RENDER_ERROR_MESSAGES,
  ...STORAGE_ERROR_MESSAGES,
  ...DEVICE_ERROR_MESSAGES,
  ...WEB_ERROR_MESSAGES,
  ...CONFIG_ERROR_MESSAGES,
};

/**
 * Fallback messages by category, used for codes without their own entry
 */
export const DEFAULT_ERROR_MESSAGES: Record<string, string> = {
  RENDER: "Failed to render the screen. Please try again.",
  STORAGE: "Storage error occurred. Please try again.",
  DEVICE: "Device error occurred. Please try again.",
  WEB: "Server error occurred. Please try again.",
  CONFIG: "Configuration error occurred.",
};

/**
 * Get the user-facing message for an error code.
 *
 * @example
 * ```typescript
 * getUserMessage("WEB_PORT_IN_USE"); // "Server port is already in use. Please change the port."
 * getUserMessage("UNKNOWN_CODE"); // "An error occurred. Please try again."
 * ```
 */
export function getUserMessage(code: string): string {
  const message = ERROR_MESSAGES[code];
  if (message) {
    return message;
  }

  // Category is the prefix before the first underscore
  const category = code.split("_")[0];
  const defaultMessage = DEFAULT_ERROR_MESSAGES[category];
  if (defaultMessage) {
    return defaultMessage;
  }

  return "An error occurred. Please try again.";
}
