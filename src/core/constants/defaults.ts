/**
 * Default Configuration Constants
 *
 * This file contains all default configuration values used throughout the application.
 * Each section is organized by service/domain and includes JSDoc documentation
 * explaining the purpose and units of each constant.
 */

// =============================================================================
// Application
// =============================================================================

/**
 * Version reported by GET /status
 */
export const APP_VERSION = "1.0.0";

/**
 * Name shown on status responses and on the default screen
 */
export const APP_DISPLAY_NAME = "Inkstand Server";

// =============================================================================
// Canvas & Rendering Defaults
// =============================================================================

/**
 * Default canvas width in pixels (7.5" e-ink panel native width)
 */
export const CANVAS_DEFAULT_WIDTH = 800;

/**
 * Default canvas height in pixels (7.5" e-ink panel native height)
 */
export const CANVAS_DEFAULT_HEIGHT = 480;

/**
 * Largest canvas edge accepted from callers
 */
export const CANVAS_MAX_DIMENSION = 4096;

/**
 * Plain text layout: left edge, first baseline row, and row pitch in pixels
 */
export const TEXT_MARGIN_LEFT = 50;
export const TEXT_MARGIN_TOP = 50;
export const TEXT_LINE_HEIGHT = 30;

/**
 * Plain text is cut to this many lines and characters per line
 */
export const TEXT_MAX_LINES = 15;
export const TEXT_MAX_LINE_LENGTH = 60;

/**
 * Bitmap font scale for body text (5x7 glyphs become 10x14)
 */
export const TEXT_FONT_SCALE = 2;

/**
 * Bitmap font scale for the watermark label
 */
export const WATERMARK_FONT_SCALE = 1;

/**
 * Distance between the watermark box and the canvas edges
 */
export const WATERMARK_MARGIN = 5;

/**
 * White padding around the watermark label
 */
export const WATERMARK_PADDING = 2;

// =============================================================================
// Device API Defaults
// =============================================================================

/**
 * Refresh rate in seconds reported to devices until changed at runtime
 */
export const REFRESH_RATE_DEFAULT_SECONDS = 1800;

/**
 * Accepted range for POST /api/refresh_rate (inclusive)
 */
export const REFRESH_RATE_MIN_SECONDS = 60;
export const REFRESH_RATE_MAX_SECONDS = 3600;

/**
 * Refresh rate sent with the current-screen status snapshot
 */
export const CURRENT_SCREEN_REFRESH_RATE_SECONDS = 60;

/**
 * Seconds a device should wait for the image download
 */
export const DISPLAY_IMAGE_URL_TIMEOUT_SECONDS = 30;

/**
 * Seconds a device should back off after a 500 response
 */
export const ERROR_RETRY_AFTER_SECONDS = 300;

/**
 * Length of generated API keys ([A-Za-z0-9])
 */
export const API_KEY_LENGTH = 32;

/**
 * Length of generated friendly device IDs ([A-Z0-9])
 */
export const FRIENDLY_ID_LENGTH = 6;

// =============================================================================
// Web Server Defaults
// =============================================================================

/**
 * Default HTTP port
 */
export const WEB_DEFAULT_PORT = 8000;

/**
 * Default bind address (all interfaces, devices connect over the LAN)
 */
export const WEB_DEFAULT_HOST = "0.0.0.0";

/**
 * Default API base path
 */
export const WEB_DEFAULT_API_BASE_PATH = "/api";

/**
 * Directory served under /static
 */
export const WEB_DEFAULT_STATIC_DIRECTORY = "./static";

/**
 * URL prefix of the generated images
 */
export const WEB_IMAGES_URL_PATH = "/static/images";

/**
 * Request body limit; data URIs of full-screen photos are a few MB
 */
export const WEB_DEFAULT_JSON_BODY_LIMIT = "10mb";

// =============================================================================
// Storage Defaults
// =============================================================================

/**
 * Directory for generated PNGs (inside the static directory)
 */
export const STORAGE_DEFAULT_IMAGE_DIRECTORY = "./static/images";

/**
 * SQLite database holding devices, logs and screens
 */
export const STORAGE_DEFAULT_DATABASE_PATH = "./data/inkstand.db";

// =============================================================================
// Encoder Defaults
// =============================================================================

/**
 * Upper bound for a single ImageMagick call; a hung process counts as failed
 */
export const ENCODER_DEFAULT_MAGICK_TIMEOUT_MS = 10000;

/**
 * Greyscale level below which a pixel becomes black
 */
export const ENCODER_THRESHOLD = 128;
