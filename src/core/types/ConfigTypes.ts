/**
 * Application-wide configuration
 */
export type ServerConfig = {
  /** Application version */
  version: string;

  /** HTTP surface configuration */
  web: WebConfig;

  /** Where images and device records live */
  storage: StorageConfig;

  /** Rendering defaults */
  rendering: RenderingConfig;

  /** Monochrome encoder configuration */
  encoder: EncoderConfig;
};

/**
 * Web interface configuration
 */
export type WebConfig = {
  /** Server port */
  port: number;

  /** Server host */
  host: string;

  /**
   * Enable CORS. Devices never need it; it lets browser-based tools on the
   * same network push screens.
   */
  cors: boolean;

  /** Base path for the device API */
  apiBasePath: string;

  /** Directory served read-only under /static */
  staticDirectory: string;

  /** Maximum accepted JSON body size (data URIs can be large) */
  jsonBodyLimit: string;
};

/**
 * Persistence configuration
 */
export type StorageConfig = {
  /** Directory the generated PNGs are written to */
  imageDirectory: string;

  /** SQLite database file (":memory:" for an in-process database) */
  databasePath: string;
};

/**
 * Rendering configuration
 */
export type RenderingConfig = {
  /** Default canvas width in pixels */
  width: number;

  /** Default canvas height in pixels */
  height: number;

  /** Label stamped in the bottom-right corner of every image */
  watermarkLabel: string;

  /** Refresh rate (seconds) reported to devices until changed at runtime */
  defaultRefreshRate: number;
};

/**
 * Monochrome encoder configuration
 */
export type EncoderConfig = {
  /** Upper bound for one ImageMagick invocation */
  magickTimeoutMs: number;
};
