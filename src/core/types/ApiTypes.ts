/**
 * Wire shapes of the device-facing HTTP API. Field names follow the
 * firmware's snake_case contract.
 */

export type DisplayResponse = {
  status: 0;
  image_url: string;
  filename: string;
  refresh_rate: number;
  update_firmware: boolean;
  firmware_url: string | null;
  reset_firmware: boolean;
  special_function: "sleep";
  image_url_timeout: number;
};

export type SetupResponse = {
  status: 200;
  api_key: string;
  friendly_id: string;
  image_url: string;
  message: string;
};

export type LogResponse = {
  status: "success";
  message: string;
};

export type ScreenResponse = {
  status: "success";
  image_url: string;
  filename: string;
};

export type RefreshRateResponse = {
  status: "success";
  refresh_rate: number;
};

export type StatusResponse = {
  message: string;
  status: "running";
  version: string;
  timestamp: string;
};

/**
 * Body of every 4xx response
 */
export type ClientErrorResponse = {
  error: string;
  details?: Array<{ field: string; message: string }>;
};

/**
 * Body of the 500 response produced by the top-level error handler
 */
export type ErrorResponse = {
  status: 2;
  error: "Internal Server Error";
  message: string;
  retry_after: number;
};

/**
 * Content types accepted by POST /api/screens
 */
export type ScreenContentType = "html" | "uri" | "data" | "big_text";

/**
 * A request to render and publish a screen
 */
export type ScreenRequest = {
  contentType: ScreenContentType;
  content: string;
  filename?: string;
  width: number;
  height: number;
  deviceId?: string;
  subtitle?: string;
};
