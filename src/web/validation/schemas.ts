/**
 * Validation Schemas
 *
 * Zod schemas for the device API. Header schemas read Node's lowercased
 * `req.headers` and hand controllers camelCase values.
 */

import { z } from "zod";
import {
  CANVAS_DEFAULT_HEIGHT,
  CANVAS_DEFAULT_WIDTH,
  CANVAS_MAX_DIMENSION,
} from "@core/constants";
import { ScreenRequest } from "@core/types";
import { telemetryLogSchema } from "@services/devices/telemetry";

// ============================================
// Header building blocks
// ============================================

/**
 * Required, non-blank header value (e.g. the MAC address in `ID`)
 */
const requiredHeader = (name: string) =>
  z
    .string({
      required_error: `${name} header is required`,
      invalid_type_error: `${name} header must be sent once`,
    })
    .trim()
    .min(1, `${name} header is required`);

/**
 * Optional free-text header; a blank value counts as absent
 */
const textHeader = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

/**
 * Optional decimal header such as `Battery-Voltage` or `RSSI`
 */
const numberHeader = z
  .string()
  .trim()
  .regex(/^-?\d+(\.\d+)?$/, "must be a number")
  .transform(Number)
  .optional();

/**
 * Optional whole-number header
 */
const integerHeader = z
  .string()
  .trim()
  .regex(/^-?\d+$/, "must be an integer")
  .transform(Number)
  .optional();

/**
 * Canvas edge from a header, with a default when absent
 */
const dimensionHeader = (defaultValue: number) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/, "must be a positive integer")
    .transform(Number)
    .pipe(z.number().int().min(1).max(CANVAS_MAX_DIMENSION))
    .default(String(defaultValue));

/**
 * Canvas edge from a JSON body
 */
const dimensionField = (defaultValue: number) =>
  z.number().int().min(1).max(CANVAS_MAX_DIMENSION).default(defaultValue);

// ============================================
// Device API
// ============================================

/**
 * Headers of GET /api/display
 */
export const displayHeadersSchema = z
  .object({
    id: requiredHeader("ID"),
    "refresh-rate": integerHeader,
    "battery-voltage": numberHeader,
    "fw-version": textHeader,
    rssi: numberHeader,
    width: dimensionHeader(CANVAS_DEFAULT_WIDTH),
    height: dimensionHeader(CANVAS_DEFAULT_HEIGHT),
  })
  .transform((headers) => ({
    macAddress: headers.id,
    refreshRate: headers["refresh-rate"],
    batteryVoltage: headers["battery-voltage"],
    firmwareVersion: headers["fw-version"],
    rssi: headers.rssi,
    width: headers.width,
    height: headers.height,
  }));

/**
 * Headers of POST /api/setup
 */
export const setupHeadersSchema = z
  .object({
    id: requiredHeader("ID"),
    "fw-version": textHeader,
  })
  .transform((headers) => ({
    macAddress: headers.id,
    firmwareVersion: headers["fw-version"],
  }));

/**
 * Headers of POST /api/log and GET /api/current_screen
 */
export const deviceIdHeadersSchema = z
  .object({
    id: requiredHeader("ID"),
  })
  .transform((headers) => ({ macAddress: headers.id }));

/**
 * Body of POST /api/log. Known fields are type-checked, unknown ones kept.
 */
export const telemetryBodySchema = telemetryLogSchema;

/**
 * Headers of POST /api/refresh_rate. The accepted range is enforced by
 * the runtime settings.
 */
export const refreshRateHeadersSchema = z
  .object({
    "refresh-rate": requiredHeader("Refresh-Rate").pipe(
      z
        .string()
        .regex(/^-?\d+$/, "must be an integer")
        .transform(Number),
    ),
  })
  .transform((headers) => ({ refreshRate: headers["refresh-rate"] }));

// ============================================
// Screens
// ============================================

export const screenContentTypeSchema = z.enum(["html", "uri", "data", "big_text"]);

/**
 * Body of POST /api/screens. An empty filename means "derive one".
 */
export const screenRequestSchema = z
  .object({
    content_type: screenContentTypeSchema,
    content: z.string(),
    filename: z.string().nullish(),
    width: dimensionField(CANVAS_DEFAULT_WIDTH),
    height: dimensionField(CANVAS_DEFAULT_HEIGHT),
    device_id: z.string().nullish(),
    subtitle: z.string().nullish(),
  })
  .transform(
    (body): ScreenRequest => ({
      contentType: body.content_type,
      content: body.content,
      filename: body.filename || undefined,
      width: body.width,
      height: body.height,
      deviceId: body.device_id || undefined,
      subtitle: body.subtitle || undefined,
    }),
  );
