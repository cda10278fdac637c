import { z } from "zod";
import { TelemetryLog } from "@core/types";

const optionalNumber = z.number().nullable().optional();
const optionalString = z.string().nullable().optional();

/**
 * Telemetry body of POST /api/log. Known fields are type-checked; any
 * other field is kept as sent.
 */
export const telemetryLogSchema: z.ZodType<TelemetryLog> = z
  .object({
    battery_voltage: optionalNumber,
    heap_free: optionalNumber,
    rssi: optionalNumber,
    wake_reason: optionalString,
    sleep_duration: optionalNumber,
    firmware_version: optionalString,
    uptime: optionalNumber,
    wifi_connect_time: optionalNumber,
    image_download_time: optionalNumber,
    display_render_time: optionalNumber,
  })
  .passthrough();

/**
 * Parse a stored log blob. Rows that no longer match the schema come
 * back with their raw fields under `raw`.
 */
export function parseStoredTelemetry(json: string): TelemetryLog {
  const parsed: unknown = JSON.parse(json);
  const result = telemetryLogSchema.safeParse(parsed);
  return result.success ? result.data : { raw: parsed };
}
