/**
 * A provisioned display device, keyed by MAC address
 */
export type DeviceRecord = {
  macAddress: string;
  apiKey: string;
  friendlyId: string;
  createdAt: Date;
  lastSeen: Date | null;
  firmwareVersion: string | null;
  batteryVoltage: number | null;
};

/**
 * Fields refreshed whenever a device checks in. Null or undefined fields
 * leave the stored value untouched.
 */
export type DeviceStatusUpdate = {
  lastSeen?: Date | null;
  firmwareVersion?: string | null;
  batteryVoltage?: number | null;
};

/**
 * Telemetry reported by a device on POST /api/log.
 * Every field is optional; unknown fields are kept in the raw log.
 */
export type TelemetryLog = {
  battery_voltage?: number | null;
  heap_free?: number | null;
  rssi?: number | null;
  wake_reason?: string | null;
  sleep_duration?: number | null;
  firmware_version?: string | null;
  uptime?: number | null;
  wifi_connect_time?: number | null;
  image_download_time?: number | null;
  display_render_time?: number | null;
  [extra: string]: unknown;
};

/**
 * A stored telemetry log line
 */
export type DeviceLogEntry = {
  id: number;
  macAddress: string;
  timestamp: Date;
  data: TelemetryLog;
};

/**
 * A screen pushed through POST /api/screens (or the scheduler)
 */
export type ScreenRecord = {
  filename: string;
  deviceId: string | null;
  contentType: string;
  createdAt: Date;
  filePath: string;
};
