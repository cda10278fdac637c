import {
  DeviceLogEntry,
  DeviceRecord,
  DeviceStatusUpdate,
  Result,
  ScreenRecord,
  TelemetryLog,
} from "@core/types";

export type NewDevice = {
  macAddress: string;
  apiKey: string;
  friendlyId: string;
  firmwareVersion?: string | null;
};

/**
 * Device Directory Interface
 *
 * Stores device identities, their telemetry logs and the screens pushed
 * to them. Failures are StorageErrors.
 */
export interface IDeviceDirectory {
  /**
   * Look up a device by MAC address
   * @returns Result containing the device, or null when unknown
   */
  getDevice(macAddress: string): Result<DeviceRecord | null>;

  /**
   * Insert a new device. Fails when the MAC, API key or friendly ID exists.
   */
  createDevice(device: NewDevice): Result<DeviceRecord>;

  /**
   * Update the non-null fields of `update`.
   * @returns Result containing whether a device row was changed
   */
  updateDeviceStatus(
    macAddress: string,
    update: DeviceStatusUpdate,
  ): Result<boolean>;

  /**
   * Append a telemetry log line. The device does not need to exist.
   */
  appendLog(macAddress: string, data: TelemetryLog): Result<DeviceLogEntry>;

  /**
   * Most recent log lines first
   */
  getLogs(macAddress: string, limit?: number): Result<DeviceLogEntry[]>;

  /**
   * Insert or replace the record of a pushed screen, keyed by filename
   */
  recordScreen(screen: ScreenRecord): Result<void>;

  getScreen(filename: string): Result<ScreenRecord | null>;

  /**
   * Close the underlying database
   */
  close(): void;
}
