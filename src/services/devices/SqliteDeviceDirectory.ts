import * as fs from "fs";
import * as path from "path";
import Database from "better-sqlite3";
import { IDeviceDirectory, NewDevice } from "@core/interfaces";
import {
  DeviceLogEntry,
  DeviceRecord,
  DeviceStatusUpdate,
  Result,
  ScreenRecord,
  TelemetryLog,
  failure,
  success,
} from "@core/types";
import { StorageError } from "@core/errors";
import { getLogger } from "@utils/logger";
import { toError } from "@utils/typeGuards";
import { parseStoredTelemetry } from "./telemetry";

const logger = getLogger("DeviceDirectory");

const DEFAULT_LOG_LIMIT = 100;

type DeviceRow = {
  mac_address: string;
  api_key: string;
  friendly_id: string;
  created_at: string;
  last_seen: string | null;
  firmware_version: string | null;
  battery_voltage: number | null;
};

type LogRow = {
  id: number;
  mac_address: string;
  timestamp: string;
  data: string;
};

type ScreenRow = {
  filename: string;
  device_id: string | null;
  content_type: string;
  created_at: string;
  file_path: string;
};

// Logs may arrive from devices that never ran setup, so device_logs has
// no foreign key to devices.
const SCHEMA = `
  CREATE TABLE IF NOT EXISTS devices (
    mac_address TEXT PRIMARY KEY,
    api_key TEXT UNIQUE NOT NULL,
    friendly_id TEXT UNIQUE NOT NULL,
    created_at TEXT NOT NULL,
    last_seen TEXT,
    firmware_version TEXT,
    battery_voltage REAL
  );

  CREATE TABLE IF NOT EXISTS device_logs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    mac_address TEXT NOT NULL,
    timestamp TEXT NOT NULL,
    data TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_device_logs_mac ON device_logs (mac_address, id);

  CREATE TABLE IF NOT EXISTS screens (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    filename TEXT UNIQUE NOT NULL,
    device_id TEXT,
    content_type TEXT NOT NULL,
    created_at TEXT NOT NULL,
    file_path TEXT NOT NULL
  );
`;

function toDeviceRecord(row: DeviceRow): DeviceRecord {
  return {
    macAddress: row.mac_address,
    apiKey: row.api_key,
    friendlyId: row.friendly_id,
    createdAt: new Date(row.created_at),
    lastSeen: row.last_seen ? new Date(row.last_seen) : null,
    firmwareVersion: row.firmware_version,
    batteryVoltage: row.battery_voltage,
  };
}

function toLogEntry(row: LogRow): DeviceLogEntry {
  return {
    id: row.id,
    macAddress: row.mac_address,
    timestamp: new Date(row.timestamp),
    data: parseStoredTelemetry(row.data),
  };
}

function toScreenRecord(row: ScreenRow): ScreenRecord {
  return {
    filename: row.filename,
    deviceId: row.device_id,
    contentType: row.content_type,
    createdAt: new Date(row.created_at),
    filePath: row.file_path,
  };
}

/**
 * SQLite Device Directory
 *
 * Devices, their telemetry logs and pushed screens in one SQLite file.
 * better-sqlite3 is synchronous, so every method returns its Result
 * directly. Timestamps are stored as UTC ISO strings.
 */
export class SqliteDeviceDirectory implements IDeviceDirectory {
  private readonly db: Database.Database;

  /**
   * @param databasePath File to open, or ":memory:"
   */
  constructor(
    databasePath: string,
    private readonly now: () => Date = () => new Date(),
  ) {
    if (databasePath !== ":memory:") {
      fs.mkdirSync(path.dirname(path.resolve(databasePath)), { recursive: true });
    }
    this.db = new Database(databasePath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA);
    logger.info(`Device database: ${databasePath}`);
  }

  getDevice(macAddress: string): Result<DeviceRecord | null> {
    return this.run("device lookup", () => {
      const row = this.db
        .prepare<[string], DeviceRow>("SELECT * FROM devices WHERE mac_address = ?")
        .get(macAddress);
      return row ? toDeviceRecord(row) : null;
    });
  }

  createDevice(device: NewDevice): Result<DeviceRecord> {
    return this.run("device insert", () => {
      const createdAt = this.now();
      this.db
        .prepare<[string, string, string, string, string | null]>(
          `INSERT INTO devices (mac_address, api_key, friendly_id, created_at, firmware_version)
           VALUES (?, ?, ?, ?, ?)`,
        )
        .run(
          device.macAddress,
          device.apiKey,
          device.friendlyId,
          createdAt.toISOString(),
          device.firmwareVersion ?? null,
        );
      logger.info(`Registered device ${device.macAddress} as ${device.friendlyId}`);
      return {
        macAddress: device.macAddress,
        apiKey: device.apiKey,
        friendlyId: device.friendlyId,
        createdAt,
        lastSeen: null,
        firmwareVersion: device.firmwareVersion ?? null,
        batteryVoltage: null,
      };
    });
  }

  updateDeviceStatus(macAddress: string, update: DeviceStatusUpdate): Result<boolean> {
    const fields: string[] = [];
    const values: Array<string | number> = [];

    if (update.lastSeen) {
      fields.push("last_seen = ?");
      values.push(update.lastSeen.toISOString());
    }
    if (update.firmwareVersion !== undefined && update.firmwareVersion !== null) {
      fields.push("firmware_version = ?");
      values.push(update.firmwareVersion);
    }
    if (update.batteryVoltage !== undefined && update.batteryVoltage !== null) {
      fields.push("battery_voltage = ?");
      values.push(update.batteryVoltage);
    }

    if (fields.length === 0) {
      return success(false);
    }

    return this.run("device status update", () => {
      const info = this.db
        .prepare<Array<string | number>>(
          `UPDATE devices SET ${fields.join(", ")} WHERE mac_address = ?`,
        )
        .run(...values, macAddress);
      return info.changes > 0;
    });
  }

  appendLog(macAddress: string, data: TelemetryLog): Result<DeviceLogEntry> {
    return this.run("log insert", () => {
      const timestamp = this.now();
      const info = this.db
        .prepare<[string, string, string]>(
          "INSERT INTO device_logs (mac_address, timestamp, data) VALUES (?, ?, ?)",
        )
        .run(macAddress, timestamp.toISOString(), JSON.stringify(data));
      return {
        id: Number(info.lastInsertRowid),
        macAddress,
        timestamp,
        data,
      };
    });
  }

  getLogs(macAddress: string, limit: number = DEFAULT_LOG_LIMIT): Result<DeviceLogEntry[]> {
    return this.run("log query", () =>
      this.db
        .prepare<[string, number], LogRow>(
          "SELECT * FROM device_logs WHERE mac_address = ? ORDER BY id DESC LIMIT ?",
        )
        .all(macAddress, limit)
        .map(toLogEntry),
    );
  }

  recordScreen(screen: ScreenRecord): Result<void> {
    return this.run("screen upsert", () => {
      this.db
        .prepare<[string, string | null, string, string, string]>(
          `INSERT INTO screens (filename, device_id, content_type, created_at, file_path)
           VALUES (?, ?, ?, ?, ?)
           ON CONFLICT(filename) DO UPDATE SET
             device_id = excluded.device_id,
             content_type = excluded.content_type,
             created_at = excluded.created_at,
             file_path = excluded.file_path`,
        )
        .run(
          screen.filename,
          screen.deviceId,
          screen.contentType,
          screen.createdAt.toISOString(),
          screen.filePath,
        );
    });
  }

  getScreen(filename: string): Result<ScreenRecord | null> {
    return this.run("screen lookup", () => {
      const row = this.db
        .prepare<[string], ScreenRow>(
          "SELECT filename, device_id, content_type, created_at, file_path FROM screens WHERE filename = ?",
        )
        .get(filename);
      return row ? toScreenRecord(row) : null;
    });
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
      logger.info("Device database closed");
    }
  }

  private run<T>(operation: string, action: () => T): Result<T> {
    try {
      return success(action());
    } catch (error) {
      logger.error(`Database ${operation} failed: ${toError(error).message}`);
      return failure(StorageError.databaseError(operation, toError(error)));
    }
  }
}
