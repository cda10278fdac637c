jest.mock("@utils/logger", () => ({
  getLogger: () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

import { SqliteDeviceDirectory } from "../SqliteDeviceDirectory";
import { StorageErrorCode } from "@core/errors";

const MAC = "AA:BB:CC:DD:EE:FF";
const CREATED = new Date("2024-03-09T07:05:01.000Z");

describe("SqliteDeviceDirectory", () => {
  let directory: SqliteDeviceDirectory;
  let clock: Date;

  beforeEach(() => {
    clock = CREATED;
    directory = new SqliteDeviceDirectory(":memory:", () => clock);
  });

  afterEach(() => {
    directory.close();
  });

  const register = (): void => {
    const created = directory.createDevice({
      macAddress: MAC,
      apiKey: "test-api-key",
      friendlyId: "ABC123",
      firmwareVersion: "1.0.0",
    });
    expect(created.success).toBe(true);
  };

  describe("devices", () => {
    it("should return null for an unknown device", () => {
      expect(directory.getDevice(MAC)).toEqual({ success: true, data: null });
    });

    it("should store and read back a device", () => {
      register();

      expect(directory.getDevice(MAC)).toEqual({
        success: true,
        data: {
          macAddress: MAC,
          apiKey: "test-api-key",
          friendlyId: "ABC123",
          createdAt: CREATED,
          lastSeen: null,
          firmwareVersion: "1.0.0",
          batteryVoltage: null,
        },
      });
    });

    it("should refuse a second device with the same MAC", () => {
      register();

      const again = directory.createDevice({
        macAddress: MAC,
        apiKey: "other-key",
        friendlyId: "XYZ789",
      });

      expect(again.success).toBe(false);
      if (!again.success) {
        expect(again.error).toHaveProperty("code", StorageErrorCode.DATABASE_ERROR);
      }
    });
  });

  describe("updateDeviceStatus", () => {
    it("should update only the fields that are set", () => {
      register();
      const seen = new Date("2024-03-09T08:00:00.000Z");

      const result = directory.updateDeviceStatus(MAC, {
        lastSeen: seen,
        firmwareVersion: null,
        batteryVoltage: 3.7,
      });

      expect(result).toEqual({ success: true, data: true });
      const device = directory.getDevice(MAC);
      expect(device.success && device.data).toMatchObject({
        lastSeen: seen,
        firmwareVersion: "1.0.0",
        batteryVoltage: 3.7,
      });
    });

    it("should report no change for an unknown device", () => {
      expect(directory.updateDeviceStatus("00:00:00:00:00:00", { batteryVoltage: 4 })).toEqual({
        success: true,
        data: false,
      });
    });

    it("should do nothing when no field is set", () => {
      register();

      expect(directory.updateDeviceStatus(MAC, {})).toEqual({ success: true, data: false });
    });
  });

  describe("logs", () => {
    it("should keep logs for devices that never registered", () => {
      const appended = directory.appendLog("FF:FF:FF:FF:FF:FF", { battery_voltage: 3.8 });

      expect(appended.success).toBe(true);
      expect(directory.getDevice("FF:FF:FF:FF:FF:FF")).toEqual({ success: true, data: null });

      const logs = directory.getLogs("FF:FF:FF:FF:FF:FF");
      expect(logs).toEqual({
        success: true,
        data: [
          {
            id: 1,
            macAddress: "FF:FF:FF:FF:FF:FF",
            timestamp: CREATED,
            data: { battery_voltage: 3.8 },
          },
        ],
      });
    });

    it("should return the newest logs first, up to the limit", () => {
      directory.appendLog(MAC, { rssi: -70 });
      directory.appendLog(MAC, { rssi: -60 });
      directory.appendLog(MAC, { rssi: -50, custom_field: "kept" });

      const logs = directory.getLogs(MAC, 2);

      expect(logs.success).toBe(true);
      if (logs.success) {
        expect(logs.data.map((entry) => entry.data)).toEqual([
          { rssi: -50, custom_field: "kept" },
          { rssi: -60 },
        ]);
      }
    });
  });

  describe("screens", () => {
    it("should upsert screens by filename", () => {
      directory.recordScreen({
        filename: "t1",
        deviceId: null,
        contentType: "html",
        createdAt: CREATED,
        filePath: "/images/t1.png",
      });
      const later = new Date("2024-03-10T00:00:00.000Z");
      directory.recordScreen({
        filename: "t1",
        deviceId: "kitchen",
        contentType: "data",
        createdAt: later,
        filePath: "/images/t1.png",
      });

      expect(directory.getScreen("t1")).toEqual({
        success: true,
        data: {
          filename: "t1",
          deviceId: "kitchen",
          contentType: "data",
          createdAt: later,
          filePath: "/images/t1.png",
        },
      });
    });

    it("should return null for an unknown screen", () => {
      expect(directory.getScreen("missing")).toEqual({ success: true, data: null });
    });
  });

  describe("close", () => {
    it("should turn later calls into storage errors", () => {
      directory.close();

      const result = directory.getDevice(MAC);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toHaveProperty("code", StorageErrorCode.DATABASE_ERROR);
      }
    });
  });
});
