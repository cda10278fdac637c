jest.mock("@utils/logger", () => ({
  getLogger: () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

import { ScreenService, toPayload } from "../ScreenService";
import { LatestImageRegister } from "@services/storage/LatestImageRegister";
import { RuntimeSettings } from "@services/settings/RuntimeSettings";
import { BitmapUtils } from "@services/canvas/BitmapUtils";
import { CanvasUtils } from "@services/canvas/CanvasUtils";
import {
  IDeviceDirectory,
  IImageStore,
  IRasterizer,
  IWatermarkService,
  SaveOptions,
} from "@core/interfaces";
import { Canvas, DeviceRecord, RgbCanvas, failure, success } from "@core/types";
import { RenderError, StorageError } from "@core/errors";

const NOW = new Date(Date.UTC(2024, 2, 9, 7, 5, 1));

const monoCanvas: Canvas = { kind: "mono", bitmap: BitmapUtils.createBlankBitmap(8, 8) };
const stampedCanvas: RgbCanvas = { kind: "rgb", image: CanvasUtils.createRgbImage(8, 8) };

function createMocks() {
  const rasterizer = {
    render: jest.fn().mockResolvedValue(success(monoCanvas)),
  } satisfies IRasterizer;

  const watermark = {
    watermark: jest.fn().mockReturnValue(stampedCanvas),
  } satisfies IWatermarkService;

  const store = {
    initialize: jest.fn().mockResolvedValue(success(undefined)),
    save: jest.fn(async (_canvas: Canvas, options?: SaveOptions) =>
      success({
        filename: options?.filename ?? "generated",
        path: `/images/${options?.filename ?? "generated"}.png`,
      }),
    ),
    resolvePath: jest.fn((filename: string) => `/images/${filename}.png`),
  } satisfies IImageStore;

  const directory = {
    getDevice: jest.fn(),
    createDevice: jest.fn(),
    updateDeviceStatus: jest.fn(),
    appendLog: jest.fn(),
    getLogs: jest.fn(),
    recordScreen: jest.fn().mockReturnValue(success(undefined)),
    getScreen: jest.fn(),
    close: jest.fn(),
  } satisfies IDeviceDirectory;

  const register = new LatestImageRegister();
  const settings = new RuntimeSettings(1800);

  const service = new ScreenService(
    { rasterizer, watermark, store, register, directory, settings },
    { width: 800, height: 480, now: () => NOW },
  );

  return { service, rasterizer, watermark, store, directory, register, settings };
}

const renderedText = (rasterizer: { render: jest.Mock }): string => {
  const [payload] = rasterizer.render.mock.calls[0];
  if (payload.kind !== "text") {
    throw new Error(`Expected a text payload, got ${payload.kind}`);
  }
  return payload.text;
};

describe("ScreenService", () => {
  describe("toPayload", () => {
    it("should map every content type", () => {
      expect(toPayload("html", "<b>x</b>")).toEqual({ kind: "html", raw: "<b>x</b>" });
      expect(toPayload("uri", "data:,")).toEqual({ kind: "data_uri", raw: "data:," });
      expect(toPayload("data", "plain")).toEqual({ kind: "text", text: "plain" });
      expect(toPayload("big_text", "HI", "sub")).toEqual({
        kind: "big_text",
        raw: "HI",
        subtitle: "sub",
      });
    });
  });

  describe("createScreen", () => {
    it("should render, watermark, save, record and publish", async () => {
      const { service, rasterizer, watermark, store, directory, register } = createMocks();

      const result = await service.createScreen({
        contentType: "html",
        content: "<h1>Hi</h1>",
        filename: "t1",
        width: 800,
        height: 480,
      });

      expect(result).toEqual({ success: true, data: { filename: "t1", path: "/images/t1.png" } });
      expect(rasterizer.render).toHaveBeenCalledWith({ kind: "html", raw: "<h1>Hi</h1>" }, 800, 480);
      expect(watermark.watermark).toHaveBeenCalledWith(monoCanvas);
      expect(store.save).toHaveBeenCalledWith(stampedCanvas, {
        filename: "t1",
        content: "<h1>Hi</h1>",
      });
      expect(directory.recordScreen).toHaveBeenCalledWith({
        filename: "t1",
        deviceId: null,
        contentType: "html",
        createdAt: NOW,
        filePath: "/images/t1.png",
      });
      expect(register.getState()).toEqual({ state: "has_latest_image", filename: "t1" });
    });

    it("should keep the device id on the screen record", async () => {
      const { service, directory } = createMocks();

      await service.createScreen({
        contentType: "data",
        content: "hello",
        filename: "kitchen-1",
        width: 400,
        height: 300,
        deviceId: "kitchen",
      });

      expect(directory.recordScreen).toHaveBeenCalledWith(
        expect.objectContaining({ deviceId: "kitchen", contentType: "data" }),
      );
    });

    it("should not publish when rendering fails", async () => {
      const { service, rasterizer, store, register } = createMocks();
      const error = RenderError.invalidDataUri("payload is not valid base64");
      rasterizer.render.mockResolvedValueOnce(failure(error));

      const result = await service.createScreen({
        contentType: "uri",
        content: "data:image/png;base64,@@",
        width: 800,
        height: 480,
      });

      expect(result).toEqual({ success: false, error });
      expect(store.save).not.toHaveBeenCalled();
      expect(register.getState()).toEqual({ state: "no_image_yet" });
    });

    it("should not publish when the screen cannot be recorded", async () => {
      const { service, directory, register } = createMocks();
      const error = StorageError.databaseError("screen upsert", new Error("disk I/O error"));
      directory.recordScreen.mockReturnValueOnce(failure(error));

      const result = await service.createScreen({
        contentType: "data",
        content: "hello",
        filename: "t2",
        width: 800,
        height: 480,
      });

      expect(result).toEqual({ success: false, error });
      expect(register.getState()).toEqual({ state: "no_image_yet" });
    });
  });

  describe("createHelloWorld", () => {
    it("should render big text with the server clock and not publish", async () => {
      const { service, rasterizer, store, register } = createMocks();

      const result = await service.createHelloWorld(640, 384);

      expect(rasterizer.render).toHaveBeenCalledWith(
        { kind: "big_text", raw: "HELLO WORLD", subtitle: "SERVER ONLINE | TIME: 07:05:01" },
        640,
        384,
      );
      expect(store.save).toHaveBeenCalledWith(stampedCanvas, {
        filename: "hello-world-20240309-070501",
      });
      expect(result.success && result.data.filename).toBe("hello-world-20240309-070501");
      expect(register.getState()).toEqual({ state: "no_image_yet" });
    });
  });

  describe("resolveDisplayImage", () => {
    it("should synthesize hello world before anything is pushed", async () => {
      const { service, rasterizer } = createMocks();

      const result = await service.resolveDisplayImage(800, 480);

      expect(result.success && result.data.filename).toBe("hello-world-20240309-070501");
      expect(rasterizer.render).toHaveBeenCalledTimes(1);
    });

    it("should return the latest pushed screen without rendering", async () => {
      const { service, rasterizer, register } = createMocks();
      register.set("t1");

      const result = await service.resolveDisplayImage(800, 480);

      expect(result).toEqual({ success: true, data: { filename: "t1", path: "/images/t1.png" } });
      expect(rasterizer.render).not.toHaveBeenCalled();
    });
  });

  describe("createWelcome", () => {
    it("should name the file after the friendly id and the time", async () => {
      const { service, rasterizer, store } = createMocks();

      await service.createWelcome("ABC123");

      expect(rasterizer.render).toHaveBeenCalledWith(
        expect.objectContaining({ kind: "text" }),
        800,
        480,
      );
      expect(store.save).toHaveBeenCalledWith(
        stampedCanvas,
        expect.objectContaining({ filename: "welcome-ABC123-20240309-070501" }),
      );
      expect(renderedText(rasterizer).split("\n")).toEqual([
        "Welcome to Inkstand Server!",
        "",
        "Device: ABC123",
        "Status: Successfully Connected",
        "",
        "Your device is now configured",
        "and ready to display content.",
        "",
        "Refresh rate: 30 minutes",
        "Image format: PNG (1-bit)",
        "Resolution: 800x480",
        "",
        "Server time: 2024-03-09 07:05:01 UTC",
      ]);
    });

    it("should show the current refresh rate", async () => {
      const { service, rasterizer, settings } = createMocks();
      settings.setRefreshRate(120);

      await service.createWelcome("ABC123");

      expect(renderedText(rasterizer)).toContain("Refresh rate: 2 minutes");
    });
  });

  describe("createStatusSnapshot", () => {
    it("should describe an unknown device", async () => {
      const { service, rasterizer, store } = createMocks();

      await service.createStatusSnapshot("AA:BB:CC:DD:EE:FF", null);

      expect(renderedText(rasterizer).split("\n")).toEqual([
        "Current Screen",
        "",
        "Device: AA:BB:CC:DD:EE:FF",
        "MAC: AA:BB:CC:DD:EE:FF",
        "Last Seen: Never",
        "Battery: UnknownV",
        "Firmware: Unknown",
        "",
        "Server Status: Running",
        "Time: 2024-03-09 07:05:01 UTC",
      ]);
      const [, options] = store.save.mock.calls[0];
      expect(options?.filename).toBeUndefined();
    });

    it("should describe a registered device", async () => {
      const { service, rasterizer } = createMocks();
      const device: DeviceRecord = {
        macAddress: "AA:BB:CC:DD:EE:FF",
        apiKey: "test-api-key",
        friendlyId: "ABC123",
        createdAt: NOW,
        lastSeen: new Date(Date.UTC(2024, 2, 8, 23, 0, 0)),
        firmwareVersion: "1.2.3",
        batteryVoltage: 3.9,
      };

      await service.createStatusSnapshot(device.macAddress, device);

      const lines = renderedText(rasterizer).split("\n");
      expect(lines.slice(2, 7)).toEqual([
        "Device: ABC123",
        "MAC: AA:BB:CC:DD:EE:FF",
        "Last Seen: 2024-03-08 23:00:00 UTC",
        "Battery: 3.9V",
        "Firmware: 1.2.3",
      ]);
    });
  });
});
