jest.mock("@utils/logger", () => ({
  getLogger: () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    time: jest.fn(),
    timeEnd: jest.fn(),
  }),
}));

import { IncomingHttpHeaders } from "http";
import { Request, Response } from "express";
import { IMonochromeEncoder } from "@core/interfaces";
import { success } from "@core/types";
import { Rasterizer } from "@services/rasterizer/Rasterizer";
import { WatermarkService } from "@services/watermark/WatermarkService";
import { ImageStore } from "@services/storage/ImageStore";
import { LatestImageRegister } from "@services/storage/LatestImageRegister";
import { SqliteDeviceDirectory } from "@services/devices/SqliteDeviceDirectory";
import { RuntimeSettings } from "@services/settings/RuntimeSettings";
import { ScreenService } from "@services/screens/ScreenService";
import { DeviceController } from "@web/controllers/DeviceController";
import { ScreenController } from "@web/controllers/ScreenController";
import { screenRequestSchema, telemetryBodySchema, validateBody } from "@web/validation";

const NOW = new Date("2024-03-09T07:05:01Z");
const MAC = "AA:BB:CC:DD:EE:FF";
const HOST = "inkstand.local:8000";

const mockRequest = (headers: IncomingHttpHeaders = {}, body: unknown = {}) => {
  const req: Partial<Request> = {
    method: "POST",
    path: "/api",
    headers,
    body,
    protocol: "http",
    get: jest.fn().mockReturnValue(HOST),
  };
  return req as Request;
};

const mockResponse = () => {
  const res: Partial<Response> = {
    json: jest.fn().mockReturnThis(),
    status: jest.fn().mockReturnThis(),
  };
  return res as Response;
};

const sentBody = (res: Response): unknown => (res.json as jest.Mock).mock.calls[0][0];

/**
 * Device API flows
 *
 * Drives the controllers through the real render, storage and database
 * services. Only the PNG encoder is a stand-in; nothing is written to disk.
 */
describe("Integration: device API → screens → directory", () => {
  let encoder: IMonochromeEncoder & { encode: jest.Mock };
  let directory: SqliteDeviceDirectory;
  let settings: RuntimeSettings;
  let devices: DeviceController;
  let screenController: ScreenController;

  beforeEach(() => {
    encoder = {
      name: "fake",
      encode: jest.fn().mockResolvedValue(success(undefined)),
    };
    directory = new SqliteDeviceDirectory(":memory:", () => NOW);
    settings = new RuntimeSettings(1800);
    const store = new ImageStore("/tmp/inkstand-integration/images", encoder, () => NOW);
    const screens = new ScreenService(
      {
        rasterizer: new Rasterizer(() => NOW),
        watermark: new WatermarkService("http://localhost:8000"),
        store,
        register: new LatestImageRegister(),
        directory,
        settings,
      },
      { width: 800, height: 480, now: () => NOW },
    );
    devices = new DeviceController(directory, screens, settings, () => NOW);
    screenController = new ScreenController(screens, settings);
  });

  afterEach(() => {
    directory.close();
  });

  const pushScreen = async (body: Record<string, unknown>) => {
    const req = mockRequest({}, body);
    const res = mockResponse();
    const next = jest.fn();
    validateBody(screenRequestSchema)(req, res, next);
    expect(next).toHaveBeenCalled();
    await screenController.createScreen(req, res);
    return res;
  };

  it("should serve hello world before anything is pushed", async () => {
    const res = mockResponse();

    await devices.display(mockRequest({ id: MAC }), res);

    expect(sentBody(res)).toMatchObject({
      status: 0,
      filename: "hello-world-20240309-070501",
      image_url: `http://${HOST}/static/images/hello-world-20240309-070501.png`,
      refresh_rate: 1800,
    });
  });

  it("should serve a pushed screen to the next display poll", async () => {
    const pushed = await pushScreen({
      content_type: "html",
      content: "<h1>Hi</h1>",
      filename: "t1",
    });

    expect(sentBody(pushed)).toEqual({
      status: "success",
      image_url: `http://${HOST}/static/images/t1.png`,
      filename: "t1",
    });
    expect(encoder.encode).toHaveBeenCalledWith(
      expect.objectContaining({ kind: "rgb" }),
      "/tmp/inkstand-integration/images/t1.png",
    );

    const res = mockResponse();
    await devices.display(mockRequest({ id: MAC }), res);

    expect(sentBody(res)).toMatchObject({
      filename: "t1",
      image_url: `http://${HOST}/static/images/t1.png`,
    });

    const recorded = directory.getScreen("t1");
    expect(recorded.success && recorded.data).toMatchObject({
      filename: "t1",
      contentType: "html",
      deviceId: null,
    });
  });

  it("should derive a filename when none is given", async () => {
    const pushed = await pushScreen({ content_type: "data", content: "Shopping list" });

    expect(sentBody(pushed)).toMatchObject({
      filename: expect.stringMatching(/^generated-2024-03-09-T07-05-01Z-[0-9a-f]{8}$/),
    });
  });

  it("should hand out new refresh rates on the next poll", async () => {
    const rateRes = mockResponse();
    await screenController.setRefreshRate(mockRequest({ "refresh-rate": "900" }), rateRes);
    expect(sentBody(rateRes)).toEqual({ status: "success", refresh_rate: 900 });

    const res = mockResponse();
    await devices.display(mockRequest({ id: MAC }), res);

    expect(sentBody(res)).toMatchObject({ refresh_rate: 900 });
  });

  it("should return the same credentials when setup runs twice", async () => {
    const first = mockResponse();
    await devices.setup(mockRequest({ id: MAC, "fw-version": "1.5.2" }), first);
    const second = mockResponse();
    await devices.setup(mockRequest({ id: MAC }), second);

    const firstBody = sentBody(first);
    const secondBody = sentBody(second);
    expect(firstBody).toMatchObject({
      status: 200,
      message: "Welcome to your Inkstand server",
    });
    expect(secondBody).toMatchObject({
      status: 200,
      message: "Welcome back to your Inkstand server",
    });
    expect(secondBody).toHaveProperty("api_key", (firstBody as { api_key: string }).api_key);
    expect(secondBody).toHaveProperty(
      "friendly_id",
      (firstBody as { friendly_id: string }).friendly_id,
    );

    const stored = directory.getDevice(MAC);
    expect(stored.success && stored.data?.firmwareVersion).toBe("1.5.2");
  });

  it("should keep logs from devices that never ran setup", async () => {
    const req = mockRequest({ id: MAC }, { battery_voltage: 3.7, wake_reason: "timer" });
    const res = mockResponse();
    validateBody(telemetryBodySchema)(req, res, jest.fn());

    await devices.log(req, res);

    expect(sentBody(res)).toEqual({ status: "success", message: "Log data received" });
    const logs = directory.getLogs(MAC);
    expect(logs.success && logs.data).toHaveLength(1);
    expect(logs.success && logs.data[0].data).toEqual({
      battery_voltage: 3.7,
      wake_reason: "timer",
    });
    expect(directory.getDevice(MAC)).toEqual(success(null));
  });

  it("should record a poll without changing what is shown", async () => {
    await devices.setup(mockRequest({ id: MAC }), mockResponse());

    await devices.display(mockRequest({ id: MAC, "battery-voltage": "3.85" }), mockResponse());

    const stored = directory.getDevice(MAC);
    expect(stored.success && stored.data).toMatchObject({
      lastSeen: NOW,
      batteryVoltage: 3.85,
    });
  });
});
