import { Request, Response } from "express";
import {
  IDeviceDirectory,
  IRuntimeSettings,
  IScreenService,
} from "@core/interfaces";
import {
  DisplayResponse,
  LogResponse,
  SetupResponse,
  TelemetryLog,
  isSuccess,
} from "@core/types";
import { DeviceError } from "@core/errors";
import {
  CURRENT_SCREEN_REFRESH_RATE_SECONDS,
  DISPLAY_IMAGE_URL_TIMEOUT_SECONDS,
} from "@core/constants";
import { getLogger } from "@utils/logger";
import { generateApiKey, generateFriendlyId } from "@utils/crypto";
import {
  deviceIdHeadersSchema,
  displayHeadersSchema,
  setupHeadersSchema,
  validate,
} from "@web/validation";
import { imageUrlFor, sendFailure } from "../responses";

const logger = getLogger("DeviceController");

/**
 * Device Controller
 *
 * Handles the endpoints the display firmware calls: polling for the next
 * image, first-boot setup, telemetry logs and the status snapshot.
 * Devices identify themselves with their MAC address in the `ID` header.
 */
export class DeviceController {
  constructor(
    private readonly directory: IDeviceDirectory,
    private readonly screens: IScreenService,
    private readonly settings: IRuntimeSettings,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Poll for the image to show.
   *
   * Refreshes the device's last-seen time, firmware and battery (unknown
   * devices are served all the same) and answers with the latest pushed
   * screen, or a fresh hello-world screen before the first push.
   *
   * @route GET /api/display
   */
  async display(req: Request, res: Response): Promise<void> {
    const headers = validate(displayHeadersSchema, req.headers, "headers");
    if (!headers.success) {
      logger.warn(`Rejected display poll: ${headers.error.error}`);
      res.status(400).json(headers.error);
      return;
    }

    const { macAddress, width, height } = headers.data;
    logger.debug(`Display poll from ${macAddress}`, {
      batteryVoltage: headers.data.batteryVoltage,
      firmwareVersion: headers.data.firmwareVersion,
      rssi: headers.data.rssi,
      deviceRefreshRate: headers.data.refreshRate,
    });

    const updated = this.directory.updateDeviceStatus(macAddress, {
      lastSeen: this.now(),
      firmwareVersion: headers.data.firmwareVersion,
      batteryVoltage: headers.data.batteryVoltage,
    });
    if (!isSuccess(updated)) {
      sendFailure(res, updated.error, "Display poll");
      return;
    }
    if (!updated.data) {
      logger.debug(`${macAddress} is not registered; serving it anyway`);
    }

    const image = await this.screens.resolveDisplayImage(width, height);
    if (!isSuccess(image)) {
      sendFailure(res, image.error, "Display poll");
      return;
    }

    res.json(
      this.displayResponse(
        req,
        image.data.filename,
        this.settings.getRefreshRate(),
      ),
    );
  }

  /**
   * Provision a device on first boot.
   *
   * A known MAC gets its stored credentials back; a new one is registered
   * with a fresh API key and friendly ID. Either way a new welcome screen
   * is rendered.
   *
   * @route POST /api/setup
   */
  async setup(req: Request, res: Response): Promise<void> {
    const headers = validate(setupHeadersSchema, req.headers, "headers");
    if (!headers.success) {
      logger.warn(`Rejected setup: ${headers.error.error}`);
      res.status(400).json(headers.error);
      return;
    }

    const { macAddress, firmwareVersion } = headers.data;
    const existing = this.directory.getDevice(macAddress);
    if (!isSuccess(existing)) {
      sendFailure(res, existing.error, "Setup");
      return;
    }

    let device = existing.data;
    let message = "Welcome back to your Inkstand server";
    if (device) {
      logger.info(`Known device ${macAddress} (${device.friendlyId}) ran setup again`);
    } else {
      const created = this.directory.createDevice({
        macAddress,
        apiKey: generateApiKey(),
        friendlyId: generateFriendlyId(),
        firmwareVersion,
      });
      if (!isSuccess(created)) {
        sendFailure(res, DeviceError.registrationFailed(macAddress, created.error), "Setup");
        return;
      }
      device = created.data;
      message = "Welcome to your Inkstand server";
      logger.info(`Registered ${macAddress} as ${device.friendlyId}`);
    }

    const welcome = await this.screens.createWelcome(device.friendlyId);
    if (!isSuccess(welcome)) {
      sendFailure(res, welcome.error, "Setup");
      return;
    }

    const body: SetupResponse = {
      status: 200,
      api_key: device.apiKey,
      friendly_id: device.friendlyId,
      image_url: imageUrlFor(req, welcome.data.filename),
      message,
    };
    res.json(body);
  }

  /**
   * Store a telemetry log. The body has already been validated.
   *
   * Logs from unknown devices are kept; only registered devices get their
   * status refreshed.
   *
   * @route POST /api/log
   */
  async log(req: Request, res: Response): Promise<void> {
    const headers = validate(deviceIdHeadersSchema, req.headers, "headers");
    if (!headers.success) {
      logger.warn(`Rejected log: ${headers.error.error}`);
      res.status(400).json(headers.error);
      return;
    }

    const { macAddress } = headers.data;
    const telemetry: TelemetryLog = req.body;

    const stored = this.directory.appendLog(macAddress, telemetry);
    if (!isSuccess(stored)) {
      sendFailure(res, stored.error, "Log");
      return;
    }
    logger.debug(`Stored log ${stored.data.id} from ${macAddress}`);

    const device = this.directory.getDevice(macAddress);
    if (!isSuccess(device)) {
      sendFailure(res, device.error, "Log");
      return;
    }
    if (device.data) {
      const updated = this.directory.updateDeviceStatus(macAddress, {
        lastSeen: this.now(),
        firmwareVersion: telemetry.firmware_version,
        batteryVoltage: telemetry.battery_voltage,
      });
      if (!isSuccess(updated)) {
        sendFailure(res, updated.error, "Log");
        return;
      }
    }

    const body: LogResponse = {
      status: "success",
      message: "Log data received",
    };
    res.json(body);
  }

  /**
   * Render a status snapshot for a device without counting it as a poll.
   *
   * @route GET /api/current_screen
   */
  async currentScreen(req: Request, res: Response): Promise<void> {
    const headers = validate(deviceIdHeadersSchema, req.headers, "headers");
    if (!headers.success) {
      logger.warn(`Rejected current screen request: ${headers.error.error}`);
      res.status(400).json(headers.error);
      return;
    }

    const { macAddress } = headers.data;
    const device = this.directory.getDevice(macAddress);
    if (!isSuccess(device)) {
      sendFailure(res, device.error, "Current screen");
      return;
    }

    const snapshot = await this.screens.createStatusSnapshot(macAddress, device.data);
    if (!isSuccess(snapshot)) {
      sendFailure(res, snapshot.error, "Current screen");
      return;
    }

    res.json(
      this.displayResponse(
        req,
        snapshot.data.filename,
        CURRENT_SCREEN_REFRESH_RATE_SECONDS,
      ),
    );
  }

  private displayResponse(
    req: Request,
    filename: string,
    refreshRate: number,
  ): DisplayResponse {
    return {
      status: 0,
      image_url: imageUrlFor(req, filename),
      filename,
      refresh_rate: refreshRate,
      update_firmware: false,
      firmware_url: null,
      reset_firmware: false,
      special_function: "sleep",
      image_url_timeout: DISPLAY_IMAGE_URL_TIMEOUT_SECONDS,
    };
  }
}
