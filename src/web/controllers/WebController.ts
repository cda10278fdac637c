import { Request, Response } from "express";
import { StatusResponse } from "@core/types";
import { APP_DISPLAY_NAME } from "@core/constants";
import { getLogger } from "@utils/logger";
import { DeviceController } from "./DeviceController";
import { ScreenController } from "./ScreenController";

const logger = getLogger("WebController");

/**
 * Web Controller
 *
 * Answers the server status endpoints and hands the device API to its
 * sub-controllers:
 * - {@link DeviceController} - display polling, setup, telemetry logs
 * - {@link ScreenController} - screen pushes and the refresh rate
 *
 * @example
 * ```typescript
 * const controller = new WebController(devices, screens, "1.0.0");
 * app.get('/status', (req, res) => controller.getStatus(req, res));
 * ```
 */
export class WebController {
  constructor(
    public readonly devices: DeviceController,
    public readonly screens: ScreenController,
    private readonly version: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Server status.
   *
   * @route GET /
   * @route GET /status
   */
  getStatus(_req: Request, res: Response): void {
    logger.debug("Status requested");
    const body: StatusResponse = {
      message: APP_DISPLAY_NAME,
      status: "running",
      version: this.version,
      timestamp: this.now().toISOString(),
    };
    res.json(body);
  }
}
