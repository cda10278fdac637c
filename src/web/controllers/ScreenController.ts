import { Request, Response } from "express";
import { IRuntimeSettings, IScreenService } from "@core/interfaces";
import {
  RefreshRateResponse,
  ScreenRequest,
  ScreenResponse,
  isSuccess,
} from "@core/types";
import { getLogger } from "@utils/logger";
import { refreshRateHeadersSchema, validate } from "@web/validation";
import { imageUrlFor, sendFailure } from "../responses";

const logger = getLogger("ScreenController");

/**
 * Screen Controller
 *
 * Endpoints for pushing content to the displays and tuning how often
 * they poll.
 */
export class ScreenController {
  constructor(
    private readonly screens: IScreenService,
    private readonly settings: IRuntimeSettings,
  ) {}

  /**
   * Render and publish a screen. The body is validated and mapped to a
   * ScreenRequest by the route's middleware.
   *
   * @route POST /api/screens
   */
  async createScreen(req: Request, res: Response): Promise<void> {
    const request: ScreenRequest = req.body;

    const artifact = await this.screens.createScreen(request);
    if (!isSuccess(artifact)) {
      sendFailure(res, artifact.error, "Screen push");
      return;
    }

    const body: ScreenResponse = {
      status: "success",
      image_url: imageUrlFor(req, artifact.data.filename),
      filename: artifact.data.filename,
    };
    res.json(body);
  }

  /**
   * Change the refresh rate reported to polling devices.
   *
   * @route POST /api/refresh_rate
   */
  async setRefreshRate(req: Request, res: Response): Promise<void> {
    const headers = validate(refreshRateHeadersSchema, req.headers, "headers");
    if (!headers.success) {
      logger.warn(`Rejected refresh rate: ${headers.error.error}`);
      res.status(400).json(headers.error);
      return;
    }

    const updated = this.settings.setRefreshRate(headers.data.refreshRate);
    if (!isSuccess(updated)) {
      sendFailure(res, updated.error, "Refresh rate change");
      return;
    }

    const body: RefreshRateResponse = {
      status: "success",
      refresh_rate: updated.data,
    };
    res.json(body);
  }
}
