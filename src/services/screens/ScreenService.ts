import {
  IDeviceDirectory,
  IImageStore,
  ILatestImageRegister,
  IRasterizer,
  IRuntimeSettings,
  IScreenService,
  IWatermarkService,
  SaveOptions,
} from "@core/interfaces";
import {
  ContentPayload,
  DeviceRecord,
  RenderedArtifact,
  Result,
  ScreenContentType,
  ScreenRequest,
  failure,
  success,
} from "@core/types";
import { APP_DISPLAY_NAME } from "@core/constants";
import { getLogger } from "@utils/logger";
import { formatCompactStamp, formatUtcClock, formatUtcDateTime } from "@utils/time";

const logger = getLogger("ScreenService");

export type ScreenServiceDependencies = {
  rasterizer: IRasterizer;
  watermark: IWatermarkService;
  store: IImageStore;
  register: ILatestImageRegister;
  directory: IDeviceDirectory;
  settings: IRuntimeSettings;
};

export type ScreenServiceOptions = {
  /** Canvas size of the welcome and status screens */
  width: number;
  height: number;
  now?: () => Date;
};

/**
 * Payload for a pushed content type
 */
export function toPayload(
  contentType: ScreenContentType,
  content: string,
  subtitle?: string,
): ContentPayload {
  switch (contentType) {
    case "html":
      return { kind: "html", raw: content };
    case "uri":
      return { kind: "data_uri", raw: content };
    case "data":
      return { kind: "text", text: content };
    case "big_text":
      return { kind: "big_text", raw: content, subtitle };
  }
}

/**
 * Screen Service Implementation
 *
 * Every screen goes rasterize, watermark, encode. Pushed screens are then
 * recorded and become the latest image; the canned screens answer a
 * single request and are not published.
 */
export class ScreenService implements IScreenService {
  private readonly now: () => Date;

  constructor(
    private readonly deps: ScreenServiceDependencies,
    private readonly options: ScreenServiceOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async createScreen(request: ScreenRequest): Promise<Result<RenderedArtifact>> {
    logger.info(
      `Creating ${request.contentType} screen${request.filename ? ` '${request.filename}'` : ""} at ${request.width}x${request.height}`,
    );

    const artifact = await this.renderAndSave(
      toPayload(request.contentType, request.content, request.subtitle),
      request.width,
      request.height,
      { filename: request.filename, content: request.content },
    );
    if (!artifact.success) {
      return artifact;
    }

    const recorded = this.deps.directory.recordScreen({
      filename: artifact.data.filename,
      deviceId: request.deviceId ?? null,
      contentType: request.contentType,
      createdAt: this.now(),
      filePath: artifact.data.path,
    });
    if (!recorded.success) {
      return recorded;
    }

    this.deps.register.set(artifact.data.filename);
    logger.info(`Latest image is now ${artifact.data.filename}`);
    return artifact;
  }

  async createHelloWorld(width: number, height: number): Promise<Result<RenderedArtifact>> {
    const now = this.now();
    return this.renderAndSave(
      {
        kind: "big_text",
        raw: "HELLO WORLD",
        subtitle: `SERVER ONLINE | TIME: ${formatUtcClock(now)}`,
      },
      width,
      height,
      { filename: `hello-world-${formatCompactStamp(now)}` },
    );
  }

  async createWelcome(friendlyId: string): Promise<Result<RenderedArtifact>> {
    const now = this.now();
    const refreshMinutes = Math.round(this.deps.settings.getRefreshRate() / 60);
    const text = [
      `Welcome to ${APP_DISPLAY_NAME}!`,
      "",
      `Device: ${friendlyId}`,
      "Status: Successfully Connected",
      "",
      "Your device is now configured",
      "and ready to display content.",
      "",
      `Refresh rate: ${refreshMinutes} minutes`,
      "Image format: PNG (1-bit)",
      `Resolution: ${this.options.width}x${this.options.height}`,
      "",
      `Server time: ${formatUtcDateTime(now)}`,
    ].join("\n");

    return this.renderAndSave(
      { kind: "text", text },
      this.options.width,
      this.options.height,
      { filename: `welcome-${friendlyId}-${formatCompactStamp(now)}`, content: text },
    );
  }

  async createStatusSnapshot(
    macAddress: string,
    device: DeviceRecord | null,
  ): Promise<Result<RenderedArtifact>> {
    const text = [
      "Current Screen",
      "",
      `Device: ${device ? device.friendlyId : macAddress}`,
      `MAC: ${macAddress}`,
      `Last Seen: ${device?.lastSeen ? formatUtcDateTime(device.lastSeen) : "Never"}`,
      `Battery: ${device?.batteryVoltage ?? "Unknown"}V`,
      `Firmware: ${device?.firmwareVersion ?? "Unknown"}`,
      "",
      "Server Status: Running",
      `Time: ${formatUtcDateTime(this.now())}`,
    ].join("\n");

    return this.renderAndSave(
      { kind: "text", text },
      this.options.width,
      this.options.height,
      { content: text },
    );
  }

  async resolveDisplayImage(width: number, height: number): Promise<Result<RenderedArtifact>> {
    const latest = this.deps.register.getState();
    if (latest.state === "no_image_yet") {
      logger.debug("No screen pushed yet, serving hello world");
      return this.createHelloWorld(width, height);
    }
    return success({
      filename: latest.filename,
      path: this.deps.store.resolvePath(latest.filename),
    });
  }

  private async renderAndSave(
    payload: ContentPayload,
    width: number,
    height: number,
    saveOptions: SaveOptions,
  ): Promise<Result<RenderedArtifact>> {
    const rendered = await this.deps.rasterizer.render(payload, width, height);
    if (!rendered.success) {
      logger.warn(`Render failed: ${rendered.error.message}`);
      return failure(rendered.error);
    }

    const stamped = this.deps.watermark.watermark(rendered.data);
    return this.deps.store.save(stamped, saveOptions);
  }
}
