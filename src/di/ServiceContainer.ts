import {
  IDeviceDirectory,
  IImageStore,
  ILatestImageRegister,
  IMonochromeEncoder,
  IRasterizer,
  IRuntimeSettings,
  IScreenScheduler,
  IScreenService,
  IWatermarkService,
} from "@core/interfaces";
import { ServerConfig } from "@core/types";
import { ConfigError } from "@core/errors";
import {
  APP_VERSION,
  CANVAS_DEFAULT_HEIGHT,
  CANVAS_DEFAULT_WIDTH,
  ENCODER_DEFAULT_MAGICK_TIMEOUT_MS,
  REFRESH_RATE_DEFAULT_SECONDS,
  REFRESH_RATE_MAX_SECONDS,
  REFRESH_RATE_MIN_SECONDS,
  STORAGE_DEFAULT_DATABASE_PATH,
  STORAGE_DEFAULT_IMAGE_DIRECTORY,
  WEB_DEFAULT_API_BASE_PATH,
  WEB_DEFAULT_HOST,
  WEB_DEFAULT_JSON_BODY_LIMIT,
  WEB_DEFAULT_PORT,
  WEB_DEFAULT_STATIC_DIRECTORY,
} from "@core/constants";
import { getLogger } from "@utils/logger";
import { Rasterizer } from "@services/rasterizer/Rasterizer";
import { WatermarkService } from "@services/watermark/WatermarkService";
import { SharpMonochromeEncoder } from "@services/encoder/SharpMonochromeEncoder";
import { selectEncoder } from "@services/encoder/selectEncoder";
import { ImageStore } from "@services/storage/ImageStore";
import { LatestImageRegister } from "@services/storage/LatestImageRegister";
import { SqliteDeviceDirectory } from "@services/devices/SqliteDeviceDirectory";
import { RuntimeSettings } from "@services/settings/RuntimeSettings";
import { ScreenService } from "@services/screens/ScreenService";
import { ScreenScheduler } from "@services/scheduler/ScreenScheduler";
import { IntegratedWebService } from "@web/IntegratedWebService";
import { WebController } from "@web/controllers/WebController";
import { DeviceController } from "@web/controllers/DeviceController";
import { ScreenController } from "@web/controllers/ScreenController";

const logger = getLogger("ServiceContainer");

/**
 * Read an integer environment variable
 * @throws ConfigError when the value is not an integer or out of range
 */
function readInteger(
  variable: string,
  defaultValue: number,
  min: number,
  max: number,
): number {
  const raw = process.env[variable]?.trim();
  if (!raw) {
    return defaultValue;
  }
  if (!/^-?\d+$/.test(raw)) {
    throw ConfigError.invalidValue(variable, raw, "an integer");
  }
  const value = parseInt(raw, 10);
  if (value < min || value > max) {
    throw ConfigError.outOfRange(variable, value, min, max);
  }
  return value;
}

/**
 * Read a string environment variable; blank counts as unset
 */
function readString(variable: string, defaultValue: string): string {
  const raw = process.env[variable]?.trim();
  return raw ? raw : defaultValue;
}

/**
 * Service Container (Dependency Injection Container)
 *
 * Singleton that builds the server from environment configuration and
 * hands out one instance of each service. Test setters replace services
 * with doubles before anything depends on them.
 */
export class ServiceContainer {
  private static instance: ServiceContainer;

  private config?: ServerConfig;

  private services: {
    rasterizer?: IRasterizer;
    watermark?: IWatermarkService;
    encoder?: IMonochromeEncoder;
    store?: IImageStore;
    register?: ILatestImageRegister;
    directory?: IDeviceDirectory;
    settings?: IRuntimeSettings;
    screens?: IScreenService;
    scheduler?: IScreenScheduler;
    web?: IntegratedWebService;
  } = {};

  private constructor() {}

  /**
   * Get singleton instance
   */
  static getInstance(): ServiceContainer {
    if (!ServiceContainer.instance) {
      ServiceContainer.instance = new ServiceContainer();
    }
    return ServiceContainer.instance;
  }

  /**
   * Reset the container (useful for testing). Closes an open database.
   */
  static reset(): void {
    if (ServiceContainer.instance) {
      ServiceContainer.instance.services.scheduler?.stop();
      ServiceContainer.instance.services.directory?.close();
      ServiceContainer.instance.services = {};
      ServiceContainer.instance.config = undefined;
    }
  }

  // Configuration

  /**
   * Server configuration from the environment, read once.
   * @throws ConfigError for malformed or out-of-range values
   */
  getServerConfig(): ServerConfig {
    if (!this.config) {
      const port = readInteger("PORT", WEB_DEFAULT_PORT, 1, 65535);
      this.config = {
        version: APP_VERSION,
        web: {
          port,
          host: readString("HOST", WEB_DEFAULT_HOST),
          cors: process.env.CORS !== "false",
          apiBasePath: WEB_DEFAULT_API_BASE_PATH,
          staticDirectory: readString("STATIC_DIR", WEB_DEFAULT_STATIC_DIRECTORY),
          jsonBodyLimit: readString("JSON_BODY_LIMIT", WEB_DEFAULT_JSON_BODY_LIMIT),
        },
        storage: {
          imageDirectory: readString("IMAGE_DIR", STORAGE_DEFAULT_IMAGE_DIRECTORY),
          databasePath: readString("DATABASE_PATH", STORAGE_DEFAULT_DATABASE_PATH),
        },
        rendering: {
          width: CANVAS_DEFAULT_WIDTH,
          height: CANVAS_DEFAULT_HEIGHT,
          watermarkLabel: readString("SERVER_URL", `http://localhost:${port}`),
          defaultRefreshRate: readInteger(
            "DEFAULT_REFRESH_RATE",
            REFRESH_RATE_DEFAULT_SECONDS,
            REFRESH_RATE_MIN_SECONDS,
            REFRESH_RATE_MAX_SECONDS,
          ),
        },
        encoder: {
          magickTimeoutMs: readInteger(
            "MAGICK_TIMEOUT_MS",
            ENCODER_DEFAULT_MAGICK_TIMEOUT_MS,
            1,
            10 * 60 * 1000,
          ),
        },
      };
    }
    return this.config;
  }

  // Factory methods for production

  /**
   * Probe for ImageMagick and keep the chosen encoder. Call before the
   * image store is first requested; otherwise the sharp encoder is used.
   */
  async selectMonochromeEncoder(): Promise<IMonochromeEncoder> {
    if (!this.services.encoder) {
      this.services.encoder = await selectEncoder(
        this.getServerConfig().encoder.magickTimeoutMs,
      );
    }
    return this.services.encoder;
  }

  getMonochromeEncoder(): IMonochromeEncoder {
    if (!this.services.encoder) {
      logger.debug("No encoder selected yet, using sharp");
      this.services.encoder = new SharpMonochromeEncoder();
    }
    return this.services.encoder;
  }

  getRasterizer(): IRasterizer {
    if (!this.services.rasterizer) {
      this.services.rasterizer = new Rasterizer();
    }
    return this.services.rasterizer;
  }

  getWatermarkService(): IWatermarkService {
    if (!this.services.watermark) {
      this.services.watermark = new WatermarkService(
        this.getServerConfig().rendering.watermarkLabel,
      );
    }
    return this.services.watermark;
  }

  getImageStore(): IImageStore {
    if (!this.services.store) {
      this.services.store = new ImageStore(
        this.getServerConfig().storage.imageDirectory,
        this.getMonochromeEncoder(),
      );
    }
    return this.services.store;
  }

  getLatestImageRegister(): ILatestImageRegister {
    if (!this.services.register) {
      this.services.register = new LatestImageRegister();
    }
    return this.services.register;
  }

  getDeviceDirectory(): IDeviceDirectory {
    if (!this.services.directory) {
      this.services.directory = new SqliteDeviceDirectory(
        this.getServerConfig().storage.databasePath,
      );
    }
    return this.services.directory;
  }

  getRuntimeSettings(): IRuntimeSettings {
    if (!this.services.settings) {
      this.services.settings = new RuntimeSettings(
        this.getServerConfig().rendering.defaultRefreshRate,
      );
    }
    return this.services.settings;
  }

  getScreenService(): IScreenService {
    if (!this.services.screens) {
      const { width, height } = this.getServerConfig().rendering;
      this.services.screens = new ScreenService(
        {
          rasterizer: this.getRasterizer(),
          watermark: this.getWatermarkService(),
          store: this.getImageStore(),
          register: this.getLatestImageRegister(),
          directory: this.getDeviceDirectory(),
          settings: this.getRuntimeSettings(),
        },
        { width, height },
      );
    }
    return this.services.screens;
  }

  getScreenScheduler(): IScreenScheduler {
    if (!this.services.scheduler) {
      const { width, height } = this.getServerConfig().rendering;
      this.services.scheduler = new ScreenScheduler(this.getScreenService(), {
        width,
        height,
      });
    }
    return this.services.scheduler;
  }

  getWebInterfaceService(): IntegratedWebService {
    if (!this.services.web) {
      const config = this.getServerConfig();
      const screens = this.getScreenService();
      const settings = this.getRuntimeSettings();
      const controller = new WebController(
        new DeviceController(this.getDeviceDirectory(), screens, settings),
        new ScreenController(screens, settings),
        config.version,
      );
      this.services.web = new IntegratedWebService(
        controller,
        config.web,
        config.storage.imageDirectory,
      );
    }
    return this.services.web;
  }

  // Test setters

  /**
   * Set Monochrome Encoder (for testing)
   */
  setMonochromeEncoder(encoder: IMonochromeEncoder): void {
    this.services.encoder = encoder;
  }

  /**
   * Set Image Store (for testing)
   */
  setImageStore(store: IImageStore): void {
    this.services.store = store;
  }

  /**
   * Set Device Directory (for testing)
   */
  setDeviceDirectory(directory: IDeviceDirectory): void {
    this.services.directory = directory;
  }

  /**
   * Set Screen Service (for testing)
   */
  setScreenService(screens: IScreenService): void {
    this.services.screens = screens;
  }
}
