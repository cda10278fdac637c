import express, { Express } from "express";
import http from "http";
import path from "path";
import { Result, success, failure, WebConfig } from "@core/types";
import { IWebInterfaceService } from "@core/interfaces";
import { WebError } from "@core/errors";
import { WEB_IMAGES_URL_PATH } from "@core/constants";
import { getLogger } from "@utils/logger";
import { isNodeJSErrnoException, toError } from "@utils/typeGuards";
import { screenRequestSchema, telemetryBodySchema, validateBody } from "@web/validation";
import { WebController } from "./controllers/WebController";
import { asyncRoute, errorHandler, notFoundHandler } from "./responses";

const logger = getLogger("IntegratedWebService");

/**
 * Integrated Web Service
 *
 * Express application serving the device API and the generated images.
 *
 * This service:
 * 1. Parses JSON bodies up to the configured limit
 * 2. Serves generated PNGs under /static/images and other files under /static
 * 3. Routes the device API to the WebController
 * 4. Answers unknown routes with 404 and unhandled failures with the 500 envelope
 */
export class IntegratedWebService implements IWebInterfaceService {
  private readonly app: Express;
  private server: http.Server | null = null;
  private running: boolean = false;

  constructor(
    private readonly controller: WebController,
    private readonly config: WebConfig,
    private readonly imageDirectory: string,
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  /**
   * Initialize and start the web server
   */
  async start(): Promise<Result<void, WebError>> {
    if (this.running) {
      return success(undefined);
    }

    try {
      const server = http.createServer(this.app);

      await new Promise<void>((resolve, reject) => {
        server
          .listen(this.config.port, this.config.host, () => {
            resolve();
          })
          .on("error", (err: Error) => {
            if (isNodeJSErrnoException(err) && err.code === "EADDRINUSE") {
              reject(WebError.portInUse(this.config.port));
            } else {
              reject(err);
            }
          });
      });

      this.server = server;
      this.running = true;
      logger.info(
        `✓ Device API listening on http://${this.config.host}:${this.config.port}`,
      );

      return success(undefined);
    } catch (error) {
      if (error instanceof WebError) {
        return failure(error);
      }
      return failure(WebError.serverStartFailed(this.config.port, toError(error)));
    }
  }

  /**
   * Stop the web server
   */
  async stop(): Promise<Result<void>> {
    const server = this.server;
    if (!this.running || !server) {
      return failure(WebError.serverNotRunning());
    }

    try {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) reject(err);
          else resolve();
        });
        server.closeIdleConnections();
      });

      this.server = null;
      this.running = false;
      logger.info("✓ Device API stopped");

      return success(undefined);
    } catch (error) {
      return failure(WebError.serverStopFailed(toError(error)));
    }
  }

  /**
   * Check if the web server is running
   */
  isRunning(): boolean {
    return this.running;
  }

  /**
   * Get the server URL
   */
  getServerUrl(): string {
    const host =
      this.config.host === "0.0.0.0" ? "localhost" : this.config.host;
    return `http://${host}:${this.config.port}`;
  }

  /**
   * The Express application, for mounting in tests
   */
  getApp(): Express {
    return this.app;
  }

  /**
   * Setup Express middleware
   */
  private setupMiddleware(): void {
    // Body parsing; data URIs of full-screen photos need a raised limit
    this.app.use(express.json({ limit: this.config.jsonBodyLimit }));

    // CORS: devices never send an Origin, browser tools on the LAN do
    if (this.config.cors) {
      this.app.use((req, res, next) => {
        res.header("Access-Control-Allow-Origin", "*");
        res.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
        res.header(
          "Access-Control-Allow-Headers",
          "Content-Type, ID, Refresh-Rate, Battery-Voltage, FW-Version, RSSI, Width, Height",
        );

        if (req.method === "OPTIONS") {
          res.sendStatus(200);
        } else {
          next();
        }
      });
    }

    // Logging middleware
    this.app.use((req, _res, next) => {
      logger.info(`${req.method} ${req.path}`);
      next();
    });

    // Generated images first, so IMAGE_DIR may live outside STATIC_DIR.
    // Temporary encoder files are dotfiles and never served.
    this.app.use(
      WEB_IMAGES_URL_PATH,
      express.static(path.resolve(this.imageDirectory), {
        dotfiles: "ignore",
        index: false,
      }),
    );
    this.app.use(
      "/static",
      express.static(path.resolve(this.config.staticDirectory), {
        dotfiles: "ignore",
        index: false,
      }),
    );
  }

  /**
   * Setup Express routes connected to controller
   */
  private setupRoutes(): void {
    const api = this.config.apiBasePath;
    const { devices, screens } = this.controller;

    // Server status
    this.app.get("/", (req, res) => this.controller.getStatus(req, res));
    this.app.get("/status", (req, res) => this.controller.getStatus(req, res));

    // Device endpoints
    this.app.get(
      `${api}/display`,
      asyncRoute((req, res) => devices.display(req, res)),
    );

    this.app.post(
      `${api}/setup`,
      asyncRoute((req, res) => devices.setup(req, res)),
    );

    this.app.post(
      `${api}/log`,
      validateBody(telemetryBodySchema),
      asyncRoute((req, res) => devices.log(req, res)),
    );

    this.app.get(
      `${api}/current_screen`,
      asyncRoute((req, res) => devices.currentScreen(req, res)),
    );

    // Screen endpoints
    this.app.post(
      `${api}/screens`,
      validateBody(screenRequestSchema),
      asyncRoute((req, res) => screens.createScreen(req, res)),
    );

    this.app.post(
      `${api}/refresh_rate`,
      asyncRoute((req, res) => screens.setRefreshRate(req, res)),
    );

    this.app.use(notFoundHandler);
    this.app.use(errorHandler);
  }
}
