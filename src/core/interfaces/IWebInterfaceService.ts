import { Result } from "@core/types";

/**
 * Web Interface Service Interface
 *
 * Owns the HTTP server devices and callers talk to.
 */
export interface IWebInterfaceService {
  /**
   * Start listening
   * @returns Result indicating success or failure
   */
  start(): Promise<Result<void>>;

  /**
   * Stop listening and close open connections
   */
  stop(): Promise<Result<void>>;

  isRunning(): boolean;

  /**
   * URL the server is reachable at (e.g. "http://0.0.0.0:8000")
   */
  getServerUrl(): string;
}
