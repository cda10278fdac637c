import { BaseError } from "./BaseError";

/**
 * HTTP surface error codes
 */
export enum WebErrorCode {
  // Server errors
  SERVER_START_FAILED = "WEB_SERVER_START_FAILED",
  PORT_IN_USE = "WEB_PORT_IN_USE",
  SERVER_NOT_RUNNING = "WEB_SERVER_NOT_RUNNING",
  SERVER_STOP_FAILED = "WEB_SERVER_STOP_FAILED",

  // Request errors
  INVALID_PARAMETER = "WEB_INVALID_PARAMETER",

  UNKNOWN = "WEB_UNKNOWN_ERROR",
}

/**
 * Error that maps onto an HTTP response
 */
export class WebError extends BaseError {
  /**
   * HTTP status code to answer with
   */
  public readonly statusCode?: number;

  constructor(
    message: string,
    code: WebErrorCode = WebErrorCode.UNKNOWN,
    recoverable: boolean = false,
    context?: Record<string, unknown>,
    statusCode?: number,
  ) {
    super(message, code, recoverable, context);
    this.statusCode = statusCode;
  }

  static serverStartFailed(port: number, error: Error): WebError {
    return new WebError(
      `Failed to start web server on port ${port}: ${error.message}`,
      WebErrorCode.SERVER_START_FAILED,
      false,
      { port, originalError: error.message },
      500,
    );
  }

  static portInUse(port: number): WebError {
    return new WebError(
      `Port ${port} is already in use`,
      WebErrorCode.PORT_IN_USE,
      false,
      { port },
      500,
    );
  }

  static serverNotRunning(): WebError {
    return new WebError(
      "Web server is not running",
      WebErrorCode.SERVER_NOT_RUNNING,
      false,
      {},
      503,
    );
  }

  static serverStopFailed(error: Error): WebError {
    return new WebError(
      `Failed to stop server: ${error.message}`,
      WebErrorCode.SERVER_STOP_FAILED,
      false,
      { originalError: error.message },
      500,
    );
  }

  static invalidParameter(
    parameter: string,
    value: unknown,
    expected: string,
  ): WebError {
    return new WebError(
      `Invalid parameter ${parameter}: ${String(value)} (expected: ${expected})`,
      WebErrorCode.INVALID_PARAMETER,
      false,
      { parameter, value, expected },
      400,
    );
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      statusCode: this.statusCode,
    };
  }
}
