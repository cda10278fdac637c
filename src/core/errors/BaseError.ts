import { getUserMessage as getErrorUserMessage } from "./ErrorMessages";

/**
 * Base error class for every custom error in the server.
 * Keeps stack traces and `instanceof` working across subclasses.
 */
export abstract class BaseError extends Error {
  /**
   * Error code, prefixed with its category (RENDER_, STORAGE_, ...)
   */
  public readonly code: string;

  /**
   * When the error was created
   */
  public readonly timestamp: Date;

  /**
   * Extra values that help explain the failure in logs
   */
  public readonly context?: Record<string, unknown>;

  /**
   * Whether the caller may retry the operation
   */
  public readonly recoverable: boolean;

  constructor(
    message: string,
    code: string,
    recoverable: boolean = false,
    context?: Record<string, unknown>,
  ) {
    super(message);

    Error.captureStackTrace(this, this.constructor);
    Object.setPrototypeOf(this, new.target.prototype);

    this.name = this.constructor.name;
    this.code = code;
    this.timestamp = new Date();
    this.recoverable = recoverable;
    this.context = context;
  }

  /**
   * Plain object form for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      recoverable: this.recoverable,
      context: this.context,
      stack: this.stack,
    };
  }

  /**
   * Message safe to show a caller, looked up by code in ErrorMessages.ts
   */
  getUserMessage(): string {
    return getErrorUserMessage(this.code);
  }
}
