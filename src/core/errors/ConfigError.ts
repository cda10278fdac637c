import { BaseError } from "./BaseError";

/**
 * Configuration error codes
 */
export enum ConfigErrorCode {
  INVALID_VALUE = "CONFIG_INVALID_VALUE",
  OUT_OF_RANGE = "CONFIG_OUT_OF_RANGE",
  UNKNOWN = "CONFIG_UNKNOWN_ERROR",
}

/**
 * Raised while reading configuration from the environment
 */
export class ConfigError extends BaseError {
  constructor(
    message: string,
    code: ConfigErrorCode = ConfigErrorCode.UNKNOWN,
    recoverable: boolean = false,
    context?: Record<string, unknown>,
  ) {
    super(message, code, recoverable, context);
  }

  /**
   * An environment variable holds something that does not parse
   */
  static invalidValue(
    variable: string,
    value: string,
    expected: string,
  ): ConfigError {
    return new ConfigError(
      `Invalid value for ${variable}: "${value}" (expected ${expected})`,
      ConfigErrorCode.INVALID_VALUE,
      false,
      { variable, value, expected },
    );
  }

  static outOfRange(
    variable: string,
    value: number,
    min: number,
    max: number,
  ): ConfigError {
    return new ConfigError(
      `${variable} must be between ${min} and ${max}, got ${value}`,
      ConfigErrorCode.OUT_OF_RANGE,
      false,
      { variable, value, min, max },
    );
  }
}
