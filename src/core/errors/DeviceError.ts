import { BaseError } from "./BaseError";

/**
 * Device directory error codes
 */
export enum DeviceErrorCode {
  REGISTRATION_FAILED = "DEVICE_REGISTRATION_FAILED",
  UNKNOWN = "DEVICE_UNKNOWN_ERROR",
}

export class DeviceError extends BaseError {
  constructor(
    message: string,
    code: DeviceErrorCode = DeviceErrorCode.UNKNOWN,
    recoverable: boolean = false,
    context?: Record<string, unknown>,
  ) {
    super(message, code, recoverable, context);
  }

  static registrationFailed(macAddress: string, error: Error): DeviceError {
    return new DeviceError(
      `Failed to register device ${macAddress}: ${error.message}`,
      DeviceErrorCode.REGISTRATION_FAILED,
      true,
      { macAddress, originalError: error.message },
    );
  }
}
