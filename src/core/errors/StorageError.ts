import { BaseError } from "./BaseError";

/**
 * Storage error codes (image files and the device database)
 */
export enum StorageErrorCode {
  INVALID_FILENAME = "STORAGE_INVALID_FILENAME",
  DIRECTORY_CREATE_FAILED = "STORAGE_DIRECTORY_CREATE_FAILED",
  DATABASE_ERROR = "STORAGE_DATABASE_ERROR",
  UNKNOWN = "STORAGE_UNKNOWN_ERROR",
}

export class StorageError extends BaseError {
  constructor(
    message: string,
    code: StorageErrorCode = StorageErrorCode.UNKNOWN,
    recoverable: boolean = false,
    context?: Record<string, unknown>,
  ) {
    super(message, code, recoverable, context);
  }

  static invalidFilename(filename: string): StorageError {
    return new StorageError(
      `Invalid filename: ${filename}`,
      StorageErrorCode.INVALID_FILENAME,
      false,
      { filename },
    );
  }

  static directoryCreateFailed(directory: string, error: Error): StorageError {
    return new StorageError(
      `Failed to create directory ${directory}: ${error.message}`,
      StorageErrorCode.DIRECTORY_CREATE_FAILED,
      false,
      { directory, originalError: error.message },
    );
  }

  static databaseError(operation: string, error: Error): StorageError {
    return new StorageError(
      `Database ${operation} failed: ${error.message}`,
      StorageErrorCode.DATABASE_ERROR,
      true,
      { operation, originalError: error.message },
    );
  }
}
