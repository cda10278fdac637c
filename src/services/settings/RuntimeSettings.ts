import { IRuntimeSettings } from "@core/interfaces";
import { Result, failure, success } from "@core/types";
import { WebError } from "@core/errors";
import {
  REFRESH_RATE_DEFAULT_SECONDS,
  REFRESH_RATE_MAX_SECONDS,
  REFRESH_RATE_MIN_SECONDS,
} from "@core/constants";
import { getLogger } from "@utils/logger";

const logger = getLogger("RuntimeSettings");

/**
 * Settings that can change while the server runs. Not persisted.
 */
export class RuntimeSettings implements IRuntimeSettings {
  private refreshRate: number;

  constructor(defaultRefreshRate: number = REFRESH_RATE_DEFAULT_SECONDS) {
    this.refreshRate = defaultRefreshRate;
  }

  getRefreshRate(): number {
    return this.refreshRate;
  }

  setRefreshRate(seconds: number): Result<number> {
    if (
      !Number.isInteger(seconds) ||
      seconds < REFRESH_RATE_MIN_SECONDS ||
      seconds > REFRESH_RATE_MAX_SECONDS
    ) {
      return failure(
        WebError.invalidParameter(
          "Refresh-Rate",
          seconds,
          `integer between ${REFRESH_RATE_MIN_SECONDS} and ${REFRESH_RATE_MAX_SECONDS} seconds`,
        ),
      );
    }

    logger.info(`Refresh rate changed from ${this.refreshRate}s to ${seconds}s`);
    this.refreshRate = seconds;
    return success(seconds);
  }
}
