import { Result } from "@core/types";

/**
 * Process-wide settings changed through the API
 */
export interface IRuntimeSettings {
  /**
   * Refresh rate in seconds reported to polling devices
   */
  getRefreshRate(): number;

  /**
   * Change the refresh rate. Values outside 60..3600 fail with a 400
   * WebError and leave the setting unchanged.
   * @returns Result containing the stored value
   */
  setRefreshRate(seconds: number): Result<number>;
}
