import { ILatestImageRegister, LatestImageState } from "@core/interfaces";

/**
 * Holds the filename of the most recently pushed screen for this process.
 * Request handlers share one instance; the last write wins.
 */
export class LatestImageRegister implements ILatestImageRegister {
  private filename: string | null = null;

  set(filename: string): void {
    this.filename = filename;
  }

  getState(): LatestImageState {
    return this.filename === null
      ? { state: "no_image_yet" }
      : { state: "has_latest_image", filename: this.filename };
  }
}
