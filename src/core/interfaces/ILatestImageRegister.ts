export type LatestImageState =
  | { state: "no_image_yet" }
  | { state: "has_latest_image"; filename: string };

/**
 * Single slot holding the filename of the most recently pushed screen.
 * Starts empty, is overwritten by every push and is never cleared.
 */
export interface ILatestImageRegister {
  set(filename: string): void;
  getState(): LatestImageState;
}
