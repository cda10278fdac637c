import { DeviceRecord, RenderedArtifact, Result, ScreenRequest } from "@core/types";

/**
 * Screen Service Interface
 *
 * Runs the render, watermark, encode and publish pipeline and builds the
 * canned screens the device endpoints answer with.
 */
export interface IScreenService {
  /**
   * Render a pushed screen, store it, publish it as the latest image and
   * record it in the device directory.
   */
  createScreen(request: ScreenRequest): Promise<Result<RenderedArtifact>>;

  /**
   * "HELLO WORLD" big text with the server clock as subtitle.
   * Not published.
   */
  createHelloWorld(width: number, height: number): Promise<Result<RenderedArtifact>>;

  /**
   * Welcome text shown after device setup. Not published.
   */
  createWelcome(friendlyId: string): Promise<Result<RenderedArtifact>>;

  /**
   * Text summary of a device and the server. Not published.
   * @param device Stored record, or null for an unknown device
   */
  createStatusSnapshot(
    macAddress: string,
    device: DeviceRecord | null,
  ): Promise<Result<RenderedArtifact>>;

  /**
   * The image a polling device should show: the latest pushed screen, or
   * a fresh hello-world screen when nothing was pushed yet.
   */
  resolveDisplayImage(width: number, height: number): Promise<Result<RenderedArtifact>>;
}
