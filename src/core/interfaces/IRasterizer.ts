import { Canvas, ContentPayload, Result } from "@core/types";

/**
 * Rasterizer Interface
 *
 * Turns a content payload into a canvas of exactly width x height.
 * Plain text, HTML and big text always succeed; a data URI fails with a
 * RenderError when it does not decode to an image.
 */
export interface IRasterizer {
  /**
   * Render a payload
   * @param payload Content to draw
   * @param width Canvas width in pixels
   * @param height Canvas height in pixels
   * @returns Result containing the canvas or a RenderError
   */
  render(
    payload: ContentPayload,
    width: number,
    height: number,
  ): Promise<Result<Canvas>>;
}
