import { Canvas, RgbCanvas } from "@core/types";

/**
 * Stamps a label into the bottom-right corner of every outgoing image
 */
export interface IWatermarkService {
  /**
   * Promote the canvas to RGB and draw the label box on it.
   * @param label Text to stamp; defaults to the configured label
   */
  watermark(canvas: Canvas, label?: string): RgbCanvas;
}
