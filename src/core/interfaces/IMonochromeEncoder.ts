import { Canvas, Result } from "@core/types";

/**
 * Monochrome Encoder Interface
 *
 * Quantizes a canvas to a two-colour PNG on disk.
 */
export interface IMonochromeEncoder {
  /** Short name used in logs ("imagemagick", "sharp") */
  readonly name: string;

  /**
   * Write `canvas` as a 1-bit PNG to `outputPath`, replacing any file there.
   * When this resolves successfully a PNG exists at `outputPath`.
   */
  encode(canvas: Canvas, outputPath: string): Promise<Result<void>>;
}
