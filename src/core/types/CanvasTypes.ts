/**
 * 2D point in canvas pixel coordinates
 */
export type Point2D = {
  x: number;
  y: number;
};

/**
 * 1-bit bitmap for e-ink panels
 */
export type Bitmap1Bit = {
  /** Width in pixels */
  width: number;

  /** Height in pixels */
  height: number;

  /** Raw bitmap data (1 bit per pixel, packed MSB first, 1 = white) */
  data: Uint8Array;

  /** Optional metadata about the bitmap */
  metadata?: {
    /** Creation timestamp */
    createdAt: Date;

    /** Description of what's displayed */
    description?: string;
  };
};

/**
 * 24-bit RGB image, 3 bytes per pixel, row-major
 */
export type RgbImage = {
  width: number;
  height: number;
  data: Uint8Array;
};

export type RgbColor = readonly [r: number, g: number, b: number];

export const WHITE: RgbColor = [255, 255, 255];
export const BLACK: RgbColor = [0, 0, 0];

/**
 * A canvas being composed before persistence. Starts two-tone, is promoted
 * to RGB for the watermark, and is quantized back to 1-bit on encode.
 */
export type Canvas =
  | { kind: "mono"; bitmap: Bitmap1Bit }
  | { kind: "rgb"; image: RgbImage };

export type RgbCanvas = Extract<Canvas, { kind: "rgb" }>;

/**
 * Content accepted by the rasterizer. Exactly one kind is active.
 */
export type ContentPayload =
  | { kind: "text"; text: string }
  | { kind: "html"; raw: string }
  | { kind: "data_uri"; raw: string }
  | { kind: "big_text"; raw: string; subtitle?: string };

/**
 * A PNG written to the image directory
 */
export type RenderedArtifact = {
  /** File name without the .png extension */
  filename: string;

  /** Path of the written file */
  path: string;
};
