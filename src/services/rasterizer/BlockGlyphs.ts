/**
 * Cutout patterns that make big-text blocks read as letters.
 *
 * Each letter is a list of shapes painted in order inside the block's inner
 * box. Coordinates are in twelfths of the inner box, so the same table
 * works at every cell size. `ink: false` punches white into the block,
 * `ink: true` paints black back on top of an earlier cutout.
 */

export type GlyphShape =
  | { kind: "rect"; x0: number; y0: number; x1: number; y1: number; ink: boolean }
  | { kind: "ellipse"; x0: number; y0: number; x1: number; y1: number; ink: boolean }
  | {
      kind: "triangle";
      points: readonly [GridPoint, GridPoint, GridPoint];
      ink: boolean;
    };

export type GridPoint = readonly [x: number, y: number];

export const GLYPH_GRID = 12;

export const BLOCK_GLYPHS: Readonly<Record<string, readonly GlyphShape[]>> = {
  // Two uprights joined by a crossbar
  H: [
    { kind: "rect", x0: 3, y0: 0, x1: 9, y1: 12, ink: false },
    { kind: "rect", x0: 0, y0: 4, x1: 12, y1: 8, ink: true },
  ],
  E: [
    { kind: "rect", x0: 6, y0: 0, x1: 12, y1: 12, ink: false },
    { kind: "rect", x0: 0, y0: 4, x1: 12, y1: 8, ink: true },
  ],
  L: [{ kind: "rect", x0: 4, y0: 0, x1: 12, y1: 8, ink: false }],
  O: [{ kind: "ellipse", x0: 3, y0: 3, x1: 9, y1: 9, ink: false }],
  W: [
    {
      kind: "triangle",
      points: [
        [3, 0],
        [6, 6],
        [9, 0],
      ],
      ink: false,
    },
  ],
  R: [
    { kind: "rect", x0: 6, y0: 0, x1: 12, y1: 6, ink: false },
    { kind: "rect", x0: 4, y0: 3, x1: 12, y1: 9, ink: false },
  ],
  // Square right half cleared, then a rounded bowl: ink ring, white inside
  D: [
    { kind: "rect", x0: 8, y0: 0, x1: 12, y1: 12, ink: false },
    { kind: "ellipse", x0: 4, y0: 0, x1: 12, y1: 12, ink: true },
    { kind: "ellipse", x0: 4.5, y0: 0.5, x1: 11.5, y1: 11.5, ink: false },
  ],
};

/**
 * Cutouts for `char`; an empty list means a solid block
 */
export function glyphShapesFor(char: string): readonly GlyphShape[] {
  return BLOCK_GLYPHS[char.toUpperCase()] ?? [];
}
