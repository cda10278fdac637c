import { Bitmap1Bit } from "@core/types";
import { BitmapUtils } from "@services/canvas/BitmapUtils";
import {
  calculateBitmapTextWidth,
  renderBitmapText,
} from "@utils/bitmapFont";
import { TEXT_FONT_SCALE } from "@core/constants";
import { GLYPH_GRID, GlyphShape, glyphShapesFor } from "./BlockGlyphs";

/** Gap between neighbouring blocks */
const CELL_GAP = 8;
/** Horizontal margin split across both sides */
const HORIZONTAL_MARGIN = 20;
/** Height kept free below the blocks with and without a subtitle */
const RESERVED_WITH_SUBTITLE = 100;
const RESERVED_WITHOUT_SUBTITLE = 20;
/** Distance from the bottom of the blocks to the subtitle */
const SUBTITLE_OFFSET = 30;

export type BigTextCell = {
  char: string;
  x: number;
  y: number;
  width: number;
  height: number;
};

export type BigTextLayout = {
  cellWidth: number;
  cellHeight: number;
  spaceAdvance: number;
  startX: number;
  startY: number;
  cells: BigTextCell[];
  subtitleY: number | null;
};

/**
 * Place one block per non-space character, centred horizontally.
 * Spaces advance a third of a cell. Empty text is laid out as if it had
 * one character.
 */
export function layoutBigText(
  text: string,
  width: number,
  height: number,
  hasSubtitle: boolean,
): BigTextLayout {
  const chars = [...text];
  const spaces = chars.filter((c) => c === " ").length;
  const letters = Math.max(1, chars.length - spaces);

  const availableWidth = width - HORIZONTAL_MARGIN;
  const availableHeight =
    height - (hasSubtitle ? RESERVED_WITH_SUBTITLE : RESERVED_WITHOUT_SUBTITLE);

  const cellWidth = Math.floor(availableWidth / (letters + spaces / 2));
  const cellHeight = Math.floor((availableHeight * 2) / 3);
  const spaceAdvance = Math.floor(cellWidth / 3);

  const runWidth = letters * cellWidth + spaces * spaceAdvance;
  const startX = Math.floor((width - runWidth) / 2);
  const startY = Math.floor((availableHeight - cellHeight) / 2) + 10;

  const cells: BigTextCell[] = [];
  let cursor = startX;
  for (const char of chars) {
    if (char === " ") {
      cursor += spaceAdvance;
      continue;
    }
    cells.push({
      char,
      x: cursor,
      y: startY,
      width: Math.max(0, cellWidth - CELL_GAP),
      height: cellHeight,
    });
    cursor += cellWidth;
  }

  return {
    cellWidth,
    cellHeight,
    spaceAdvance,
    startX,
    startY,
    cells,
    subtitleY: hasSubtitle ? startY + cellHeight + SUBTITLE_OFFSET : null,
  };
}

function drawShape(
  bitmap: Bitmap1Bit,
  shape: GlyphShape,
  innerX: number,
  innerY: number,
  innerWidth: number,
  innerHeight: number,
): void {
  const gx = (units: number): number =>
    innerX + Math.floor((innerWidth * units) / GLYPH_GRID);
  const gy = (units: number): number =>
    innerY + Math.floor((innerHeight * units) / GLYPH_GRID);

  switch (shape.kind) {
    case "rect":
      BitmapUtils.fillRect(
        bitmap,
        gx(shape.x0),
        gy(shape.y0),
        gx(shape.x1) - gx(shape.x0),
        gy(shape.y1) - gy(shape.y0),
        shape.ink,
      );
      break;
    case "ellipse":
      BitmapUtils.fillEllipse(
        bitmap,
        gx(shape.x0),
        gy(shape.y0),
        gx(shape.x1),
        gy(shape.y1),
        shape.ink,
      );
      break;
    case "triangle": {
      const [a, b, c] = shape.points.map(([x, y]) => ({ x: gx(x), y: gy(y) }));
      BitmapUtils.fillTriangle(bitmap, a, b, c, shape.ink);
      break;
    }
  }
}

/**
 * Draw a block glyph: a solid cell with the letter's cutouts inside an
 * inner box inset by an eighth of the cell width.
 */
export function drawBlockGlyph(bitmap: Bitmap1Bit, cell: BigTextCell): void {
  BitmapUtils.fillRect(bitmap, cell.x, cell.y, cell.width, cell.height);

  const margin = Math.floor(cell.width / 8);
  const innerWidth = cell.width - 2 * margin;
  const innerHeight = cell.height - 2 * margin;
  if (innerWidth <= 0 || innerHeight <= 0) {
    return;
  }

  for (const shape of glyphShapesFor(cell.char)) {
    drawShape(bitmap, shape, cell.x + margin, cell.y + margin, innerWidth, innerHeight);
  }
}

/**
 * Render big text (and an optional subtitle in the bitmap font) onto a
 * white bitmap.
 */
export function renderBigText(
  bitmap: Bitmap1Bit,
  text: string,
  subtitle?: string,
): BigTextLayout {
  const hasSubtitle = subtitle !== undefined && subtitle.length > 0;
  const layout = layoutBigText(text, bitmap.width, bitmap.height, hasSubtitle);

  for (const cell of layout.cells) {
    drawBlockGlyph(bitmap, cell);
  }

  if (hasSubtitle && layout.subtitleY !== null) {
    const subtitleWidth = calculateBitmapTextWidth(subtitle, TEXT_FONT_SCALE);
    const subtitleX = Math.floor((bitmap.width - subtitleWidth) / 2);
    renderBitmapText(bitmap, subtitle, subtitleX, layout.subtitleY, {
      scale: TEXT_FONT_SCALE,
    });
  }

  return layout;
}
