import { layoutBigText, renderBigText } from "../BigTextRenderer";
import { BitmapUtils } from "@services/canvas/BitmapUtils";
import { Bitmap1Bit } from "@core/types";

const countInkInRows = (
  bitmap: Bitmap1Bit,
  top: number,
  bottom: number,
  left: number = 0,
  right: number = bitmap.width,
): number => {
  let count = 0;
  for (let y = top; y < bottom; y++) {
    for (let x = left; x < right; x++) {
      if (BitmapUtils.isInk(bitmap, x, y)) count++;
    }
  }
  return count;
};

describe("BigTextRenderer", () => {
  describe("layoutBigText", () => {
    it("should lay out HELLO WORLD with a subtitle at 800x480", () => {
      const layout = layoutBigText("HELLO WORLD", 800, 480, true);

      expect(layout.cellWidth).toBe(74);
      expect(layout.cellHeight).toBe(253);
      expect(layout.spaceAdvance).toBe(24);
      expect(layout.startX).toBe(18);
      expect(layout.startY).toBe(73);
      expect(layout.subtitleY).toBe(356);
      expect(layout.cells.map((cell) => cell.char).join("")).toBe("HELLOWORLD");
      expect(layout.cells.map((cell) => cell.x)).toEqual([
        18, 92, 166, 240, 314, 412, 486, 560, 634, 708,
      ]);
      expect(layout.cells.every((cell) => cell.width === 66)).toBe(true);
    });

    it("should centre the run horizontally", () => {
      const layout = layoutBigText("HELLO WORLD", 800, 480, true);
      const last = layout.cells[layout.cells.length - 1];

      const leftGap = layout.startX;
      const rightGap = 800 - (last.x + layout.cellWidth);
      expect(Math.abs(leftGap - rightGap)).toBeLessThanOrEqual(1);
    });

    it("should use more height without a subtitle", () => {
      const layout = layoutBigText("HELLO WORLD", 800, 480, false);

      expect(layout.cellHeight).toBe(306);
      expect(layout.startY).toBe(87);
      expect(layout.subtitleY).toBeNull();
    });

    it("should treat empty text as one character", () => {
      const layout = layoutBigText("", 800, 480, false);

      expect(layout.cellWidth).toBe(780);
      expect(layout.startX).toBe(10);
      expect(layout.cells).toEqual([]);
    });
  });

  describe("renderBigText", () => {
    it("should draw one filled block per letter with gaps between them", () => {
      const bitmap = BitmapUtils.createBlankBitmap(800, 480);
      const layout = renderBigText(bitmap, "HELLO WORLD", "SERVER ONLINE");

      expect(layout.cells).toHaveLength(10);
      for (const cell of layout.cells) {
        expect(BitmapUtils.isInk(bitmap, cell.x, cell.y)).toBe(true);
        expect(
          BitmapUtils.isInk(bitmap, cell.x + cell.width - 1, cell.y + cell.height - 1),
        ).toBe(true);
        expect(BitmapUtils.isInk(bitmap, cell.x + cell.width, cell.y)).toBe(false);
      }

      // The word gap is blank
      expect(countInkInRows(bitmap, 73, 326, 380, 412)).toBe(0);
    });

    it("should punch the H cutouts and keep its crossbar", () => {
      const bitmap = BitmapUtils.createBlankBitmap(800, 480);
      renderBigText(bitmap, "H");
      const [cell] = layoutBigText("H", 800, 480, false).cells;

      // Inner box starts floor(width/8) into the cell; the upper cutout
      // spans twelfths 3..9 horizontally
      const margin = Math.floor(cell.width / 8);
      const innerHeight = cell.height - 2 * margin;
      const middleX = cell.x + Math.floor(cell.width / 2);
      const upperY = cell.y + margin + 1;
      const crossbarY = cell.y + margin + Math.floor(innerHeight / 2);

      expect(BitmapUtils.isInk(bitmap, middleX, upperY)).toBe(false);
      expect(BitmapUtils.isInk(bitmap, middleX, crossbarY)).toBe(true);
    });

    it("should round the right side of D with an ink ring", () => {
      const bitmap = BitmapUtils.createBlankBitmap(800, 480);
      renderBigText(bitmap, "D");

      // One 772x306 cell at (10, 87); inner box 580x114 at (106, 183)
      expect(BitmapUtils.isInk(bitmap, 200, 240)).toBe(true); // stem
      expect(BitmapUtils.isInk(bitmap, 680, 240)).toBe(true); // ring
      expect(BitmapUtils.isInk(bitmap, 492, 240)).toBe(false); // bowl
      expect(BitmapUtils.isInk(bitmap, 685, 184)).toBe(false); // outside the curve
    });

    it("should render letters without a pattern as solid blocks", () => {
      const bitmap = BitmapUtils.createBlankBitmap(200, 100);
      const [cell] = renderBigText(bitmap, "Z").cells;

      expect(countInkInRows(bitmap, cell.y, cell.y + cell.height, cell.x, cell.x + cell.width)).toBe(
        cell.width * cell.height,
      );
    });

    it("should centre the subtitle below the blocks", () => {
      const bitmap = BitmapUtils.createBlankBitmap(800, 480);
      renderBigText(bitmap, "HELLO WORLD", "SERVER ONLINE");

      // 13 chars at scale 2 are 154 px wide, starting at x = 323
      expect(countInkInRows(bitmap, 356, 370, 323, 477)).toBeGreaterThan(0);
      expect(countInkInRows(bitmap, 356, 370, 0, 323)).toBe(0);
      expect(countInkInRows(bitmap, 356, 370, 477, 800)).toBe(0);
    });

    it("should not crash on empty text", () => {
      const bitmap = BitmapUtils.createBlankBitmap(800, 480);
      const layout = renderBigText(bitmap, "");

      expect(layout.cells).toEqual([]);
      expect(countInkInRows(bitmap, 0, 480)).toBe(0);
    });
  });
});
