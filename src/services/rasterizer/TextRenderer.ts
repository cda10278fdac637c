import { Bitmap1Bit } from "@core/types";
import { BitmapUtils } from "@services/canvas/BitmapUtils";
import { renderBitmapText } from "@utils/bitmapFont";
import { formatUtcDateTime } from "@utils/time";
import {
  APP_DISPLAY_NAME,
  TEXT_FONT_SCALE,
  TEXT_LINE_HEIGHT,
  TEXT_MARGIN_LEFT,
  TEXT_MARGIN_TOP,
  TEXT_MAX_LINE_LENGTH,
  TEXT_MAX_LINES,
} from "@core/constants";

const BORDER_INSET = 10;
const BORDER_THICKNESS = 3;

/**
 * Lines that fit on a canvas of `height`, already clipped to the
 * per-line character limit.
 */
export function layoutTextLines(text: string, height: number): string[] {
  const lines: string[] = [];
  let y = TEXT_MARGIN_TOP;

  for (const line of text.split("\n").slice(0, TEXT_MAX_LINES)) {
    if (y + TEXT_LINE_HEIGHT > height - TEXT_MARGIN_TOP) {
      break;
    }
    lines.push([...line].slice(0, TEXT_MAX_LINE_LENGTH).join(""));
    y += TEXT_LINE_HEIGHT;
  }

  return lines;
}

/**
 * Draw left-aligned plain text. Extra lines and characters are dropped.
 */
export function renderPlainText(bitmap: Bitmap1Bit, text: string): number {
  const lines = layoutTextLines(text, bitmap.height);
  lines.forEach((line, index) => {
    renderBitmapText(
      bitmap,
      line,
      TEXT_MARGIN_LEFT,
      TEXT_MARGIN_TOP + index * TEXT_LINE_HEIGHT,
      { scale: TEXT_FONT_SCALE },
    );
  });
  return lines.length;
}

/**
 * Status card shown when there is nothing to render
 */
export function renderDefaultLayout(bitmap: Bitmap1Bit, now: Date = new Date()): void {
  BitmapUtils.strokeRect(
    bitmap,
    BORDER_INSET,
    BORDER_INSET,
    bitmap.width - 2 * BORDER_INSET,
    bitmap.height - 2 * BORDER_INSET,
    BORDER_THICKNESS,
  );

  const rows = [
    APP_DISPLAY_NAME,
    `Generated: ${formatUtcDateTime(now)}`,
    "Status: Server Running",
    "Ready for device connection",
  ];
  rows.forEach((row, index) => {
    renderBitmapText(bitmap, row, TEXT_MARGIN_LEFT, TEXT_MARGIN_TOP + index * 50, {
      scale: TEXT_FONT_SCALE,
    });
  });
}
