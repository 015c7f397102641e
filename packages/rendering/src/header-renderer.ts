/**
 * Header region renderer
 *
 * Update stamp and routine name, status note, next task, date and lunar date.
 */

import { drawHLine, drawVLine, type Frame } from "@paperday/core";
import { findNextTask, formatClock } from "@paperday/schedule";
import { COLORS } from "./colors.js";
import type { Layout } from "./layout.js";
import { drawText, measureText, textHeight, truncateText } from "./text.js";
import { daySchedule, type RegionBounds, type RenderContext } from "./types.js";

const WEEKDAYS = ["SUN", "MON", "TUE", "WED", "THU", "FRI", "SAT"];

export const PLACEHOLDER = "--";

export function formatHeaderDate(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, "0");
  const d = String(date.getDate()).padStart(2, "0");
  return `${y}-${m}-${d} ${WEEKDAYS[date.getDay()]}`;
}

function regionWidth(bounds: RegionBounds): number {
  return bounds.endX - bounds.startX + 1;
}

/**
 * Draw a hint label on the top row and a value on the bottom row of a header cell
 */
function drawCell(frame: Frame, bounds: RegionBounds, hint: string, value: string, scale: number): void {
  const rowGap = Math.max(2, bounds.endY - bounds.startY + 1 - 2 * textHeight(scale));
  drawText(frame, hint, bounds.startX, bounds.startY, COLORS.secondary, { scale });
  drawText(
    frame,
    truncateText(value, regionWidth(bounds), scale),
    bounds.startX,
    bounds.startY + textHeight(scale) + rowGap,
    COLORS.ink,
    { scale }
  );
}

export function renderHeaderRegion(frame: Frame, context: RenderContext, layout: Layout): void {
  const { header, textScale: scale } = layout;

  drawCell(frame, header.stamp, `UPD ${formatClock(context.now)}`, context.routineName || "UNKNOWN", scale);

  for (const x of header.dividersX) {
    drawVLine(frame, x, header.dividerTop, header.dividerBottom, COLORS.divider, 2);
  }

  drawCell(frame, header.status, "STATUS", context.snapshot.status || PLACEHOLDER, scale);

  const next = findNextTask(daySchedule(context), context.now);
  drawCell(
    frame,
    header.next,
    `NEXT ${next ? formatClock(next.start) : PLACEHOLDER}`,
    next ? next.title : PLACEHOLDER,
    scale
  );

  // Date, right-aligned above the title rule
  const dateScale = scale + 1;
  const dateText = formatHeaderDate(context.now);
  drawText(
    frame,
    dateText,
    header.date.endX - measureText(dateText, dateScale) + 1,
    header.date.endY - textHeight(dateScale) + 1,
    COLORS.ink,
    { scale: dateScale }
  );
  drawHLine(frame, header.date.startX, header.lunar.endX, header.ruleY, COLORS.titleRule, 3);

  const lunar = context.snapshot.lunar;
  const lunarText = lunar ? lunar.label : PLACEHOLDER;
  drawText(
    frame,
    lunarText,
    header.lunar.endX - measureText(lunarText, scale) + 1,
    header.lunar.startY,
    lunar ? COLORS.secondary : COLORS.placeholder,
    { scale }
  );
}
