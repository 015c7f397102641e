/**
 * "Now" block and blurb renderer
 */

import { fillRect, type Frame } from "@paperday/core";
import { findCurrentTask, formatClock, type Task } from "@paperday/schedule";
import { COLORS } from "./colors.js";
import type { Layout } from "./layout.js";
import { centerX, drawText, fitScale, measureText, textHeight, truncateText, wrapText } from "./text.js";
import { daySchedule, type RenderContext, type RenderOptions } from "./types.js";
import { PLACEHOLDER } from "./header-renderer.js";

const MAX_TITLE_SCALE = 5;
const MAX_BLURB_LINES = 3;

export const DEFAULT_SLEEP_HOURS = { start: 0, end: 6 };

/**
 * Title shown when no task is running
 */
export function idleTitle(now: Date, sleepHours = DEFAULT_SLEEP_HOURS): string {
  const hour = now.getHours();
  return hour >= sleepHours.start && hour < sleepHours.end ? "SLEEP" : "FREE TIME";
}

export function findNowTask(context: RenderContext): Task | null {
  return findCurrentTask(daySchedule(context), context.now);
}

export function renderNowRegion(
  frame: Frame,
  context: RenderContext,
  layout: Layout,
  options: Pick<RenderOptions, "sleepHours"> = {}
): void {
  const bounds = layout.now;
  const scale = layout.textScale;
  const maxWidth = bounds.endX - bounds.startX + 1 - 20;

  drawText(frame, "NOW", bounds.startX + 15, bounds.startY + 10, COLORS.secondary, { scale });

  const current = findNowTask(context);
  const rawTitle = current ? current.title : idleTitle(context.now, options.sleepHours);

  // Scale down long titles, then truncate if even the smallest size overflows
  const titleScale = fitScale(rawTitle, maxWidth, Math.max(scale, MAX_TITLE_SCALE), scale);
  const title = truncateText(rawTitle, maxWidth, titleScale);
  const width = measureText(title, titleScale);
  const height = textHeight(titleScale);
  const left = centerX(title, bounds.startX, bounds.endX, titleScale);
  const top = bounds.startY + Math.round(50 * layout.scaleY);

  // Highlighter stroke behind the lower half of the title
  fillRect(frame, left - 4, top + Math.floor(height / 2), left + width + 3, top + height + 3, COLORS.nowHighlight);
  drawText(frame, title, left, top, COLORS.ink, { scale: titleScale });

  if (current) {
    const range = `${formatClock(current.start)}-${formatClock(current.end)}`;
    drawText(
      frame,
      range,
      centerX(range, bounds.startX, bounds.endX, scale),
      top + height + Math.round(14 * layout.scaleY),
      COLORS.secondary,
      { scale }
    );
  }
}

export function renderBlurbRegion(frame: Frame, context: RenderContext, layout: Layout): void {
  const bounds = layout.blurb;
  const scale = layout.textScale;
  const blurb = context.snapshot.blurb;
  const lineHeight = textHeight(scale) + 2 * scale;

  const lines = blurb ? wrapText(blurb, bounds.endX - bounds.startX + 1, scale, MAX_BLURB_LINES) : [PLACEHOLDER];
  lines.forEach((line, i) => {
    drawText(frame, line, bounds.startX, bounds.startY + i * lineHeight, blurb ? COLORS.ink : COLORS.placeholder, {
      scale,
      maxY: bounds.endY,
    });
  });
}
