/**
 * Frame composer - combines every region into a single frame
 *
 * Region renderers run inside safeRender: a region that throws is logged and
 * left blank while the rest of the frame still renders. Only when the frame
 * cannot be produced at all is a RenderError raised.
 */

import { createSolidFrame, RenderError, toRenderedFrame, type RenderedFrame } from "@paperday/core";
import { getTimelinePanelRanges } from "@paperday/schedule";
import { COLORS } from "./colors.js";
import { renderHeaderRegion } from "./header-renderer.js";
import { createLayout } from "./layout.js";
import { renderBlurbRegion, renderNowRegion } from "./now-renderer.js";
import { TimelinePanel } from "./timeline-renderer.js";
import { daySchedule, type RenderContext, type RenderOptions } from "./types.js";

export const DEFAULT_PANEL_HOURS = 6;

/**
 * Safely render a region, catching and logging any errors.
 * Returns true if rendering succeeded, false if it failed.
 */
export function safeRender(regionName: string, renderFn: () => void): boolean {
  try {
    renderFn();
    return true;
  } catch (error) {
    console.error(`[${regionName}] Render failed:`, error);
    return false;
  }
}

/**
 * Render the schedule frame for a context. Deterministic: the same context and
 * options always give the same pixels and fingerprint.
 */
export function renderSchedule(context: RenderContext, options: RenderOptions): RenderedFrame {
  const { width, height } = options;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new RenderError(`Invalid frame size ${width}x${height}`);
  }
  if (Number.isNaN(context.now.getTime())) {
    throw new RenderError("Render context has an invalid time");
  }

  const frame = createSolidFrame(width, height, COLORS.bg);
  const layout = createLayout(width, height);
  const panelHours = options.panelHours ?? DEFAULT_PANEL_HOURS;
  const errors: string[] = [];

  const regions: Array<[string, () => void]> = [
    ["header", () => renderHeaderRegion(frame, context, layout)],
    ["now", () => renderNowRegion(frame, context, layout, { sleepHours: options.sleepHours })],
    ["blurb", () => renderBlurbRegion(frame, context, layout)],
    [
      "timeline",
      () => {
        const tasks = daySchedule(context);
        const ranges = getTimelinePanelRanges(context.now, panelHours);
        ranges.forEach((range, i) => {
          new TimelinePanel(layout.timelines[i], range, layout.textScale).render(frame, tasks, context.now);
        });
      },
    ],
  ];

  for (const [name, render] of regions) {
    if (!safeRender(name, render)) errors.push(name);
  }

  if (errors.length === regions.length) {
    throw new RenderError("Every region failed to render");
  }
  if (errors.length > 0) {
    console.warn(`Frame rendered with ${errors.length} region error(s): ${errors.join(", ")}`);
  }

  return toRenderedFrame(frame);
}
