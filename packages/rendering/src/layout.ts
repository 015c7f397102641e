/**
 * Frame layout
 *
 * Coordinates are laid out for an 800x480 panel and scaled to the configured
 * size. Header across the top, the "now" block and blurb on the left, two
 * vertical timeline panels on the right.
 *
 * ┌──────────┬───────────┬───────────────┬──────────────────────────┐
 * │ UPD 8:03 │ STATUS    │ NEXT 09:00 .. │           2024-03-05 TUE │
 * │ WORKDAY  │ OK        │ FOCUS         │ ──────────────────────── │
 * ├──────────┴───────────┴┬──────────────┴─────┬───── LUNAR 1/25 ───┤
 * │  NOW                  │ 6 ┃ ▭▭▭            │ 12 ┃               │
 * │     FOCUS             │   ┃                │    ┃ ▭▭▭           │
 * │  blurb ...            │ 9 ┃    ▭▭▭         │ 15 ┃               │
 * └───────────────────────┴────────────────────┴────────────────────┘
 */

import type { RegionBounds } from "./types.js";

export const BASE_WIDTH = 800;
export const BASE_HEIGHT = 480;

export interface TimelineCoords {
  /** x of the bold time axis */
  axisX: number;
  axisTop: number;
  axisBottom: number;
  /** Task grid; its top and bottom rows map to the panel's first and last hour */
  grid: RegionBounds;
}

export interface Layout {
  width: number;
  height: number;
  scaleX: number;
  scaleY: number;
  /** Text scale for small labels */
  textScale: number;
  header: {
    stamp: RegionBounds;
    status: RegionBounds;
    next: RegionBounds;
    date: RegionBounds;
    lunar: RegionBounds;
    dividersX: [number, number];
    dividerTop: number;
    dividerBottom: number;
    ruleY: number;
  };
  now: RegionBounds;
  blurb: RegionBounds;
  timelines: [TimelineCoords, TimelineCoords];
}

function region(
  startX: number,
  startY: number,
  endX: number,
  endY: number,
  sx: number,
  sy: number
): RegionBounds {
  return {
    startX: Math.round(startX * sx),
    endX: Math.round(endX * sx),
    startY: Math.round(startY * sy),
    endY: Math.round(endY * sy),
  };
}

function timeline(axisX: number, gridRight: number, sx: number, sy: number): TimelineCoords {
  return {
    axisX: Math.round(axisX * sx),
    axisTop: Math.round(86 * sy),
    axisBottom: Math.round(468 * sy),
    grid: region(axisX, 92, gridRight, 464, sx, sy),
  };
}

export function createLayout(width = BASE_WIDTH, height = BASE_HEIGHT): Layout {
  const sx = width / BASE_WIDTH;
  const sy = height / BASE_HEIGHT;

  return {
    width,
    height,
    scaleX: sx,
    scaleY: sy,
    textScale: Math.max(1, Math.round(2 * Math.min(sx, sy))),
    header: {
      stamp: region(10, 10, 134, 52, sx, sy),
      status: region(146, 10, 296, 52, sx, sy),
      next: region(308, 10, 476, 52, sx, sy),
      date: region(482, 8, 792, 44, sx, sy),
      lunar: region(482, 56, 782, 74, sx, sy),
      dividersX: [Math.round(139 * sx), Math.round(301 * sx)],
      dividerTop: Math.round(10 * sy),
      dividerBottom: Math.round(52 * sy),
      ruleY: Math.round(48 * sy),
    },
    now: region(10, 90, 300, 220, sx, sy),
    blurb: region(20, 236, 295, 330, sx, sy),
    timelines: [timeline(315, 538, sx, sy), timeline(558, 782, sx, sy)],
  };
}
