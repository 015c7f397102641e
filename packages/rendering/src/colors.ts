/**
 * Shared color definitions for the schedule layout
 */

import { mixColors, PANEL_COLORS, type RGB } from "@paperday/core";

export const COLORS = {
  // Background and primary ink
  bg: PANEL_COLORS.white,
  ink: PANEL_COLORS.black,

  // Header
  divider: mixColors({ k: 5, w: 8 }),
  titleRule: PANEL_COLORS.red,
  secondary: mixColors({ k: 5, w: 4 }), // Stamps, hints and other secondary text
  placeholder: mixColors({ k: 3, w: 8 }),

  // "Now" block highlight behind the current task
  nowHighlight: mixColors({ r: 5, w: 20 }),

  // Timeline
  grid: mixColors({ w: 18, k: 5 }),
  tick: mixColors({ w: 4, k: 5 }),
  axis: { r: 127, g: 127, b: 127 } satisfies RGB,
  marker: PANEL_COLORS.red,
  markerOutline: PANEL_COLORS.white,
} as const;
