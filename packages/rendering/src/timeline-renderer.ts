/**
 * Timeline panel renderer
 *
 * One vertical panel covering an hour range: quarter-hour grid, hour ticks and
 * labels, the time axis, task boxes laid out in lanes, start dots and the
 * current-time marker.
 */

import {
  drawHLine,
  drawVLine,
  fillCircle,
  fillTriangle,
  type Frame,
  type RGB,
} from "@paperday/core";
import { formatClock, startOfDay, type HourRange, type Task } from "@paperday/schedule";
import { COLORS } from "./colors.js";
import type { TimelineCoords } from "./layout.js";
import { drawRoundedBox } from "./shapes.js";
import { centerX, drawText, measureText, textHeight, truncateText, wrapText } from "./text.js";

const HOUR_MS = 60 * 60 * 1000;
const BOX_RADIUS = 4;
const MARKER_SIZE = 6;
const DOT_RADIUS = 3;

/** Boxes shorter than this collapse to a line with a caption */
export const LINE_MODE_MAX_HEIGHT = 15;
/** Boxes shorter than this show only a title and, if room, the start time */
export const COMPACT_MODE_MAX_HEIGHT = 40;

export type TaskRenderMode = "line" | "compact" | "full";

export function taskRenderMode(height: number): TaskRenderMode {
  if (height < LINE_MODE_MAX_HEIGHT) return "line";
  if (height < COMPACT_MODE_MAX_HEIGHT) return "compact";
  return "full";
}

export interface HourSpan {
  /** Hours since the start of the rendered day */
  start: number;
  end: number;
}

export interface LaneAssignment {
  lane: number;
  /** Number of lanes shared with the items this one overlaps */
  lanes: number;
}

/**
 * Put overlapping spans side by side.
 *
 * Each span takes the first lane not used by an already placed span it
 * overlaps, and is as wide as 1 / (number of spans it overlaps, itself included).
 */
export function assignLanes<T extends HourSpan>(spans: readonly T[]): Array<T & LaneAssignment> {
  const sorted = [...spans].sort((a, b) => a.start - b.start);
  const placed: Array<{ span: T; lane: number; lanes: number }> = [];

  for (const span of sorted) {
    const overlapping = sorted.filter((other) => !(span.end <= other.start || span.start >= other.end));
    const used = new Set(placed.filter((other) => overlapping.includes(other.span)).map((other) => other.lane));
    let lane = 0;
    while (used.has(lane)) lane++;
    placed.push({ span, lane, lanes: Math.max(1, overlapping.length) });
  }

  return placed.map(({ span, lane, lanes }) => ({ ...span, lane, lanes }));
}

interface PanelTask extends HourSpan {
  task: Task;
  /** Unclamped start, in hours since the start of the day */
  realStart: number;
  /** False for tasks continuing from an earlier panel */
  showsCaption: boolean;
}

export class TimelinePanel {
  private readonly hourStart: number;
  private readonly hourEnd: number;

  constructor(
    private readonly coords: TimelineCoords,
    range: HourRange,
    private readonly textScale = 2
  ) {
    [this.hourStart, this.hourEnd] = range;
  }

  /** y coordinate of an hour (fractional, since the start of the day) */
  hourToY(hour: number): number {
    const { startY, endY } = this.coords.grid;
    return startY + ((hour - this.hourStart) / (this.hourEnd - this.hourStart)) * (endY - startY);
  }

  /**
   * Tasks overlapping the panel, clamped to its hours
   */
  visibleTasks(tasks: readonly Task[], dayStart: Date): PanelTask[] {
    const visible: PanelTask[] = [];
    for (const task of tasks) {
      const start = (task.start.getTime() - dayStart.getTime()) / HOUR_MS;
      const end = (task.end.getTime() - dayStart.getTime()) / HOUR_MS;
      if (end <= this.hourStart || start >= this.hourEnd) continue;

      visible.push({
        task,
        start: Math.max(start, this.hourStart),
        end: Math.min(end, this.hourEnd),
        realStart: start,
        showsCaption: start >= this.hourStart,
      });
    }
    return visible;
  }

  render(frame: Frame, tasks: readonly Task[], now: Date): void {
    const dayStart = startOfDay(now);
    this.drawBackground(frame);
    this.drawTasks(frame, this.visibleTasks(tasks, dayStart));
    this.drawMarker(frame, (now.getTime() - dayStart.getTime()) / HOUR_MS);
  }

  private drawBackground(frame: Frame): void {
    const { grid, axisX, axisTop, axisBottom } = this.coords;
    const hours = this.hourEnd - this.hourStart;

    // Quarter-hour grid
    const rows = hours * 4;
    for (let i = 0; i <= rows; i++) {
      const y = Math.floor(grid.startY + (i * (grid.endY - grid.startY)) / rows);
      drawHLine(frame, grid.startX, grid.endX, y, COLORS.grid, 1);
    }

    // Hour ticks and labels; the closing hour gets neither
    const scale = this.textScale;
    for (let i = 0; i < hours; i++) {
      const y = Math.floor(grid.startY + (i * (grid.endY - grid.startY)) / hours);
      drawHLine(frame, axisX - 4, axisX + 1, y, COLORS.tick, 2);

      const label = String(this.hourStart + i);
      drawText(
        frame,
        label,
        axisX - 6 - measureText(label, scale) + 1,
        y - Math.floor(textHeight(scale) / 2),
        COLORS.ink,
        { scale }
      );
    }

    drawVLine(frame, axisX, axisTop, axisBottom, COLORS.axis, 3);
  }

  private drawTasks(frame: Frame, visible: PanelTask[]): void {
    const { grid, axisX } = this.coords;
    const placed = assignLanes(visible);

    for (const entry of placed) {
      const laneWidth = (grid.endX - grid.startX) / entry.lanes;
      const laneLeft = grid.startX + entry.lane * laneWidth;
      const x1 = Math.round(laneLeft + 2 + 5);
      const x2 = Math.round(laneLeft + laneWidth - 2);
      const y1 = Math.round(this.hourToY(entry.start));
      const y2 = Math.round(this.hourToY(entry.end));
      this.drawTaskBox(frame, entry, x1, y1, x2, y2);
    }

    // Start markers: a rule from the axis across the task, then a dot on the axis
    for (const entry of placed) {
      if (entry.realStart < this.hourStart || entry.realStart > this.hourEnd) continue;
      const laneWidth = (grid.endX - grid.startX) / entry.lanes;
      const x2 = Math.round(grid.startX + entry.lane * laneWidth + laneWidth - 2);
      const y = Math.round(this.hourToY(entry.realStart));
      drawHLine(frame, axisX, x2 - 3, y, entry.task.borderColor, 3);
    }
    for (const entry of placed) {
      if (entry.realStart < this.hourStart || entry.realStart > this.hourEnd) continue;
      const y = Math.round(this.hourToY(entry.realStart));
      fillCircle(frame, axisX, y, DOT_RADIUS + 1, COLORS.bg);
      fillCircle(frame, axisX, y, DOT_RADIUS, entry.task.borderColor);
    }
  }

  private drawTaskBox(frame: Frame, entry: PanelTask, x1: number, y1: number, x2: number, y2: number): void {
    const { task } = entry;
    const scale = this.textScale;
    const th = textHeight(scale);
    const mode = taskRenderMode(y2 - y1);

    if (mode === "line") {
      drawHLine(frame, x1 + 4, x2 - 4, y1, task.borderColor, 3);
      if (entry.showsCaption && x2 - x1 > 16) {
        const title = truncateText(task.title, x2 - x1 - 16, scale);
        drawText(frame, title, x1 + 8, Math.round((y1 + y2) / 2 - th / 2), task.textColor, { scale });
      }
      return;
    }

    drawRoundedBox(frame, x1, y1, x2, y2, BOX_RADIUS, task.fillColor, task.borderColor, 2);
    const innerWidth = x2 - x1 - 8;
    if (!entry.showsCaption || innerWidth <= 0) return;

    if (mode === "compact") {
      const title = truncateText(task.title, innerWidth, scale);
      drawText(frame, title, centerX(title, x1, x2, scale), y1 + 4, task.textColor, { scale, maxY: y2 - 2 });
      if (y2 - y1 >= 2 * th + 12) {
        const start = formatClock(task.start);
        drawText(frame, start, centerX(start, x1, x2, scale), y2 - th - 4, task.textColor, { scale });
      }
      return;
    }

    this.drawFullContent(frame, task, x1, y1, x2, y2, innerWidth);
  }

  /**
   * Title (up to two lines), then time, then description, as space allows; centered
   */
  private drawFullContent(
    frame: Frame,
    task: Task,
    x1: number,
    y1: number,
    x2: number,
    y2: number,
    innerWidth: number
  ): void {
    const scale = this.textScale;
    const lineHeight = textHeight(scale) + 4;
    const lines: Array<{ text: string; color: RGB }> = [];

    for (const line of wrapText(task.title, innerWidth, scale, 2)) {
      lines.push({ text: line, color: task.textColor });
    }

    let remaining = y2 - y1 - lines.length * lineHeight - 8;
    if (remaining >= lineHeight) {
      const start = formatClock(task.start);
      const both = `${start}-${formatClock(task.end)}`;
      if (measureText(both, scale) <= innerWidth) {
        lines.push({ text: both, color: task.textColor });
        remaining -= lineHeight;
      } else if (measureText(start, scale) <= innerWidth) {
        lines.push({ text: start, color: task.textColor });
        remaining -= lineHeight;
      }
    }

    if (remaining >= lineHeight && task.description) {
      const description = truncateText(task.description, innerWidth, scale);
      if (description) lines.push({ text: description, color: COLORS.secondary });
    }

    const top = Math.round((y1 + y2) / 2 - (lines.length * lineHeight) / 2);
    lines.forEach((line, i) => {
      drawText(frame, line.text, centerX(line.text, x1, x2, scale), top + i * lineHeight + 2, line.color, {
        scale,
        minY: y1 + 2,
        maxY: y2 - 2,
      });
    });
  }

  private drawMarker(frame: Frame, nowHour: number): void {
    if (nowHour < this.hourStart || nowHour > this.hourEnd) return;

    const { axisX, grid } = this.coords;
    const y = Math.round(this.hourToY(nowHour));
    const outer = MARKER_SIZE + 1;

    fillTriangle(
      frame,
      { x: axisX, y: y + Math.trunc(outer * 1.73) },
      { x: axisX - outer, y: y - 1 },
      { x: axisX + outer, y: y - 1 },
      COLORS.markerOutline
    );
    fillTriangle(
      frame,
      { x: axisX, y: y + Math.trunc(MARKER_SIZE * 1.73) },
      { x: axisX - MARKER_SIZE, y },
      { x: axisX + MARKER_SIZE, y },
      COLORS.marker
    );
    drawHLine(frame, axisX, grid.endX, y, COLORS.marker, 2);
  }
}

