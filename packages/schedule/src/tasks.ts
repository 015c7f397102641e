/**
 * Task queries and clock helpers
 */

import type { HourRange, MinuteOfDay, Task } from "./types.js";

const MINUTE_MS = 60 * 1000;

/**
 * Parse "H:MM" / "HH:MM" (24-hour) into minutes since midnight
 */
export function parseClock(text: string): MinuteOfDay {
  const match = text.trim().match(/^(\d{1,2}):(\d{2})$/);
  if (!match) throw new Error(`Invalid time "${text}", expected HH:MM`);

  const hour = parseInt(match[1], 10);
  const minute = parseInt(match[2], 10);
  if (hour > 23 || minute > 59) throw new Error(`Invalid time "${text}", out of range`);

  return hour * 60 + minute;
}

/**
 * Format minutes since midnight as zero-padded "HH:MM"
 */
export function formatMinuteOfDay(minutes: MinuteOfDay): string {
  const h = Math.floor(minutes / 60) % 24;
  const m = minutes % 60;
  return `${String(h).padStart(2, "0")}:${String(m).padStart(2, "0")}`;
}

/**
 * Local "HH:MM" of a date
 */
export function formatClock(date: Date): string {
  return formatMinuteOfDay(date.getHours() * 60 + date.getMinutes());
}

/**
 * Local midnight of the given date
 */
export function startOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

/**
 * The given date's local midnight plus `minutes`
 */
export function atMinuteOfDay(date: Date, minutes: MinuteOfDay): Date {
  const day = startOfDay(date);
  return new Date(day.getFullYear(), day.getMonth(), day.getDate(), 0, minutes);
}

export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * MINUTE_MS);
}

/**
 * Fractional local hour, e.g. 13:45 -> 13.75
 */
export function hourOfDay(date: Date): number {
  return date.getHours() + date.getMinutes() / 60 + date.getSeconds() / 3600;
}

/**
 * "MMDD" key used for date-specific routines
 */
export function dateKey(date: Date): string {
  return `${String(date.getMonth() + 1).padStart(2, "0")}${String(date.getDate()).padStart(2, "0")}`;
}

/**
 * The task active at `at`; both ends inclusive
 */
export function findCurrentTask(tasks: readonly Task[], at: Date): Task | null {
  const t = at.getTime();
  return tasks.find((task) => task.start.getTime() <= t && t <= task.end.getTime()) ?? null;
}

/**
 * The earliest task starting strictly after `at`
 */
export function findNextTask(tasks: readonly Task[], at: Date): Task | null {
  const t = at.getTime();
  let next: Task | null = null;
  for (const task of tasks) {
    if (task.start.getTime() > t && (!next || task.start.getTime() < next.start.getTime())) {
      next = task;
    }
  }
  return next;
}

/**
 * Tasks overlapping the half-open range [from, to)
 */
export function findTasksInRange(tasks: readonly Task[], from: Date, to: Date): Task[] {
  return tasks.filter(
    (task) => !(task.end.getTime() <= from.getTime() || task.start.getTime() >= to.getTime())
  );
}

/**
 * Merge calendar entries over the routine. Entries take priority: routine tasks
 * overlapping any of them are dropped. Result is in start order.
 */
export function createHybridSchedule(routineTasks: readonly Task[], entries: readonly Task[]): Task[] {
  const kept = routineTasks.filter((task) => findTasksInRange(entries, task.start, task.end).length === 0);
  return [...kept, ...entries].sort((a, b) => a.start.getTime() - b.start.getTime());
}

/**
 * Decide which two timeline panels to show.
 *
 * - in the first panel of the day (night), show panels 1 and 2
 * - in the last panel, show the previous and the last
 * - otherwise show the current panel and the next one
 */
export function getTimelinePanelRanges(
  at: Date,
  panelHours = 6,
  totalHours = 24
): [HourRange, HourRange] {
  const panelsPerDay = Math.floor(totalHours / panelHours);
  const currentPanel = Math.floor(at.getHours() / panelHours);

  let leftStart: number;
  let rightStart: number;
  if (panelsPerDay > 2 && currentPanel === 0) {
    leftStart = panelHours;
    rightStart = panelHours * 2;
  } else if (currentPanel >= panelsPerDay - 1) {
    leftStart = (panelsPerDay - 2) * panelHours;
    rightStart = (panelsPerDay - 1) * panelHours;
  } else {
    leftStart = currentPanel * panelHours;
    rightStart = (currentPanel + 1) * panelHours;
  }

  return [
    [leftStart, leftStart + panelHours],
    [rightStart, rightStart + panelHours],
  ];
}
