/**
 * Update queue
 *
 * The day's refresh times: every future task start and end, the midday panel
 * shift, and periodic fills in the gaps between them. Pure functions over
 * plain arrays; the scheduler owns the queue itself.
 */

import { atMinuteOfDay, startOfDay, type Task } from "@paperday/schedule";
import type { HourWindow } from "./config.js";

const MINUTE_MS = 60 * 1000;

export type UpdateTrigger =
  | "startup"
  | "task_start"
  | "task_end"
  | "panel_shift"
  | "periodic"
  | "day_rollover"
  | "forced";

export interface QueuedUpdate {
  at: Date;
  trigger: UpdateTrigger;
}

export interface UpdateQueueOptions {
  periodicIntervalMinutes: number;
  panelShiftHour: number;
}

export function isTaskTrigger(trigger: UpdateTrigger): boolean {
  return trigger === "task_start" || trigger === "task_end";
}

/**
 * Earlier first; task triggers win ties
 */
export function compareUpdates(a: QueuedUpdate, b: QueuedUpdate): number {
  const diff = a.at.getTime() - b.at.getTime();
  if (diff !== 0) return diff;
  return Number(!isTaskTrigger(a.trigger)) - Number(!isTaskTrigger(b.trigger));
}

/**
 * Periodic updates every `intervalMs` after now and after each event, stopping
 * short of the next event (or of 23:59 after the last one)
 */
function periodicFills(events: number[], now: number, endOfDay: number, intervalMs: number): number[] {
  const fills: number[] = [];
  const fill = (from: number, until: number) => {
    for (let t = from + intervalMs; t < until; t += intervalMs) fills.push(t);
  };

  if (events.length === 0) {
    fill(now, endOfDay);
    return fills;
  }

  fill(now, events[0]);
  for (let i = 0; i < events.length - 1; i++) {
    fill(events[i], events[i + 1]);
  }
  fill(events[events.length - 1], endOfDay);
  return fills;
}

/**
 * Build the remaining updates for `now`'s day, sorted by compareUpdates
 */
export function buildUpdateQueue(tasks: readonly Task[], now: Date, options: UpdateQueueOptions): QueuedUpdate[] {
  const t = now.getTime();
  const queue: QueuedUpdate[] = [];
  const events: number[] = [];

  for (const task of tasks) {
    if (task.start.getTime() > t) {
      queue.push({ at: task.start, trigger: "task_start" });
      events.push(task.start.getTime());
    }
    if (task.end.getTime() > t) {
      queue.push({ at: task.end, trigger: "task_end" });
      events.push(task.end.getTime());
    }
  }

  const panelShift = atMinuteOfDay(now, options.panelShiftHour * 60);
  if (panelShift.getTime() > t) {
    queue.push({ at: panelShift, trigger: "panel_shift" });
  }

  events.sort((a, b) => a - b);
  const endOfDay = atMinuteOfDay(now, 23 * 60 + 59).getTime();
  for (const at of periodicFills(events, t, endOfDay, options.periodicIntervalMinutes * MINUTE_MS)) {
    queue.push({ at: new Date(at), trigger: "periodic" });
  }

  return queue.sort(compareUpdates);
}

export interface NextUpdate {
  next: QueuedUpdate | null;
  /** Everything not chosen, past items dropped */
  remaining: QueuedUpdate[];
}

/**
 * Pick the next update.
 *
 * Past items are dropped. Items earlier than `lastUpdate + minIntervalMs` are
 * moved to that earliest allowed time. The earliest item wins, task triggers
 * first on ties.
 */
export function chooseNextUpdate(
  queue: readonly QueuedUpdate[],
  now: Date,
  lastUpdate: Date | null,
  minIntervalMs: number
): NextUpdate {
  const earliestAllowed = lastUpdate ? lastUpdate.getTime() + minIntervalMs : -Infinity;

  const pending = queue
    .filter((update) => update.at.getTime() > now.getTime())
    .map((update) =>
      update.at.getTime() >= earliestAllowed ? update : { at: new Date(earliestAllowed), trigger: update.trigger }
    )
    .sort(compareUpdates);

  const [next = null, ...remaining] = pending;
  return { next, remaining };
}

/**
 * When to rebuild the queue for the next day: 00:MM tomorrow
 */
export function nextRollover(now: Date, rolloverMinute: number): Date {
  const tomorrow = startOfDay(now);
  tomorrow.setDate(tomorrow.getDate() + 1);
  tomorrow.setMinutes(rolloverMinute);
  return tomorrow;
}

/**
 * Whether `date` falls inside [start, end) hours; windows may wrap past midnight
 */
export function inHourWindow(date: Date, window: HourWindow): boolean {
  const hour = date.getHours();
  if (window.start === window.end) return false;
  if (window.start < window.end) {
    return hour >= window.start && hour < window.end;
  }
  return hour >= window.start || hour < window.end;
}
