/**
 * Rendering inputs
 */

import { createHybridSchedule, type LunarDay, type Task } from "@paperday/schedule";

/** Data fetched by the providers for one cycle */
export interface ProviderSnapshot {
  lunar: LunarDay | null;
  events: Task[];
  blurb: string | null;
  /** Short status note shown in the header, e.g. "OK" or "FORCED" */
  status: string;
}

/** Everything one frame is drawn from; nothing is read from the wall clock */
export interface RenderContext {
  now: Date;
  routineName: string;
  /** The routine resolved for today */
  tasks: Task[];
  snapshot: ProviderSnapshot;
}

/**
 * Routine and calendar merged; calendar events win where they overlap
 */
export function daySchedule(context: RenderContext): Task[] {
  return createHybridSchedule(context.tasks, context.snapshot.events);
}

export interface RenderOptions {
  width: number;
  height: number;
  /** [start, end) hours in which the idle placeholder reads SLEEP */
  sleepHours?: { start: number; end: number };
  panelHours?: number;
}

/**
 * Region boundaries, inclusive
 */
export interface RegionBounds {
  startX: number;
  endX: number;
  startY: number;
  endY: number;
}
