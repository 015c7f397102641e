import type { Task } from "@paperday/schedule";
import type { ProviderSnapshot, RenderContext } from "../types.js";

export const TASK_FILL = { r: 10, g: 20, b: 30 };
export const TASK_BORDER = { r: 200, g: 0, b: 100 };

export function makeTask(title: string, start: Date, end: Date, overrides: Partial<Task> = {}): Task {
  return {
    title,
    description: "",
    start,
    end,
    textColor: { r: 0, g: 0, b: 0 },
    borderColor: TASK_BORDER,
    fillColor: TASK_FILL,
    hasAlarm: false,
    alarmSound: "default",
    origin: "test",
    source: "routine",
    ...overrides,
  };
}

export function emptySnapshot(overrides: Partial<ProviderSnapshot> = {}): ProviderSnapshot {
  return { lunar: null, events: [], blurb: null, status: "OK", ...overrides };
}

export function makeContext(now: Date, tasks: Task[] = [], snapshot = emptySnapshot()): RenderContext {
  return { now, routineName: "workday", tasks, snapshot };
}
