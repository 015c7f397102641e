import type { Task } from "@paperday/schedule";

/** 2024-03-05 (a Tuesday) at the given local time */
export const at = (hours: number, minutes = 0, seconds = 0) => new Date(2024, 2, 5, hours, minutes, seconds);

export function makeTask(title: string, start: Date, end: Date, overrides: Partial<Task> = {}): Task {
  return {
    title,
    description: "",
    start,
    end,
    textColor: { r: 0, g: 0, b: 0 },
    borderColor: { r: 0, g: 0, b: 0 },
    fillColor: { r: 255, g: 255, b: 255 },
    hasAlarm: false,
    alarmSound: "default",
    origin: "test",
    source: "routine",
    ...overrides,
  };
}

export const clock = (date: Date) =>
  `${String(date.getHours()).padStart(2, "0")}:${String(date.getMinutes()).padStart(2, "0")}`;
