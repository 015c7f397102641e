/**
 * Schedule domain types
 */

import type { RGB } from "@paperday/core";

/** Alarm sounds shipped with the daemon (resources/sound/<name>.wav) */
export type AlarmSound =
  | "default"
  | "173"
  | "A"
  | "US"
  | "uprising"
  | "calm"
  | "sneaky"
  | "humor"
  | "EWMF"
  | "beep";

/** Shared styling for a family of tasks */
export interface Tag {
  name: string;
  textColor: RGB;
  borderColor: RGB;
  fillColor: RGB;
  hasAlarm: boolean;
  alarmSound: AlarmSound;
}

/** Reusable presentation rule for a task type; immutable once loaded */
export interface TaskTemplate {
  readonly id: string;
  readonly title: string;
  readonly durationMinutes: number;
  readonly description: string;
  readonly tag: string;
  readonly textColor: RGB;
  readonly borderColor: RGB;
  readonly fillColor: RGB;
  readonly hasAlarm: boolean;
  readonly alarmSound: AlarmSound;
}

/** Minutes since midnight */
export type MinuteOfDay = number;

/** One user-authored line of a routine */
export interface TaskEntry {
  templateId: string;
  start: MinuteOfDay;
  /** Overrides the template's default duration */
  durationMinutes?: number;
  /** Overrides the template's title */
  title?: string;
}

/** A named timetable of entries */
export interface Routine {
  name: string;
  entries: TaskEntry[];
}

/** A task resolved onto a concrete date */
export interface Task {
  title: string;
  description: string;
  start: Date;
  end: Date;
  textColor: RGB;
  borderColor: RGB;
  fillColor: RGB;
  hasAlarm: boolean;
  alarmSound: AlarmSound;
  /** Template that produced this task, or the calendar source name */
  origin: string;
  source: "routine" | "calendar";
}

/** Inclusive-exclusive hour range shown by a timeline panel, e.g. [6, 12] */
export type HourRange = readonly [start: number, end: number];
