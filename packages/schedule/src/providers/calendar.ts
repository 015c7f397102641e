/**
 * Calendar provider
 *
 * Fetches each configured feed, keeps the entries that start on the requested
 * day and turns them into tasks that take priority over the routine. Feeds are
 * iCal documents, or TickTick project task lists for `ticktick` sources.
 */

import ical, { type CalendarComponent, type VEvent } from "node-ical";
import { mixColors, PANEL_COLORS, ProviderFetchError, type RGB } from "@paperday/core";
import type { Task } from "../types.js";
import type { DataProvider } from "./provider.js";

export const CALENDAR_TIMEOUT_MS = 10_000;

export const TICKTICK_BASE_URL = "https://api.ticktick.com/open/v1";

const HOUR_MS = 60 * 60 * 1000;
const MINUTE_MS = 60 * 1000;
const DEFAULT_TICKTICK_MINUTES = 30;

export interface SourceColors {
  text?: RGB;
  border?: RGB;
  fill?: RGB;
}

export type CalendarAuth =
  | { type: "basic"; username: string; password: string }
  | { type: "bearer"; token: string };

export interface SubCalendar {
  id: string;
  name?: string;
  enabled?: boolean;
  colors?: SourceColors;
}

export interface CalendarSource {
  name: string;
  /** How sub-calendar URLs are built from their ids and how feeds are read */
  type: "ical" | "google" | "outlook" | "ticktick";
  enabled?: boolean;
  /** Single feed; used when no sub-calendars (TickTick projects) are listed */
  url?: string;
  baseUrl?: string;
  calendars?: SubCalendar[];
  auth?: CalendarAuth;
  colors?: SourceColors;
}

interface Feed {
  url: string;
  format: "ics" | "ticktick";
  label: string;
  colors: Required<SourceColors>;
}

const DEFAULT_SOURCE_COLORS: Required<SourceColors> = {
  text: PANEL_COLORS.black,
  border: mixColors({ b: 3, g: 3, w: 10 }),
  fill: mixColors({ b: 3, g: 3, w: 20 }),
};

/**
 * Feed URL for a sub-calendar id
 */
export function buildCalendarUrl(source: CalendarSource, calendarId: string): string {
  const base = (source.baseUrl ?? "").replace(/\/+$/, "");
  switch (source.type) {
    case "google":
      return `https://calendar.google.com/calendar/ical/${encodeURIComponent(calendarId)}/public/basic.ics`;
    case "outlook":
      return `${base}/${calendarId}/calendar.ics`;
    case "ical":
      return `${base}/${calendarId}`;
    case "ticktick":
      return `${base || TICKTICK_BASE_URL}/project/${encodeURIComponent(calendarId)}/tasks`;
  }
}

export function authorizationHeader(auth: CalendarAuth | undefined): string | undefined {
  if (!auth) return undefined;
  if (auth.type === "basic") {
    return `Basic ${Buffer.from(`${auth.username}:${auth.password}`).toString("base64")}`;
  }
  return `Bearer ${auth.token}`;
}

function listFeeds(source: CalendarSource): Feed[] {
  const sourceColors = { ...DEFAULT_SOURCE_COLORS, ...source.colors };
  const format = source.type === "ticktick" ? "ticktick" : "ics";

  if (source.calendars && source.calendars.length > 0) {
    return source.calendars
      .filter((calendar) => calendar.enabled !== false)
      .map((calendar) => ({
        url: buildCalendarUrl(source, calendar.id),
        format,
        label: `${source.name}/${calendar.name ?? calendar.id}`,
        colors: { ...sourceColors, ...calendar.colors },
      }));
  }

  if (!source.url) return [];
  return [{ url: source.url, format, label: source.name, colors: sourceColors }];
}

function isEvent(component: CalendarComponent): component is VEvent {
  return component.type === "VEVENT";
}

/** Property values come back as plain strings or as `{ params, val }` */
function textOf(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "object" && value !== null && "val" in value) {
    return String(value.val);
  }
  return "";
}

function sameLocalDay(a: Date, b: Date): boolean {
  return (
    a.getFullYear() === b.getFullYear() && a.getMonth() === b.getMonth() && a.getDate() === b.getDate()
  );
}

/**
 * Events in an .ics document that start on `date`, as calendar tasks.
 * A missing end is one hour after the start.
 */
export function parseCalendarEvents(
  icsText: string,
  date: Date,
  label: string,
  colors: Required<SourceColors> = DEFAULT_SOURCE_COLORS
): Task[] {
  const tasks: Task[] = [];

  for (const component of Object.values(ical.sync.parseICS(icsText))) {
    if (!component || !isEvent(component)) continue;

    const start: unknown = component.start;
    if (!(start instanceof Date) || Number.isNaN(start.getTime())) continue;
    if (!sameLocalDay(start, date)) continue;

    const rawEnd: unknown = component.end;
    const end =
      rawEnd instanceof Date && rawEnd.getTime() > start.getTime()
        ? new Date(rawEnd.getTime())
        : new Date(start.getTime() + HOUR_MS);

    tasks.push({
      title: textOf(component.summary) || "Untitled",
      description: textOf(component.description),
      start: new Date(start.getTime()),
      end,
      textColor: colors.text,
      borderColor: colors.border,
      fillColor: colors.fill,
      hasAlarm: false,
      alarmSound: "default",
      origin: label,
      source: "calendar",
    });
  }

  return tasks.sort((a, b) => a.start.getTime() - b.start.getTime());
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** TickTick writes offsets as `+0000` */
function parseDueDate(value: string): Date {
  return new Date(value.replace(/([+-]\d{2})(\d{2})$/, "$1:$2"));
}

/**
 * TickTick project tasks due on `date`, as calendar tasks.
 * `duration` is in minutes and defaults to 30; tasks without a due date are skipped.
 */
export function parseTickTickTasks(
  data: unknown,
  date: Date,
  label: string,
  colors: Required<SourceColors> = DEFAULT_SOURCE_COLORS
): Task[] {
  if (!Array.isArray(data)) {
    throw new Error("TickTick response is not a task list");
  }

  const tasks: Task[] = [];
  for (const item of data) {
    if (!isRecord(item) || typeof item.dueDate !== "string" || !item.dueDate) continue;

    const start = parseDueDate(item.dueDate);
    if (Number.isNaN(start.getTime()) || !sameLocalDay(start, date)) continue;

    const minutes =
      typeof item.duration === "number" && item.duration > 0 ? item.duration : DEFAULT_TICKTICK_MINUTES;

    tasks.push({
      title: (typeof item.title === "string" && item.title) || "Untitled",
      description: typeof item.content === "string" ? item.content : "",
      start,
      end: new Date(start.getTime() + minutes * MINUTE_MS),
      textColor: colors.text,
      borderColor: colors.border,
      fillColor: colors.fill,
      hasAlarm: false,
      alarmSound: "default",
      origin: label,
      source: "calendar",
    });
  }

  return tasks.sort((a, b) => a.start.getTime() - b.start.getTime());
}

export class CalendarProvider implements DataProvider<Task[]> {
  readonly name = "calendar";

  constructor(
    private readonly sources: CalendarSource[],
    private readonly timeoutMs = CALENDAR_TIMEOUT_MS
  ) {}

  /**
   * Failed feeds are logged and skipped; the fetch only fails when every feed did
   */
  async fetch(date: Date): Promise<Task[]> {
    const tasks: Task[] = [];
    let attempted = 0;
    let failed = 0;
    let lastError: unknown;

    for (const source of this.sources) {
      if (source.enabled === false) continue;
      const authorization = authorizationHeader(source.auth);

      for (const feed of listFeeds(source)) {
        attempted++;
        try {
          const text = await this.fetchFeed(feed.url, authorization);
          tasks.push(
            ...(feed.format === "ticktick"
              ? parseTickTickTasks(JSON.parse(text), date, feed.label, feed.colors)
              : parseCalendarEvents(text, date, feed.label, feed.colors))
          );
        } catch (error) {
          failed++;
          lastError = error;
          console.warn(`[calendar] Error fetching ${feed.label}:`, error);
        }
      }
    }

    if (attempted > 0 && failed === attempted) {
      throw new ProviderFetchError(this.name, `all ${attempted} feed(s) failed`, { cause: lastError });
    }

    return tasks.sort((a, b) => a.start.getTime() - b.start.getTime());
  }

  private async fetchFeed(url: string, authorization: string | undefined): Promise<string> {
    const headers: Record<string, string> = {};
    if (authorization) headers.Authorization = authorization;

    const response = await fetch(url, {
      headers,
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`HTTP ${response.status} ${response.statusText}`);
    }

    return response.text();
  }
}
