/**
 * Daemon configuration
 *
 * Deployment-tunable values come from a JSON file (config/paperday.json by
 * default); every key is optional and falls back to the defaults below.
 * Secrets come from the environment, which the CLI populates from .env.
 */

import { readFileSync } from "fs";
import { resolve } from "path";
import { parseColor, type CalendarAuth, type CalendarSource, type SourceColors, type SubCalendar } from "@paperday/schedule";

export type DeviceConfig = { type: "file"; path: string } | { type: "http"; url: string; timeoutMs: number };

export interface HourWindow {
  /** Inclusive start hour */
  start: number;
  /** Exclusive end hour; may be smaller than start to wrap past midnight */
  end: number;
}

export interface DaemonConfig {
  display: {
    width: number;
    height: number;
    minRefreshIntervalMinutes: number;
    device: DeviceConfig;
    previewPath: string;
  };
  schedule: {
    minIntervalMinutes: number;
    periodicIntervalMinutes: number;
    silentHours: HourWindow;
    panelShiftHour: number;
    rolloverMinute: number;
    sleepHours: HourWindow;
    panelHours: number;
  };
  upload: {
    enabled: boolean;
    serverUrl: string;
    intervalMinutes: number;
    timeoutMs: number;
    maxAttempts: number;
    initialDelayMs: number;
    maxDelayMs: number;
  };
  providers: {
    calendar: CalendarSource[];
    calendarRefreshMinutes: number;
    blurb: { enabled: boolean; prompt?: string };
  };
  alarm: {
    enabled: boolean;
    soundDir: string;
  };
  templatesPath: string;
  routinesPath: string;
}

/** Values read from the environment; never written to the config file */
export interface Secrets {
  uploadApiKey?: string;
  calendarUsername?: string;
  calendarPassword?: string;
  calendarToken?: string;
  blurbModelId?: string;
}

export const DEFAULT_CONFIG_PATH = "config/paperday.json";

export const DEFAULT_CONFIG: DaemonConfig = {
  display: {
    width: 800,
    height: 480,
    minRefreshIntervalMinutes: 3,
    device: { type: "file", path: "output/panel.png" },
    previewPath: "output/schedule_preview.png",
  },
  schedule: {
    minIntervalMinutes: 3,
    periodicIntervalMinutes: 30,
    silentHours: { start: 1, end: 6 },
    panelShiftHour: 12,
    rolloverMinute: 1,
    sleepHours: { start: 0, end: 6 },
    panelHours: 6,
  },
  upload: {
    enabled: false,
    serverUrl: "",
    intervalMinutes: 30,
    timeoutMs: 30_000,
    maxAttempts: 3,
    initialDelayMs: 2_000,
    maxDelayMs: 20_000,
  },
  providers: {
    calendar: [],
    calendarRefreshMinutes: 15,
    blurb: { enabled: false },
  },
  alarm: {
    enabled: true,
    soundDir: "resources/sound",
  },
  templatesPath: "config/templates.json",
  routinesPath: "config/routines.json",
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(json: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = json[key];
  if (value === undefined) return {};
  if (!isRecord(value)) throw new Error(`${key} must be an object`);
  return value;
}

function numberAt(obj: Record<string, unknown>, key: string, path: string, fallback: number, min = 0): number {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== "number" || !Number.isFinite(value) || value < min) {
    throw new Error(`${path}.${key} must be a number >= ${min}`);
  }
  return value;
}

function integerAt(obj: Record<string, unknown>, key: string, path: string, fallback: number, min: number, max: number): number {
  const value = numberAt(obj, key, path, fallback, min);
  if (!Number.isInteger(value) || value > max) {
    throw new Error(`${path}.${key} must be an integer from ${min} to ${max}`);
  }
  return value;
}

/** Panel windows tile the day, so their length must divide 24 */
const PANEL_HOURS = [1, 2, 3, 4, 6, 8, 12];

function panelHoursAt(obj: Record<string, unknown>, key: string, path: string, fallback: number): number {
  const value = numberAt(obj, key, path, fallback, 1);
  if (!PANEL_HOURS.includes(value)) {
    throw new Error(`${path}.${key} must be one of ${PANEL_HOURS.join(", ")}`);
  }
  return value;
}

function stringAt(obj: Record<string, unknown>, key: string, path: string, fallback: string): string {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== "string") throw new Error(`${path}.${key} must be a string`);
  return value;
}

function booleanAt(obj: Record<string, unknown>, key: string, path: string, fallback: boolean): boolean {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== "boolean") throw new Error(`${path}.${key} must be a boolean`);
  return value;
}

function hourWindowAt(obj: Record<string, unknown>, key: string, path: string, fallback: HourWindow): HourWindow {
  const value = obj[key];
  if (value === undefined) return { ...fallback };
  if (!isRecord(value)) throw new Error(`${path}.${key} must be { start, end }`);
  return {
    start: integerAt(value, "start", `${path}.${key}`, fallback.start, 0, 24),
    end: integerAt(value, "end", `${path}.${key}`, fallback.end, 0, 24),
  };
}

function parseDevice(value: unknown): DeviceConfig {
  if (value === undefined) return { ...DEFAULT_CONFIG.display.device };
  if (!isRecord(value)) throw new Error("display.device must be an object");

  if (value.type === "file") {
    return { type: "file", path: stringAt(value, "path", "display.device", "output/panel.png") };
  }
  if (value.type === "http") {
    const url = stringAt(value, "url", "display.device", "");
    if (!url) throw new Error("display.device.url is required for an http device");
    return { type: "http", url, timeoutMs: numberAt(value, "timeoutMs", "display.device", 30_000, 1) };
  }
  throw new Error('display.device.type must be "file" or "http"');
}

function parseSourceColors(value: unknown, path: string): SourceColors | undefined {
  if (value === undefined) return undefined;
  if (!isRecord(value)) throw new Error(`${path} must be an object`);
  const colors: SourceColors = {};
  if (value.text !== undefined) colors.text = parseColor(value.text, `${path}.text`);
  if (value.border !== undefined) colors.border = parseColor(value.border, `${path}.border`);
  if (value.fill !== undefined) colors.fill = parseColor(value.fill, `${path}.fill`);
  return colors;
}

/**
 * `auth` names the scheme; the credentials themselves come from the environment
 */
function parseAuth(value: unknown, path: string, secrets: Secrets): CalendarAuth | undefined {
  if (value === undefined || value === "none") return undefined;
  if (value === "basic") {
    if (!secrets.calendarUsername || !secrets.calendarPassword) {
      throw new Error(`${path} is "basic" but PAPERDAY_CALENDAR_USERNAME or PAPERDAY_CALENDAR_PASSWORD is not set`);
    }
    return { type: "basic", username: secrets.calendarUsername, password: secrets.calendarPassword };
  }
  if (value === "bearer") {
    if (!secrets.calendarToken) {
      throw new Error(`${path} is "bearer" but PAPERDAY_CALENDAR_TOKEN is not set`);
    }
    return { type: "bearer", token: secrets.calendarToken };
  }
  throw new Error(`${path} must be "none", "basic" or "bearer"`);
}

function parseSubCalendar(value: unknown, path: string): SubCalendar {
  if (!isRecord(value)) throw new Error(`${path} must be an object`);
  const id = stringAt(value, "id", path, "");
  if (!id) throw new Error(`${path}.id is required`);
  return {
    id,
    name: value.name === undefined ? undefined : stringAt(value, "name", path, ""),
    enabled: booleanAt(value, "enabled", path, true),
    colors: parseSourceColors(value.colors, `${path}.colors`),
  };
}

function parseCalendarSource(value: unknown, path: string, secrets: Secrets): CalendarSource {
  if (!isRecord(value)) throw new Error(`${path} must be an object`);
  const name = stringAt(value, "name", path, "");
  if (!name) throw new Error(`${path}.name is required`);

  const type = value.type ?? "ical";
  if (type !== "ical" && type !== "google" && type !== "outlook" && type !== "ticktick") {
    throw new Error(`${path}.type must be "ical", "google", "outlook" or "ticktick"`);
  }

  let calendars: SubCalendar[] | undefined;
  if (value.calendars !== undefined) {
    if (!Array.isArray(value.calendars)) throw new Error(`${path}.calendars must be an array`);
    calendars = value.calendars.map((calendar: unknown, i) => parseSubCalendar(calendar, `${path}.calendars[${i}]`));
  }

  const auth = parseAuth(value.auth, `${path}.auth`, secrets);
  if (type === "ticktick" && auth?.type !== "bearer") {
    throw new Error(`${path}.auth must be "bearer" for ticktick sources`);
  }

  return {
    name,
    type,
    enabled: booleanAt(value, "enabled", path, true),
    url: value.url === undefined ? undefined : stringAt(value, "url", path, ""),
    baseUrl: value.baseUrl === undefined ? undefined : stringAt(value, "baseUrl", path, ""),
    calendars,
    auth,
    colors: parseSourceColors(value.colors, `${path}.colors`),
  };
}

/**
 * Validate parsed config JSON and fill in defaults.
 * Relative paths are resolved against `baseDir`.
 */
export function parseConfig(json: unknown, secrets: Secrets = {}, baseDir = process.cwd()): DaemonConfig {
  if (!isRecord(json)) throw new Error("config must be an object");
  const defaults = DEFAULT_CONFIG;

  const display = section(json, "display");
  const schedule = section(json, "schedule");
  const upload = section(json, "upload");
  const providers = section(json, "providers");
  const alarm = section(json, "alarm");
  const blurb = section(providers, "blurb");

  const calendar = providers.calendar ?? [];
  if (!Array.isArray(calendar)) throw new Error("providers.calendar must be an array");

  const device = parseDevice(display.device);

  const config: DaemonConfig = {
    display: {
      width: integerAt(display, "width", "display", defaults.display.width, 1, 10_000),
      height: integerAt(display, "height", "display", defaults.display.height, 1, 10_000),
      minRefreshIntervalMinutes: numberAt(display, "minRefreshIntervalMinutes", "display", defaults.display.minRefreshIntervalMinutes),
      device: device.type === "file" ? { ...device, path: resolve(baseDir, device.path) } : device,
      previewPath: resolve(baseDir, stringAt(display, "previewPath", "display", defaults.display.previewPath)),
    },
    schedule: {
      minIntervalMinutes: numberAt(schedule, "minIntervalMinutes", "schedule", defaults.schedule.minIntervalMinutes),
      periodicIntervalMinutes: numberAt(schedule, "periodicIntervalMinutes", "schedule", defaults.schedule.periodicIntervalMinutes, 1),
      silentHours: hourWindowAt(schedule, "silentHours", "schedule", defaults.schedule.silentHours),
      panelShiftHour: integerAt(schedule, "panelShiftHour", "schedule", defaults.schedule.panelShiftHour, 0, 23),
      rolloverMinute: integerAt(schedule, "rolloverMinute", "schedule", defaults.schedule.rolloverMinute, 0, 59),
      sleepHours: hourWindowAt(schedule, "sleepHours", "schedule", defaults.schedule.sleepHours),
      panelHours: panelHoursAt(schedule, "panelHours", "schedule", defaults.schedule.panelHours),
    },
    upload: {
      enabled: booleanAt(upload, "enabled", "upload", defaults.upload.enabled),
      serverUrl: stringAt(upload, "serverUrl", "upload", defaults.upload.serverUrl),
      intervalMinutes: numberAt(upload, "intervalMinutes", "upload", defaults.upload.intervalMinutes),
      timeoutMs: numberAt(upload, "timeoutMs", "upload", defaults.upload.timeoutMs, 1),
      maxAttempts: integerAt(upload, "maxAttempts", "upload", defaults.upload.maxAttempts, 1, 20),
      initialDelayMs: numberAt(upload, "initialDelayMs", "upload", defaults.upload.initialDelayMs),
      maxDelayMs: numberAt(upload, "maxDelayMs", "upload", defaults.upload.maxDelayMs),
    },
    providers: {
      calendar: calendar.map((source: unknown, i) => parseCalendarSource(source, `providers.calendar[${i}]`, secrets)),
      calendarRefreshMinutes: numberAt(providers, "calendarRefreshMinutes", "providers", defaults.providers.calendarRefreshMinutes),
      blurb: {
        enabled: booleanAt(blurb, "enabled", "providers.blurb", defaults.providers.blurb.enabled),
        prompt: blurb.prompt === undefined ? undefined : stringAt(blurb, "prompt", "providers.blurb", ""),
      },
    },
    alarm: {
      enabled: booleanAt(alarm, "enabled", "alarm", defaults.alarm.enabled),
      soundDir: resolve(baseDir, stringAt(alarm, "soundDir", "alarm", defaults.alarm.soundDir)),
    },
    templatesPath: resolve(baseDir, stringAt(json, "templatesPath", "config", defaults.templatesPath)),
    routinesPath: resolve(baseDir, stringAt(json, "routinesPath", "config", defaults.routinesPath)),
  };

  if (config.upload.enabled && !config.upload.serverUrl) {
    throw new Error("upload.serverUrl is required when upload is enabled");
  }

  return config;
}

export function readSecrets(env: NodeJS.ProcessEnv = process.env): Secrets {
  return {
    uploadApiKey: env.PAPERDAY_UPLOAD_API_KEY || undefined,
    calendarUsername: env.PAPERDAY_CALENDAR_USERNAME || undefined,
    calendarPassword: env.PAPERDAY_CALENDAR_PASSWORD || undefined,
    calendarToken: env.PAPERDAY_CALENDAR_TOKEN || undefined,
    blurbModelId: env.PAPERDAY_BLURB_MODEL_ID || undefined,
  };
}

/**
 * Read and validate a config file; errors name the file
 */
export function loadConfig(path: string, secrets: Secrets = readSecrets(), baseDir = process.cwd()): DaemonConfig {
  let json: unknown;
  try {
    json = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new Error(`Cannot read config ${path}: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }

  try {
    return parseConfig(json, secrets, baseDir);
  } catch (error) {
    throw new Error(`Invalid config ${path}: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }
}
