/**
 * Wires a validated config into a running Scheduler
 */

import { readFileSync } from "fs";
import {
  BlurbProvider,
  CachedProvider,
  CalendarProvider,
  createSchedule,
  loadRoutineBook,
  loadTemplateRegistry,
  LunarProvider,
  type DataProvider,
  type LunarDay,
  type RoutineBook,
  type TemplateRegistry,
} from "@paperday/schedule";
import { SystemAlarmPlayer } from "./alarm.js";
import type { DaemonConfig, DeviceConfig, Secrets } from "./config.js";
import { FilePanelDevice, HttpPanelDevice, type PanelDevice } from "./devices.js";
import { DisplayAdapter } from "./display.js";
import { Scheduler, type SchedulerProviders } from "./scheduler.js";
import { Uploader } from "./uploader.js";

const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * MINUTE_MS;

export interface ScheduleFiles {
  registry: TemplateRegistry;
  routines: RoutineBook;
}

/** Adjustments used by the one-shot CLI commands */
export interface AppOverrides {
  now?: () => Date;
  /** Replaces the configured panel device */
  device?: PanelDevice;
  upload?: boolean;
  preview?: boolean;
  alarm?: boolean;
  /** Show the frame even inside silent hours */
  ignoreSilentHours?: boolean;
}

function readJson(path: string, what: string): unknown {
  try {
    return JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new Error(`Cannot read ${what} ${path}: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }
}

export function loadScheduleFiles(config: DaemonConfig): ScheduleFiles {
  const registry = loadTemplateRegistry(readJson(config.templatesPath, "templates"));
  const routines = loadRoutineBook(readJson(config.routinesPath, "routines"), registry);
  return { registry, routines };
}

export function createPanelDevice(device: DeviceConfig): PanelDevice {
  switch (device.type) {
    case "file":
      return new FilePanelDevice(device.path);
    case "http":
      return new HttpPanelDevice(device.url, device.timeoutMs);
  }
}

const disabledBlurb: DataProvider<string | null> = {
  name: "blurb",
  fetch: async () => null,
};

export function createProviders(config: DaemonConfig, secrets: Secrets, files: ScheduleFiles): SchedulerProviders {
  const { registry, routines } = files;

  let blurb = disabledBlurb;
  if (config.providers.blurb.enabled) {
    if (secrets.blurbModelId) {
      const titlesFor = (date: Date) => [
        ...new Set(createSchedule(routines.forDate(date), date, registry).map((task) => task.title)),
      ];
      blurb = new CachedProvider(
        new BlurbProvider({ modelId: secrets.blurbModelId, titlesFor, prompt: config.providers.blurb.prompt }),
        null,
        { ttlMs: DAY_MS }
      );
    } else {
      console.warn("[blurb] PAPERDAY_BLURB_MODEL_ID is not set, blurb disabled");
    }
  }

  return {
    lunar: new CachedProvider<LunarDay | null>(new LunarProvider(), null, { ttlMs: DAY_MS }),
    calendar: new CachedProvider(new CalendarProvider(config.providers.calendar), [], {
      ttlMs: config.providers.calendarRefreshMinutes * MINUTE_MS,
    }),
    blurb,
  };
}

export function createUploader(config: DaemonConfig, secrets: Secrets): Uploader {
  if (!secrets.uploadApiKey) {
    throw new Error("PAPERDAY_UPLOAD_API_KEY is required when upload is enabled");
  }
  const { serverUrl, timeoutMs, maxAttempts, initialDelayMs, maxDelayMs } = config.upload;
  return new Uploader({ serverUrl, apiKey: secrets.uploadApiKey, timeoutMs, maxAttempts, initialDelayMs, maxDelayMs });
}

export function createScheduler(config: DaemonConfig, secrets: Secrets, overrides: AppOverrides = {}): Scheduler {
  const files = loadScheduleFiles(config);
  const device = overrides.device ?? createPanelDevice(config.display.device);
  const { schedule, display } = config;

  return new Scheduler(
    {
      ...files,
      providers: createProviders(config, secrets, files),
      display: new DisplayAdapter(device, { minRefreshIntervalMs: display.minRefreshIntervalMinutes * MINUTE_MS }),
      uploader: config.upload.enabled && overrides.upload !== false ? createUploader(config, secrets) : null,
      preview: overrides.preview === false ? null : new FilePanelDevice(display.previewPath),
      alarm:
        config.alarm.enabled && overrides.alarm !== false
          ? new SystemAlarmPlayer({ soundDir: config.alarm.soundDir })
          : null,
      now: overrides.now,
    },
    {
      minIntervalMinutes: schedule.minIntervalMinutes,
      periodicIntervalMinutes: schedule.periodicIntervalMinutes,
      panelShiftHour: schedule.panelShiftHour,
      rolloverMinute: schedule.rolloverMinute,
      silentHours: overrides.ignoreSilentHours ? { start: 0, end: 0 } : schedule.silentHours,
      uploadIntervalMinutes: config.upload.intervalMinutes,
      render: {
        width: display.width,
        height: display.height,
        sleepHours: schedule.sleepHours,
        panelHours: schedule.panelHours,
      },
    }
  );
}
