#!/usr/bin/env tsx
/**
 * Paperday CLI
 */

import { readFileSync } from "fs";
import { config as loadEnv } from "dotenv";
import { program } from "commander";
import { createSchedule, formatClock } from "@paperday/schedule";
import { createScheduler, createUploader, loadScheduleFiles } from "./app.js";
import { DEFAULT_CONFIG_PATH, loadConfig, readSecrets, type DaemonConfig } from "./config.js";
import { FilePanelDevice } from "./devices.js";

loadEnv();

interface ConfigOption {
  config: string;
}

function loadConfigOrExit(path: string): DaemonConfig {
  try {
    return loadConfig(path, readSecrets());
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

function parseDateOrExit(text: string | undefined, what: string): Date {
  if (!text) return new Date();
  const match = text.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  const date = match ? new Date(Number(match[1]), Number(match[2]) - 1, Number(match[3])) : new Date(text);
  if (Number.isNaN(date.getTime())) {
    console.error(`Invalid ${what}: ${text}`);
    process.exit(1);
  }
  return date;
}

function formatDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}-${month}-${day}`;
}

program.name("paperday").description("Daily schedule on an e-paper panel").version("0.1.0");

program
  .command("run", { isDefault: true })
  .description("Keep the panel in sync with today's schedule")
  .option("-c, --config <path>", "config file", DEFAULT_CONFIG_PATH)
  .option("--once", "render, display and upload one frame, then exit")
  .action(async (options: ConfigOption & { once?: boolean }) => {
    const config = loadConfigOrExit(options.config);
    const scheduler = createScheduler(config, readSecrets());

    if (options.once) {
      const result = await scheduler.runOnce();
      scheduler.stop();
      if (!result.rendered) process.exitCode = 1;
      return;
    }

    console.log("Starting paperday...");
    const { device } = config.display;
    console.log(`  Panel: ${device.type === "file" ? device.path : device.url}`);
    console.log(`  Upload: ${config.upload.enabled ? config.upload.serverUrl : "disabled"}`);
    console.log(`  Calendars: ${config.providers.calendar.length}`);
    console.log();

    const shutdown = (signal: string) => {
      console.log(`\n[scheduler] ${signal} received, shutting down`);
      scheduler.stop();
    };
    process.once("SIGINT", () => shutdown("SIGINT"));
    process.once("SIGTERM", () => shutdown("SIGTERM"));
    process.on("SIGUSR2", () => {
      scheduler.forceRefresh().catch((error: unknown) => console.error("[scheduler] Forced refresh failed:", error));
    });

    await scheduler.start();
  });

program
  .command("render")
  .description("Render one frame to a PNG file")
  .requiredOption("-o, --out <path>", "output PNG path")
  .option("--at <time>", "render as of this local time, e.g. 2024-03-05T13:30")
  .option("-c, --config <path>", "config file", DEFAULT_CONFIG_PATH)
  .action(async (options: ConfigOption & { out: string; at?: string }) => {
    const config = loadConfigOrExit(options.config);
    const at = parseDateOrExit(options.at, "time");
    const scheduler = createScheduler(config, readSecrets(), {
      now: options.at ? () => at : undefined,
      device: new FilePanelDevice(options.out),
      upload: false,
      preview: false,
      alarm: false,
      ignoreSilentHours: true,
    });

    const result = await scheduler.runOnce();
    scheduler.stop();
    if (!result.displayed) {
      process.exitCode = 1;
      return;
    }
    console.log(`Wrote ${options.out}`);
  });

program
  .command("upload <png>")
  .description("Upload an existing PNG to the upload server")
  .option("--note <text>", "status note sent with the file")
  .option("-c, --config <path>", "config file", DEFAULT_CONFIG_PATH)
  .action(async (png: string, options: ConfigOption & { note?: string }) => {
    const config = loadConfigOrExit(options.config);
    if (!config.upload.serverUrl) {
      console.error("upload.serverUrl is not set");
      process.exit(1);
    }

    try {
      const uploader = createUploader(config, readSecrets());
      const result = await uploader.uploadPng(readFileSync(png), options.note);
      console.log(`Uploaded ${png} as ${result.file ?? "?"}`);
    } catch (error) {
      console.error("Upload failed:", error instanceof Error ? error.message : error);
      process.exitCode = 1;
    }
  });

program
  .command("routine")
  .description("Print the routine that applies to a date")
  .option("--date <YYYY-MM-DD>", "date to look up (default: today)")
  .option("-c, --config <path>", "config file", DEFAULT_CONFIG_PATH)
  .action((options: ConfigOption & { date?: string }) => {
    const config = loadConfigOrExit(options.config);
    const date = parseDateOrExit(options.date, "date");
    const { registry, routines } = loadScheduleFiles(config);
    const routine = routines.forDate(date);

    console.log(`${formatDate(date)}: ${routine.name}`);
    for (const task of createSchedule(routine, date, registry)) {
      const alarm = task.hasAlarm ? `  [${task.alarmSound}]` : "";
      console.log(`  ${formatClock(task.start)}-${formatClock(task.end)}  ${task.title}${alarm}`);
    }
    const overrides = routines.overrides();
    if (overrides.length > 0) console.log(`Date overrides: ${overrides.join(", ")}`);
  });

program.parseAsync().catch((error: unknown) => {
  console.error("paperday:", error);
  process.exit(1);
});
