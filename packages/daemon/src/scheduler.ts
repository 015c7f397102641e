/**
 * Scheduler
 *
 * Timer-driven loop that decides when to refresh. Each cycle builds a render
 * context, renders, shows the frame when it changed (outside silent hours),
 * uploads it, and writes the preview. A stage that fails is logged and the
 * next update is still scheduled. Cycles never overlap.
 */

import { sameFrame, type RenderedFrame } from "@paperday/core";
import { daySchedule, renderSchedule, type RenderContext, type RenderOptions } from "@paperday/rendering";
import {
  createSchedule,
  findCurrentTask,
  startOfDay,
  type DataProvider,
  type LunarDay,
  type Routine,
  type RoutineBook,
  type Task,
  type TemplateRegistry,
} from "@paperday/schedule";
import type { AlarmPlayer } from "./alarm.js";
import type { HourWindow } from "./config.js";
import type { PanelDevice } from "./devices.js";
import {
  buildUpdateQueue,
  chooseNextUpdate,
  inHourWindow,
  nextRollover,
  type QueuedUpdate,
  type UpdateTrigger,
} from "./update-queue.js";

const MINUTE_MS = 60 * 1000;

export type SchedulerState = "idle" | "rendering" | "displaying" | "uploading" | "sleeping";

/** Providers are expected to be wrapped in CachedProvider so fetch never rejects */
export interface SchedulerProviders {
  lunar: DataProvider<LunarDay | null>;
  calendar: DataProvider<Task[]>;
  blurb: DataProvider<string | null>;
}

export interface FrameDisplay {
  show(frame: RenderedFrame["frame"]): Promise<void>;
  dispose(): void;
}

export interface FrameUploader {
  upload(frame: RenderedFrame["frame"], note?: string): Promise<unknown>;
}

export interface SchedulerDeps {
  routines: RoutineBook;
  registry: TemplateRegistry;
  providers: SchedulerProviders;
  display: FrameDisplay;
  uploader?: FrameUploader | null;
  preview?: PanelDevice | null;
  alarm?: AlarmPlayer | null;
  render?: (context: RenderContext, options: RenderOptions) => RenderedFrame;
  now?: () => Date;
}

export interface SchedulerOptions {
  minIntervalMinutes: number;
  periodicIntervalMinutes: number;
  panelShiftHour: number;
  rolloverMinute: number;
  silentHours: HourWindow;
  /** Re-upload an unchanged frame after this long */
  uploadIntervalMinutes: number;
  render: RenderOptions;
}

export interface CycleResult {
  trigger: UpdateTrigger;
  rendered: RenderedFrame | null;
  displayed: boolean;
  uploaded: boolean;
}

function formatTime(date: Date): string {
  return date.toTimeString().slice(0, 8);
}

export class Scheduler {
  private state: SchedulerState = "idle";
  private running = false;
  private dayStart: number | null = null;
  private routine: Routine | null = null;
  private tasks: Task[] = [];
  private queue: QueuedUpdate[] = [];
  private nextUpdate: QueuedUpdate | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private lastUpdate: Date | null = null;
  /** Last frame the panel accepted */
  private lastFrame: RenderedFrame | null = null;
  private lastUpload: { fingerprint: string; at: number } | null = null;
  private statusNote = "";
  private cycle: Promise<unknown> = Promise.resolve();

  private readonly now: () => Date;
  private readonly render: (context: RenderContext, options: RenderOptions) => RenderedFrame;

  constructor(
    private readonly deps: SchedulerDeps,
    private readonly options: SchedulerOptions
  ) {
    this.now = deps.now ?? (() => new Date());
    this.render = deps.render ?? renderSchedule;
  }

  /**
   * Build today's queue, refresh once, and keep refreshing until stop()
   */
  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    this.startDay(this.now());
    await this.runCycle("startup");
  }

  /**
   * One refresh without arming any timer
   */
  async runOnce(): Promise<CycleResult> {
    return this.runCycle("startup");
  }

  /**
   * Refresh now, outside the queue
   */
  async forceRefresh(): Promise<CycleResult> {
    return this.runCycle("forced");
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.nextUpdate = null;
    this.deps.display.dispose();
    this.state = "idle";
    console.log("[scheduler] Stopped");
  }

  getState(): SchedulerState {
    return this.state;
  }

  getNextUpdate(): QueuedUpdate | null {
    return this.nextUpdate;
  }

  getRoutine(): Routine | null {
    return this.routine;
  }

  private runCycle(trigger: UpdateTrigger): Promise<CycleResult> {
    const result = this.cycle.then(() => this.performCycle(trigger));
    // Callers see the rejection; the chain only keeps cycles in order
    this.cycle = result.catch(() => undefined);
    return result;
  }

  private startDay(now: Date): void {
    this.dayStart = startOfDay(now).getTime();
    this.routine = this.deps.routines.forDate(now);
    this.tasks = createSchedule(this.routine, now, this.deps.registry);
    this.queue = buildUpdateQueue(this.tasks, now, this.options);
    console.log(
      `[scheduler] Day ${now.toDateString()}: routine "${this.routine.name}", ${this.queue.length} updates queued`
    );
  }

  private async performCycle(trigger: UpdateTrigger): Promise<CycleResult> {
    const now = this.now();
    if (this.dayStart !== startOfDay(now).getTime()) this.startDay(now);

    console.log(`[scheduler] Update triggered: ${trigger}`);
    const silent = inHourWindow(now, this.options.silentHours);
    const result: CycleResult = { trigger, rendered: null, displayed: false, uploaded: false };

    this.state = "rendering";
    try {
      const context = await this.buildContext(now, trigger, silent);
      if (trigger === "task_start" && !silent) this.ringAlarm(now, daySchedule(context));
      result.rendered = this.render(context, this.options.render);
    } catch (error) {
      console.error("[scheduler] Render failed, keeping the last frame:", error);
    }

    if (result.rendered) {
      result.displayed = await this.display(result.rendered, silent);
    }

    this.lastUpdate = this.now();
    if (this.running) this.scheduleNext();

    if (result.rendered) {
      result.uploaded = await this.upload(result.rendered);
      await this.writePreview(result.rendered);
    }

    this.state = silent || this.nextUpdate?.trigger === "day_rollover" ? "sleeping" : "idle";
    return result;
  }

  private async buildContext(now: Date, trigger: UpdateTrigger, silent: boolean): Promise<RenderContext> {
    const { lunar, calendar, blurb } = this.deps.providers;
    const [lunarDay, events, blurbText] = await Promise.all([lunar.fetch(now), calendar.fetch(now), blurb.fetch(now)]);

    let status = "OK";
    if (trigger === "forced") status = "FORCED";
    else if (silent) status = "SILENT";

    return {
      now,
      routineName: this.routine?.name ?? "",
      tasks: this.tasks,
      snapshot: { lunar: lunarDay, events, blurb: blurbText, status },
    };
  }

  private ringAlarm(now: Date, tasks: readonly Task[]): void {
    const alarm = this.deps.alarm;
    if (!alarm) return;

    // A second later, so a task ending at this instant is not picked instead
    const task = findCurrentTask(tasks, new Date(now.getTime() + 1000));
    if (!task?.hasAlarm) return;

    console.log(`[alarm] Playing ${task.alarmSound} for ${task.title}`);
    try {
      alarm.play(task.alarmSound);
    } catch (error) {
      console.error("[alarm] Playback failed:", error);
    }
  }

  private async display(rendered: RenderedFrame, silent: boolean): Promise<boolean> {
    if (silent) {
      console.log("[scheduler] Silent hours, display skipped");
      return false;
    }
    if (sameFrame(this.lastFrame, rendered)) {
      console.log("[scheduler] Frame unchanged, display skipped");
      return false;
    }

    this.state = "displaying";
    try {
      await this.deps.display.show(rendered.frame);
      this.lastFrame = rendered;
      return true;
    } catch (error) {
      console.error("[display] Write failed:", error);
      return false;
    }
  }

  private async upload(rendered: RenderedFrame): Promise<boolean> {
    const uploader = this.deps.uploader;
    if (!uploader) return false;

    const nowMs = this.now().getTime();
    const due =
      !this.lastUpload ||
      this.lastUpload.fingerprint !== rendered.fingerprint ||
      nowMs - this.lastUpload.at >= this.options.uploadIntervalMinutes * MINUTE_MS;
    if (!due) return false;

    this.state = "uploading";
    try {
      await uploader.upload(rendered.frame, this.statusNote);
      this.lastUpload = { fingerprint: rendered.fingerprint, at: nowMs };
      return true;
    } catch (error) {
      console.error("[upload] Upload failed:", error);
      return false;
    }
  }

  private async writePreview(rendered: RenderedFrame): Promise<void> {
    if (!this.deps.preview) return;
    try {
      await this.deps.preview.show(rendered.frame);
    } catch (error) {
      console.error("[scheduler] Preview write failed:", error);
    }
  }

  private scheduleNext(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
      // Not fired yet; return it to the queue
      if (this.nextUpdate && this.nextUpdate.trigger !== "day_rollover") this.queue.push(this.nextUpdate);
    }

    const now = this.now();
    const { next, remaining } = chooseNextUpdate(
      this.queue,
      now,
      this.lastUpdate,
      this.options.minIntervalMinutes * MINUTE_MS
    );
    this.queue = remaining;

    if (next) {
      const decoupled = inHourWindow(next.at, this.options.silentHours) ? " [decoupled]" : "";
      this.statusNote = `Next update scheduled: ${formatTime(next.at)} (${next.trigger})${decoupled}`;
      this.nextUpdate = next;
    } else {
      const at = nextRollover(now, this.options.rolloverMinute);
      this.statusNote = `No more updates today. Scheduling for tomorrow at ${formatTime(at)}`;
      this.nextUpdate = { at, trigger: "day_rollover" };
    }
    console.log(`[scheduler] ${this.statusNote}`);

    const { trigger } = this.nextUpdate;
    this.timer = setTimeout(() => this.fire(trigger), Math.max(0, this.nextUpdate.at.getTime() - now.getTime()));
  }

  private fire(trigger: UpdateTrigger): void {
    this.timer = null;
    if (!this.running) return;

    this.runCycle(trigger).catch((error: unknown) => {
      console.error("[scheduler] Update failed:", error);
      if (this.running && !this.timer) this.scheduleNext();
    });
  }
}
