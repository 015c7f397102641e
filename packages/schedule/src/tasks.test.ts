import { describe, it, expect } from "vitest";
import {
  atMinuteOfDay,
  createHybridSchedule,
  dateKey,
  findCurrentTask,
  findNextTask,
  findTasksInRange,
  formatClock,
  formatMinuteOfDay,
  getTimelinePanelRanges,
  hourOfDay,
  parseClock,
} from "./tasks.js";
import type { Task } from "./types.js";

const at = (hour: number, minute = 0) => new Date(2024, 2, 5, hour, minute);

function task(title: string, start: Date, end: Date): Task {
  const color = { r: 0, g: 0, b: 0 };
  return {
    title,
    description: "",
    start,
    end,
    textColor: color,
    borderColor: color,
    fillColor: color,
    hasAlarm: false,
    alarmSound: "default",
    origin: title,
    source: "routine",
  };
}

describe("clock helpers", () => {
  it("parses and formats HH:MM", () => {
    expect(parseClock("7:05")).toBe(425);
    expect(parseClock("23:59")).toBe(1439);
    expect(formatMinuteOfDay(425)).toBe("07:05");
    expect(formatClock(at(14, 3))).toBe("14:03");
  });

  it("rejects malformed clock strings", () => {
    expect(() => parseClock("7")).toThrow('Invalid time "7", expected HH:MM');
    expect(() => parseClock("12:60")).toThrow('Invalid time "12:60", out of range');
  });

  it("builds dates and keys", () => {
    expect(atMinuteOfDay(at(18, 30), 90)).toEqual(at(1, 30));
    expect(dateKey(new Date(2024, 0, 9))).toBe("0109");
    expect(hourOfDay(at(13, 45))).toBe(13.75);
  });
});

describe("task queries", () => {
  const a = task("A", at(8), at(9));
  const b = task("B", at(9, 30), at(10));
  const tasks = [b, a];

  it("finds the current task inclusive of both ends", () => {
    expect(findCurrentTask(tasks, at(8))?.title).toBe("A");
    expect(findCurrentTask(tasks, at(9))?.title).toBe("A");
    expect(findCurrentTask(tasks, at(9, 10))).toBeNull();
    expect(findCurrentTask(tasks, at(9, 30))?.title).toBe("B");
  });

  it("finds the next strictly-future start", () => {
    expect(findNextTask(tasks, at(7))?.title).toBe("A");
    expect(findNextTask(tasks, at(8, 30))?.title).toBe("B");
    expect(findNextTask(tasks, at(9, 30))).toBeNull();
  });

  it("finds tasks overlapping a half-open range", () => {
    expect(findTasksInRange(tasks, at(8, 30), at(9, 30)).map((t) => t.title)).toEqual(["A"]);
    expect(findTasksInRange(tasks, at(9), at(9, 31)).map((t) => t.title)).toEqual(["B"]);
    expect(findTasksInRange(tasks, at(6), at(8))).toEqual([]);
  });
});

describe("createHybridSchedule", () => {
  const focus = task("Focus", at(9), at(12));
  const lunch = task("Lunch", at(12), at(13));
  const walk = task("Walk", at(13), at(14));
  const call = { ...task("Call", at(10), at(11)), source: "calendar" as const };
  const review = { ...task("Review", at(14), at(15)), source: "calendar" as const };

  it("drops routine tasks that overlap a calendar entry", () => {
    const schedule = createHybridSchedule([focus, lunch, walk], [review, call]);

    expect(schedule.map((t) => t.title)).toEqual(["Call", "Lunch", "Walk", "Review"]);
  });

  it("keeps routine tasks that only touch an entry", () => {
    const touching = { ...task("Sync", at(12), at(13)), source: "calendar" as const };

    expect(createHybridSchedule([focus, walk], [touching]).map((t) => t.title)).toEqual(["Focus", "Sync", "Walk"]);
  });

  it("returns the routine in start order when there are no entries", () => {
    expect(createHybridSchedule([walk, focus], [])).toEqual([focus, walk]);
  });
});

describe("getTimelinePanelRanges", () => {
  it("shows the first two daytime panels at night", () => {
    expect(getTimelinePanelRanges(at(3))).toEqual([
      [6, 12],
      [12, 18],
    ]);
  });

  it("shows the current and next panel during the day", () => {
    expect(getTimelinePanelRanges(at(8))).toEqual([
      [6, 12],
      [12, 18],
    ]);
    expect(getTimelinePanelRanges(at(13))).toEqual([
      [12, 18],
      [18, 24],
    ]);
  });

  it("shows the previous and last panel in the evening", () => {
    expect(getTimelinePanelRanges(at(20))).toEqual([
      [12, 18],
      [18, 24],
    ]);
  });

  it("supports other panel sizes", () => {
    expect(getTimelinePanelRanges(at(10), 8)).toEqual([
      [8, 16],
      [16, 24],
    ]);
  });
});
