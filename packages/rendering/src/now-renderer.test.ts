import { describe, it, expect } from "vitest";
import { findNowTask, idleTitle } from "./now-renderer.js";
import { emptySnapshot, makeContext, makeTask } from "./__tests__/fixtures.js";

const at = (hours: number, minutes = 0) => new Date(2024, 2, 5, hours, minutes);

describe("idleTitle", () => {
  it("reads SLEEP inside the sleep hours", () => {
    expect(idleTitle(at(0))).toBe("SLEEP");
    expect(idleTitle(at(5, 59))).toBe("SLEEP");
  });

  it("reads FREE TIME outside them", () => {
    expect(idleTitle(at(6))).toBe("FREE TIME");
    expect(idleTitle(at(23))).toBe("FREE TIME");
  });

  it("accepts custom sleep hours", () => {
    expect(idleTitle(at(23), { start: 22, end: 24 })).toBe("SLEEP");
  });
});

describe("findNowTask", () => {
  it("prefers calendar events over overlapping routine tasks", () => {
    const task = makeTask("Focus", at(9), at(12));
    const event = makeTask("Call", at(10), at(11), { source: "calendar" });
    const context = makeContext(at(10, 30), [task], emptySnapshot({ events: [event] }));

    expect(findNowTask(context)).toBe(event);
  });

  it("shows nothing for a routine task replaced by an event that has ended", () => {
    const task = makeTask("Focus", at(9), at(12));
    const event = makeTask("Call", at(10), at(11), { source: "calendar" });

    expect(findNowTask(makeContext(at(11, 30), [task], emptySnapshot({ events: [event] })))).toBeNull();
  });

  it("falls back to a calendar event", () => {
    const event = makeTask("Call", at(10), at(11), { source: "calendar" });
    expect(findNowTask(makeContext(at(10, 30), [], emptySnapshot({ events: [event] })))).toBe(event);
  });

  it("returns null between tasks", () => {
    const task = makeTask("Focus", at(9), at(10));
    expect(findNowTask(makeContext(at(10, 30), [task]))).toBeNull();
  });
});
