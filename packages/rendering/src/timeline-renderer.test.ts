import { describe, it, expect } from "vitest";
import { createSolidFrame, getPixel, PANEL_COLORS } from "@paperday/core";
import { createLayout } from "./layout.js";
import { assignLanes, taskRenderMode, TimelinePanel } from "./timeline-renderer.js";
import { makeTask, TASK_BORDER, TASK_FILL } from "./__tests__/fixtures.js";

const at = (hours: number, minutes = 0) => new Date(2024, 2, 5, hours, minutes);

describe("taskRenderMode", () => {
  it("switches modes by box height", () => {
    expect(taskRenderMode(14)).toBe("line");
    expect(taskRenderMode(15)).toBe("compact");
    expect(taskRenderMode(39)).toBe("compact");
    expect(taskRenderMode(40)).toBe("full");
  });
});

describe("assignLanes", () => {
  it("keeps non-overlapping spans in one full-width lane", () => {
    const lanes = assignLanes([
      { start: 0, end: 1 },
      { start: 1, end: 2 },
    ]);
    expect(lanes.map(({ lane, lanes }) => [lane, lanes])).toEqual([
      [0, 1],
      [0, 1],
    ]);
  });

  it("puts overlapping spans side by side", () => {
    const lanes = assignLanes([
      { start: 2.5, end: 4 },
      { start: 0, end: 2 },
      { start: 1, end: 3 },
    ]);
    expect(lanes).toEqual([
      { start: 0, end: 2, lane: 0, lanes: 2 },
      { start: 1, end: 3, lane: 1, lanes: 3 },
      { start: 2.5, end: 4, lane: 0, lanes: 2 },
    ]);
  });
});

describe("TimelinePanel", () => {
  const coords = createLayout().timelines[0];
  const panel = new TimelinePanel(coords, [12, 18]);

  it("maps hours onto the grid rows", () => {
    expect(panel.hourToY(12)).toBe(92);
    expect(panel.hourToY(15)).toBe(278);
    expect(panel.hourToY(18)).toBe(464);
  });

  it("clamps tasks that start before the panel and hides their caption", () => {
    const tasks = [
      makeTask("Early", at(10), at(13)),
      makeTask("Later", at(14), at(15)),
      makeTask("Evening", at(19), at(20)),
    ];
    const visible = panel.visibleTasks(tasks, at(0));

    expect(visible.map((entry) => [entry.task.title, entry.start, entry.end, entry.showsCaption])).toEqual([
      ["Early", 12, 13, false],
      ["Later", 14, 15, true],
    ]);
    expect(visible[0].realStart).toBe(10);
  });

  it("draws task boxes and the current time marker", () => {
    const frame = createSolidFrame(800, 480);
    panel.render(frame, [makeTask("Deep Work", at(13, 30), at(15))], at(13));

    // Box spans x 322..536, y 185..278 with a 2px border
    expect(getPixel(frame, 330, 270)).toEqual(TASK_FILL);
    expect(getPixel(frame, 322, 230)).toEqual(TASK_BORDER);
    // Marker line at 13:00
    expect(getPixel(frame, 400, 154)).toEqual(PANEL_COLORS.red);
  });

  it("skips the marker when now is outside the panel", () => {
    const frame = createSolidFrame(800, 480);
    panel.render(frame, [], at(9));
    for (let y = 92; y <= 464; y++) {
      expect(getPixel(frame, 537, y)).not.toEqual(PANEL_COLORS.red);
    }
  });
});
