import { describe, it, expect, vi, afterEach } from "vitest";
import {
  buildRoutine,
  concatRoutines,
  createSchedule,
  findOverlappingEntries,
  loadRoutineBook,
  parseRoutine,
} from "./routine.js";
import { testRegistry } from "./__tests__/fixtures.js";

const registry = testRegistry();

describe("parseRoutine", () => {
  it("keeps default durations when entries are far enough apart", () => {
    expect(parseRoutine("8:00 standup, 9:00 focus, 10:00 run", registry)).toEqual([
      { templateId: "standup", start: 480 },
      { templateId: "focus", start: 540 },
      { templateId: "run", start: 600 },
    ]);
  });

  it("applies explicit end times", () => {
    expect(parseRoutine("8:00 standup --8:10, 9:00 focus --10:30", registry)).toEqual([
      { templateId: "standup", start: 480, durationMinutes: 10 },
      { templateId: "focus", start: 540, durationMinutes: 90 },
    ]);
  });

  it("cuts an entry at the next start when that comes first", () => {
    expect(parseRoutine("8:00 focus, 8:30 dine", registry)).toEqual([
      { templateId: "focus", start: 480, durationMinutes: 30 },
      { templateId: "dine", start: 510 },
    ]);
  });

  it("uses the fallback duration for unknown names", () => {
    expect(parseRoutine("7:00 nap, 7:10 focus", registry)).toEqual([
      { templateId: "nap", start: 420, durationMinutes: 10 },
      { templateId: "focus", start: 430 },
    ]);
  });

  it("keeps multi-word names and skips empty items", () => {
    expect(parseRoutine(" 7:00 deep work ,, ", registry)).toEqual([{ templateId: "deep work", start: 420 }]);
  });

  it("rejects malformed items", () => {
    expect(() => parseRoutine("8:00", registry)).toThrow('Routine item "8:00" must look like "HH:MM name"');
    expect(() => parseRoutine("25:00 focus", registry)).toThrow('Invalid time "25:00", out of range');
    expect(() => parseRoutine("9:00 focus --8:00", registry)).toThrow(
      'Routine item "9:00 focus --8:00" ends before it starts'
    );
  });
});

describe("createSchedule", () => {
  const date = new Date(2024, 2, 5, 15, 42);

  it("resolves entries onto the date", () => {
    const routine = buildRoutine("day", parseRoutine("8:00 standup, 9:00 focus --9:45", registry));
    const [standup, focus] = createSchedule(routine, date, registry);

    expect(standup.title).toBe("Morning Standup");
    expect(standup.start).toEqual(new Date(2024, 2, 5, 8, 0));
    expect(standup.end).toEqual(new Date(2024, 2, 5, 8, 15));
    expect(standup.alarmSound).toBe("EWMF");
    expect(standup.source).toBe("routine");
    expect(focus.end).toEqual(new Date(2024, 2, 5, 9, 45));
  });

  it("turns unknown ids into placeholder-colored tasks titled with the id", () => {
    const [nap] = createSchedule(buildRoutine("day", [{ templateId: "nap", start: 780 }]), date, registry);

    expect(nap.title).toBe("nap");
    expect(nap.origin).toBe("nap");
    expect(nap.end).toEqual(new Date(2024, 2, 5, 13, 30));
    expect(nap.fillColor).toEqual(registry.defaultTemplate.fillColor);
  });

  it("prefers an entry's own title", () => {
    const [task] = createSchedule(
      buildRoutine("day", [{ templateId: "run", start: 600, title: "Long run" }]),
      date,
      registry
    );
    expect(task.title).toBe("Long run");
  });

  it("lets tasks run past midnight", () => {
    const [late] = createSchedule(
      buildRoutine("night", [{ templateId: "focus", start: 23 * 60 + 30 }]),
      date,
      registry
    );
    expect(late.end).toEqual(new Date(2024, 2, 6, 0, 30));
  });
});

describe("concatRoutines", () => {
  it("joins names and entries", () => {
    const a = buildRoutine("a", [{ templateId: "focus", start: 480 }]);
    const b = buildRoutine("b", [{ templateId: "run", start: 600 }]);
    const joined = concatRoutines(a, b);

    expect(joined.name).toBe("a+b");
    expect(joined.entries.map((entry) => entry.templateId)).toEqual(["focus", "run"]);
    expect(a.entries).toHaveLength(1);
  });
});

describe("findOverlappingEntries", () => {
  it("reports entries whose ranges intersect", () => {
    const routine = buildRoutine("day", parseRoutine("8:00 focus --9:00, 8:30 run, 10:00 dine", registry));
    expect(findOverlappingEntries(routine, registry)).toEqual([["08:00 focus", "08:30 run"]]);
  });

  it("treats touching entries as disjoint", () => {
    const routine = buildRoutine("day", parseRoutine("8:00 focus, 9:00 run", registry));
    expect(findOverlappingEntries(routine, registry)).toEqual([]);
  });
});

describe("loadRoutineBook", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  const json = {
    default: "work",
    routines: {
      work: "8:00 focus",
      off: [{ template: "run", start: "9:00", end: "9:40" }, { template: "dine", start: "12:00", title: "Lunch" }],
      both: { concat: ["work", "off"] },
    },
    dates: { "0305": "both" },
  };

  it("selects date overrides by MMDD", () => {
    const book = loadRoutineBook(json, registry);

    const special = book.forDate(new Date(2024, 2, 5, 7, 0));
    expect(special.name).toBe("work+off");
    expect(special.entries).toEqual([
      { templateId: "focus", start: 480 },
      { templateId: "run", start: 540, durationMinutes: 40 },
      { templateId: "dine", start: 720, title: "Lunch" },
    ]);

    expect(book.forDate(new Date(2024, 2, 6)).name).toBe("work");
    expect(book.overrides()).toEqual(["0305"]);
  });

  it("warns about overlapping entries", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    loadRoutineBook({ default: "x", routines: { x: "8:00 focus --9:00, 8:30 run" } }, registry);

    expect(warn).toHaveBeenCalledWith('[routine] x: "08:00 focus" overlaps "08:30 run"');
  });

  it("rejects bad date keys", () => {
    expect(() => loadRoutineBook({ ...json, dates: { "1332": "work" } }, registry)).toThrow(
      "routines.dates.1332 must be keyed MMDD"
    );
  });

  it("rejects unknown routine names", () => {
    expect(() => loadRoutineBook({ ...json, default: "holiday" }, registry)).toThrow(
      'routines.default references unknown routine "holiday"'
    );
  });

  it("rejects concatenation cycles", () => {
    const cyclic = { default: "a", routines: { a: { concat: ["b"] }, b: { concat: ["a"] } } };
    expect(() => loadRoutineBook(cyclic, registry)).toThrow("routines.a concatenates itself");
  });

  it("reports the offending entry", () => {
    const bad = { default: "a", routines: { a: [{ template: "run", start: "9:00", end: "8:00" }] } };
    expect(() => loadRoutineBook(bad, registry)).toThrow("routines.a[0].end must be after start");
  });
});
