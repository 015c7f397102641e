/**
 * Routine definition and selection
 *
 * A routine is a list of entries keyed by template id with a start time.
 * Routines are written either as entry arrays or in the compact form
 *
 *   "6:50 standup --7:10, 8:00 focus, 12:00 dine"
 *
 * and resolved onto a concrete date with createSchedule().
 */

import { FALLBACK_DURATION_MINUTES, type TemplateRegistry } from "./templates.js";
import { atMinuteOfDay, addMinutes, dateKey, formatMinuteOfDay, parseClock } from "./tasks.js";
import type { MinuteOfDay, Routine, Task, TaskEntry } from "./types.js";

interface CompactItem {
  raw: string;
  name: string;
  start: MinuteOfDay;
  end?: MinuteOfDay;
}

function parseCompactItem(raw: string): CompactItem {
  const [head, ...rest] = raw.split("--");
  if (rest.length > 1) throw new Error(`Routine item "${raw}" has more than one end time`);

  const match = head.trim().match(/^(\S+)\s+(.+)$/);
  if (!match) throw new Error(`Routine item "${raw}" must look like "HH:MM name"`);

  try {
    return {
      raw,
      name: match[2].trim(),
      start: parseClock(match[1]),
      end: rest.length === 1 ? parseClock(rest[0]) : undefined,
    };
  } catch (error) {
    throw new Error(`Routine item "${raw}": ${error instanceof Error ? error.message : String(error)}`);
  }
}

function defaultDuration(templateId: string, registry: TemplateRegistry): number {
  return registry.get(templateId)?.durationMinutes ?? FALLBACK_DURATION_MINUTES;
}

/**
 * Parse the compact routine syntax into entries.
 *
 * - `--HH:MM` sets the end time explicitly
 * - otherwise the entry keeps its template's duration, cut short when the
 *   next entry starts before that runs out
 * - the last entry always keeps its template's duration
 */
export function parseRoutine(text: string, registry: TemplateRegistry): TaskEntry[] {
  const items = text
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
    .map(parseCompactItem);

  return items.map((item, i): TaskEntry => {
    if (item.end !== undefined) {
      const duration = item.end - item.start;
      if (duration <= 0) {
        throw new Error(`Routine item "${item.raw}" ends before it starts`);
      }
      return { templateId: item.name, start: item.start, durationMinutes: duration };
    }

    const next = items[i + 1];
    if (next) {
      const gap = next.start - item.start;
      if (gap > 0 && gap < defaultDuration(item.name, registry)) {
        return { templateId: item.name, start: item.start, durationMinutes: gap };
      }
    }
    return { templateId: item.name, start: item.start };
  });
}

/**
 * Entry length in minutes after applying the template default
 */
export function entryDuration(entry: TaskEntry, registry: TemplateRegistry): number {
  return entry.durationMinutes ?? defaultDuration(entry.templateId, registry);
}

export function buildRoutine(name: string, entries: TaskEntry[]): Routine {
  return { name, entries: [...entries] };
}

export function concatRoutines(a: Routine, b: Routine): Routine {
  return { name: `${a.name}+${b.name}`, entries: [...a.entries, ...b.entries] };
}

/**
 * Resolve a routine's entries into tasks on `date`.
 * Unknown template ids become tasks titled with the id, in the default tag's colors.
 */
export function createSchedule(routine: Routine, date: Date, registry: TemplateRegistry): Task[] {
  return routine.entries.map((entry) => {
    const template = registry.get(entry.templateId);
    const style = template ?? registry.defaultTemplate;
    const start = atMinuteOfDay(date, entry.start);

    return {
      title: entry.title ?? template?.title ?? entry.templateId,
      description: style.description,
      start,
      end: addMinutes(start, entryDuration(entry, registry)),
      textColor: style.textColor,
      borderColor: style.borderColor,
      fillColor: style.fillColor,
      hasAlarm: style.hasAlarm,
      alarmSound: style.alarmSound,
      origin: entry.templateId,
      source: "routine",
    };
  });
}

/**
 * Pairs of entries whose time ranges overlap, as "HH:MM name" labels
 */
export function findOverlappingEntries(
  routine: Routine,
  registry: TemplateRegistry
): Array<[string, string]> {
  const spans = routine.entries
    .map((entry) => ({
      label: `${formatMinuteOfDay(entry.start)} ${entry.templateId}`,
      start: entry.start,
      end: entry.start + entryDuration(entry, registry),
    }))
    .sort((a, b) => a.start - b.start);

  const overlaps: Array<[string, string]> = [];
  for (let i = 0; i < spans.length; i++) {
    for (let j = i + 1; j < spans.length && spans[j].start < spans[i].end; j++) {
      overlaps.push([spans[i].label, spans[j].label]);
    }
  }
  return overlaps;
}

/**
 * A default routine plus per-date overrides keyed by "MMDD"
 */
export class RoutineBook {
  constructor(
    readonly defaultRoutine: Routine,
    private readonly byDate: ReadonlyMap<string, Routine> = new Map()
  ) {}

  forDate(date: Date): Routine {
    return this.byDate.get(dateKey(date)) ?? this.defaultRoutine;
  }

  overrides(): string[] {
    return [...this.byDate.keys()].sort();
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseEntry(def: unknown, path: string): TaskEntry {
  if (!isRecord(def)) throw new Error(`${path} must be an object`);
  if (typeof def.template !== "string" || def.template === "") {
    throw new Error(`${path}.template must be a non-empty string`);
  }
  if (typeof def.start !== "string") throw new Error(`${path}.start must be "HH:MM"`);

  let start: MinuteOfDay;
  let end: MinuteOfDay | undefined;
  try {
    start = parseClock(def.start);
    end = typeof def.end === "string" ? parseClock(def.end) : undefined;
  } catch (error) {
    throw new Error(`${path}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const entry: TaskEntry = { templateId: def.template, start };
  if (end !== undefined) {
    if (end <= start) throw new Error(`${path}.end must be after start`);
    entry.durationMinutes = end - start;
  } else if (def.duration !== undefined) {
    if (typeof def.duration !== "number" || !Number.isInteger(def.duration) || def.duration <= 0) {
      throw new Error(`${path}.duration must be a positive integer (minutes)`);
    }
    entry.durationMinutes = def.duration;
  }
  if (def.title !== undefined) {
    if (typeof def.title !== "string") throw new Error(`${path}.title must be a string`);
    entry.title = def.title;
  }
  return entry;
}

/**
 * Validate the parsed contents of routines.json.
 *
 * routines.json:
 *   {
 *     "default": "<routine name>",
 *     "routines": {
 *       "<name>": "6:50 standup --7:10, ..."
 *               | [{ template, start, end?, duration?, title? }]
 *               | { "concat": ["<name>", "<name>"] }
 *     },
 *     "dates": { "MMDD": "<routine name>" }
 *   }
 */
export function loadRoutineBook(json: unknown, registry: TemplateRegistry): RoutineBook {
  if (!isRecord(json)) throw new Error("routines file must be an object");
  if (!isRecord(json.routines)) throw new Error("routines.routines must be an object");
  const defs = json.routines;

  const resolved = new Map<string, Routine>();
  const resolving = new Set<string>();

  const resolve = (name: string, path: string): Routine => {
    const done = resolved.get(name);
    if (done) return done;
    if (!(name in defs)) throw new Error(`${path} references unknown routine "${name}"`);
    if (resolving.has(name)) throw new Error(`routines.${name} concatenates itself`);
    resolving.add(name);

    const def = defs[name];
    const at = `routines.${name}`;
    let routine: Routine;
    if (typeof def === "string") {
      routine = buildRoutine(name, parseRoutine(def, registry));
    } else if (Array.isArray(def)) {
      routine = buildRoutine(name, def.map((entry, i) => parseEntry(entry, `${at}[${i}]`)));
    } else if (isRecord(def) && Array.isArray(def.concat) && def.concat.length > 0) {
      const parts = def.concat.map((part, i) => {
        if (typeof part !== "string") throw new Error(`${at}.concat[${i}] must be a routine name`);
        return resolve(part, `${at}.concat[${i}]`);
      });
      routine = parts.slice(1).reduce(concatRoutines, parts[0]);
    } else {
      throw new Error(`${at} must be a string, an entry array or { concat: [...] }`);
    }

    resolving.delete(name);
    resolved.set(name, routine);
    return routine;
  };

  for (const name of Object.keys(defs)) {
    const routine = resolve(name, "routines");
    for (const [a, b] of findOverlappingEntries(routine, registry)) {
      console.warn(`[routine] ${name}: "${a}" overlaps "${b}"`);
    }
  }

  if (typeof json.default !== "string") throw new Error("routines.default must be a routine name");
  const defaultRoutine = resolve(json.default, "routines.default");

  const byDate = new Map<string, Routine>();
  if (json.dates !== undefined) {
    if (!isRecord(json.dates)) throw new Error("routines.dates must be an object");
    for (const [key, name] of Object.entries(json.dates)) {
      if (!/^(0[1-9]|1[0-2])(0[1-9]|[12]\d|3[01])$/.test(key)) {
        throw new Error(`routines.dates.${key} must be keyed MMDD`);
      }
      if (typeof name !== "string") throw new Error(`routines.dates.${key} must be a routine name`);
      byDate.set(key, resolve(name, `routines.dates.${key}`));
    }
  }

  return new RoutineBook(defaultRoutine, byDate);
}
