/**
 * Task template registry
 *
 * Templates and their tags are loaded once from templates.json and validated
 * up front: a bad color, an unknown tag or a non-positive duration fails the
 * load with the offending key. Lookups at render time never fail; unknown ids
 * resolve to the default template.
 *
 * templates.json:
 *   {
 *     "defaultTag": "self",
 *     "tags": { "<name>": { text?, border?, fill?, hasAlarm?, alarmSound? } },
 *     "presets": { "<id>": { title, duration, tag, description?, text?, border?, fill?, hasAlarm?, alarmSound? } }
 *   }
 *
 * Colors are `[r, g, b]`, a panel ink name (`"red"`) or `{ "mix": { "r": 5, "w": 15 } }`.
 */

import { isInkKey, mixColors, PANEL_COLORS, type InkKey, type RGB } from "@paperday/core";
import type { AlarmSound, Tag, TaskTemplate } from "./types.js";

export const DEFAULT_TEMPLATE_ID = "default";

/** Duration used for routine entries that name no known template */
export const FALLBACK_DURATION_MINUTES = 30;

const ALARM_SOUNDS: readonly AlarmSound[] = [
  "default",
  "173",
  "A",
  "US",
  "uprising",
  "calm",
  "sneaky",
  "humor",
  "EWMF",
  "beep",
];

const DEFAULT_TAG_COLORS = {
  text: PANEL_COLORS.black,
  border: mixColors({ r: 5, w: 18 }),
  fill: PANEL_COLORS.white,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isChannel(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 255;
}

/**
 * Turn a color from templates.json into RGB, throwing with `path` on anything invalid
 */
export function parseColor(def: unknown, path: string): RGB {
  if (Array.isArray(def)) {
    if (def.length === 3 && def.every(isChannel)) {
      return { r: def[0], g: def[1], b: def[2] };
    }
    throw new Error(`${path} must be [r, g, b] with channels 0-255`);
  }

  if (typeof def === "string") {
    const named = Object.entries(PANEL_COLORS).find(([name]) => name === def);
    if (!named) throw new Error(`${path} names unknown color "${def}"`);
    return { ...named[1] };
  }

  if (isRecord(def) && isRecord(def.mix)) {
    const weights: Partial<Record<InkKey, number>> = {};
    for (const [key, weight] of Object.entries(def.mix)) {
      if (!isInkKey(key)) throw new Error(`${path}.mix has unknown ink "${key}"`);
      if (typeof weight !== "number" || weight < 0) {
        throw new Error(`${path}.mix.${key} must be a non-negative number`);
      }
      weights[key] = weight;
    }
    return mixColors(weights);
  }

  throw new Error(`${path} is not a valid color`);
}

function parseAlarmSound(value: unknown, path: string): AlarmSound {
  const match = ALARM_SOUNDS.find((sound) => sound === value);
  if (!match) throw new Error(`${path} must be one of ${ALARM_SOUNDS.join(", ")}`);
  return match;
}

function optionalBoolean(value: unknown, path: string): boolean | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") throw new Error(`${path} must be a boolean`);
  return value;
}

function parseTag(name: string, def: unknown): Tag {
  const path = `tags.${name}`;
  if (!isRecord(def)) throw new Error(`${path} must be an object`);

  return {
    name,
    textColor: def.text === undefined ? DEFAULT_TAG_COLORS.text : parseColor(def.text, `${path}.text`),
    borderColor:
      def.border === undefined ? DEFAULT_TAG_COLORS.border : parseColor(def.border, `${path}.border`),
    fillColor: def.fill === undefined ? DEFAULT_TAG_COLORS.fill : parseColor(def.fill, `${path}.fill`),
    hasAlarm: optionalBoolean(def.hasAlarm, `${path}.hasAlarm`) ?? false,
    alarmSound:
      def.alarmSound === undefined ? "default" : parseAlarmSound(def.alarmSound, `${path}.alarmSound`),
  };
}

function parseTemplate(id: string, def: unknown, tags: Map<string, Tag>): TaskTemplate {
  const path = `presets.${id}`;
  if (!isRecord(def)) throw new Error(`${path} must be an object`);

  if (typeof def.title !== "string" || def.title.trim() === "") {
    throw new Error(`${path}.title must be a non-empty string`);
  }
  if (typeof def.duration !== "number" || !Number.isInteger(def.duration) || def.duration <= 0) {
    throw new Error(`${path}.duration must be a positive integer (minutes)`);
  }
  if (typeof def.tag !== "string") throw new Error(`${path}.tag must be a string`);
  const tag = tags.get(def.tag);
  if (!tag) throw new Error(`${path}.tag references unknown tag "${def.tag}"`);
  if (def.description !== undefined && typeof def.description !== "string") {
    throw new Error(`${path}.description must be a string`);
  }

  // Template colors win; anything left undefined comes from the tag
  return Object.freeze({
    id,
    title: def.title,
    durationMinutes: def.duration,
    description: def.description ?? "",
    tag: tag.name,
    textColor: def.text === undefined ? tag.textColor : parseColor(def.text, `${path}.text`),
    borderColor: def.border === undefined ? tag.borderColor : parseColor(def.border, `${path}.border`),
    fillColor: def.fill === undefined ? tag.fillColor : parseColor(def.fill, `${path}.fill`),
    hasAlarm: optionalBoolean(def.hasAlarm, `${path}.hasAlarm`) ?? tag.hasAlarm,
    alarmSound:
      def.alarmSound === undefined ? tag.alarmSound : parseAlarmSound(def.alarmSound, `${path}.alarmSound`),
  });
}

/**
 * Validated, read-only lookup of task templates
 */
export class TemplateRegistry {
  private readonly templates: ReadonlyMap<string, TaskTemplate>;
  private readonly tags: ReadonlyMap<string, Tag>;
  readonly defaultTemplate: TaskTemplate;

  constructor(templates: Map<string, TaskTemplate>, tags: Map<string, Tag>, defaultTag: Tag) {
    this.templates = templates;
    this.tags = tags;
    this.defaultTemplate = Object.freeze({
      id: DEFAULT_TEMPLATE_ID,
      title: "--",
      durationMinutes: FALLBACK_DURATION_MINUTES,
      description: "",
      tag: defaultTag.name,
      textColor: defaultTag.textColor,
      borderColor: defaultTag.borderColor,
      fillColor: defaultTag.fillColor,
      hasAlarm: defaultTag.hasAlarm,
      alarmSound: defaultTag.alarmSound,
    });
  }

  has(id: string): boolean {
    return this.templates.has(id);
  }

  /** Exact lookup; undefined for unknown ids */
  get(id: string): TaskTemplate | undefined {
    return this.templates.get(id);
  }

  /** Lookup that falls back to the default template */
  resolve(id: string): TaskTemplate {
    return this.templates.get(id) ?? this.defaultTemplate;
  }

  getTag(name: string): Tag | undefined {
    return this.tags.get(name);
  }

  ids(): string[] {
    return [...this.templates.keys()];
  }
}

/**
 * Validate the parsed contents of templates.json and build the registry
 */
export function loadTemplateRegistry(json: unknown): TemplateRegistry {
  if (!isRecord(json)) throw new Error("templates file must be an object");
  if (!isRecord(json.tags)) throw new Error("templates.tags must be an object");
  if (!isRecord(json.presets)) throw new Error("templates.presets must be an object");

  const tags = new Map<string, Tag>();
  for (const [name, def] of Object.entries(json.tags)) {
    tags.set(name, parseTag(name, def));
  }

  if (typeof json.defaultTag !== "string") throw new Error("templates.defaultTag must be a string");
  const defaultTag = tags.get(json.defaultTag);
  if (!defaultTag) throw new Error(`templates.defaultTag references unknown tag "${json.defaultTag}"`);

  const templates = new Map<string, TaskTemplate>();
  for (const [id, def] of Object.entries(json.presets)) {
    if (id === DEFAULT_TEMPLATE_ID) {
      throw new Error(`presets.${DEFAULT_TEMPLATE_ID} is reserved`);
    }
    templates.set(id, parseTemplate(id, def, tags));
  }

  return new TemplateRegistry(templates, tags, defaultTag);
}
