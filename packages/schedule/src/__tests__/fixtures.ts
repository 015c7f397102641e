import { loadTemplateRegistry, type TemplateRegistry } from "../templates.js";

export const TEMPLATES_JSON = {
  defaultTag: "self",
  tags: {
    self: { fill: { mix: { y: 5, r: 5, w: 15 } }, hasAlarm: true },
    work: { fill: { mix: { r: 5, w: 15 } }, border: "red" },
    exer: { fill: [255, 200, 180], hasAlarm: true, alarmSound: "uprising" },
  },
  presets: {
    standup: { title: "Morning Standup", duration: 15, tag: "work", alarmSound: "EWMF" },
    focus: { title: "Focus", duration: 60, tag: "work" },
    run: { title: "Run", duration: 50, tag: "exer" },
    dine: { title: "Dinner", duration: 25, tag: "self", fill: "yellow" },
  },
};

export function testRegistry(): TemplateRegistry {
  return loadTemplateRegistry(TEMPLATES_JSON);
}
