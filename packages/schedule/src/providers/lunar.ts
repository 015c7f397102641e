/**
 * Lunar calendar date for the header
 */

import { Solar } from "lunar-javascript";
import type { DataProvider } from "./provider.js";

export interface LunarDay {
  month: number;
  day: number;
  isLeapMonth: boolean;
  yearGanZhi: string;
  monthGanZhi: string;
  dayGanZhi: string;
  /** ASCII label the bitmap font can draw, e.g. "LUNAR 8/29" */
  label: string;
}

export function formatLunarLabel(month: number, day: number, isLeapMonth: boolean): string {
  return `LUNAR ${isLeapMonth ? "LEAP " : ""}${month}/${day}`;
}

/**
 * Convert a local solar date to its lunar date
 */
export function toLunarDay(date: Date): LunarDay {
  const lunar = Solar.fromYmd(date.getFullYear(), date.getMonth() + 1, date.getDate()).getLunar();
  const rawMonth = lunar.getMonth();
  const month = Math.abs(rawMonth);
  const isLeapMonth = rawMonth < 0;

  return {
    month,
    day: lunar.getDay(),
    isLeapMonth,
    yearGanZhi: lunar.getYearInGanZhi(),
    monthGanZhi: lunar.getMonthInGanZhi(),
    dayGanZhi: lunar.getDayInGanZhi(),
    label: formatLunarLabel(month, lunar.getDay(), isLeapMonth),
  };
}

export class LunarProvider implements DataProvider<LunarDay> {
  readonly name = "lunar";

  async fetch(date: Date): Promise<LunarDay> {
    return toLunarDay(date);
  }
}
