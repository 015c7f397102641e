/**
 * Type declarations for the parts of lunar-javascript in use
 * @see https://github.com/6tail/lunar-javascript
 */
declare module "lunar-javascript" {
  export class Lunar {
    /** Negative for leap months */
    getMonth(): number;
    getDay(): number;
    getYearInGanZhi(): string;
    getMonthInGanZhi(): string;
    getDayInGanZhi(): string;
  }

  export class Solar {
    static fromYmd(year: number, month: number, day: number): Solar;

    getLunar(): Lunar;
  }
}
