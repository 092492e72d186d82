import { z } from "zod";
import stateHolidaysData from "./stateHolidays.json";
import { Holiday, HolidayProvider } from "./provider";
import { InvalidRegionError } from "../utils/errors";
import { isoDate } from "../utils/time";

const StateHolidaysSchema = z.record(
  z.string(),
  z.array(
    z.object({
      date: z.string().regex(/^\d{2}-\d{2}$/),
      name: z.string(),
    })
  )
);

const STATE_HOLIDAYS = StateHolidaysSchema.parse(stateHolidaysData);

/** Federative units with a holiday calendar. */
export const SUPPORTED_REGIONS: readonly string[] = Object.keys(STATE_HOLIDAYS).sort();

interface NationalHoliday {
  date: string; // MM-DD
  name: string;
  since?: number; // first year the holiday is observed
}

const NATIONAL_HOLIDAYS: readonly NationalHoliday[] = [
  { date: "01-01", name: "Confraternização Universal" },
  { date: "04-21", name: "Tiradentes" },
  { date: "05-01", name: "Dia do Trabalhador" },
  { date: "09-07", name: "Independência do Brasil" },
  { date: "10-12", name: "Nossa Senhora Aparecida" },
  { date: "11-02", name: "Finados" },
  { date: "11-15", name: "Proclamação da República" },
  { date: "11-20", name: "Dia Nacional de Zumbi e da Consciência Negra", since: 2024 },
  { date: "12-25", name: "Natal" },
];

/**
 * Western (Gregorian) Easter Sunday, anonymous computus.
 *
 * @returns Month (1-12) and day of Easter Sunday
 */
export function easterSunday(year: number): { month: number; day: number } {
  const a = year % 19;
  const b = Math.floor(year / 100);
  const c = year % 100;
  const d = Math.floor(b / 4);
  const e = b % 4;
  const f = Math.floor((b + 8) / 25);
  const g = Math.floor((b - f + 1) / 3);
  const h = (19 * a + b - d - g + 15) % 30;
  const i = Math.floor(c / 4);
  const k = c % 4;
  const l = (32 + 2 * e + 2 * i - h - k) % 7;
  const m = Math.floor((a + 11 * h + 22 * l) / 451);
  const month = Math.floor((h + l - 7 * m + 114) / 31);
  const day = ((h + l - 7 * m + 114) % 31) + 1;
  return { month, day };
}

function shiftDays(year: number, month: number, day: number, offset: number): string {
  const date = new Date(Date.UTC(year, month - 1, day + offset));
  return isoDate(date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate());
}

/**
 * Brazilian national holidays plus the state holidays of one UF.
 * Optional points (Carnaval, Corpus Christi) are working days.
 */
export class BrazilHolidayProvider implements HolidayProvider {
  /**
   * Named holidays for a year and UF, sorted by date. A date shared by a
   * national and a state holiday appears once, under the national name.
   */
  listHolidays(year: number, region: string): Holiday[] {
    const stateHolidays = STATE_HOLIDAYS[region.toUpperCase()];
    if (!stateHolidays) {
      throw new InvalidRegionError(region);
    }

    const byDate = new Map<string, string>();
    const add = (date: string, name: string) => {
      if (!byDate.has(date)) {
        byDate.set(date, name);
      }
    };

    for (const holiday of NATIONAL_HOLIDAYS) {
      if (holiday.since === undefined || year >= holiday.since) {
        add(`${year}-${holiday.date}`, holiday.name);
      }
    }
    const easter = easterSunday(year);
    add(shiftDays(year, easter.month, easter.day, -2), "Sexta-feira Santa");

    for (const holiday of stateHolidays) {
      add(`${year}-${holiday.date}`, holiday.name);
    }

    return [...byDate.entries()]
      .map(([date, name]) => ({ date, name }))
      .sort((a, b) => a.date.localeCompare(b.date));
  }

  holidaysFor(year: number, region: string): ReadonlySet<string> {
    return new Set(this.listHolidays(year, region).map((holiday) => holiday.date));
  }
}
