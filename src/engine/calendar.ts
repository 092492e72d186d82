import { HolidayProvider } from "../holidays/provider";
import { InvalidMonthError } from "../utils/errors";
import { dayOfWeek, daysInMonth, isoDate } from "../utils/time";

export interface MonthCalendar {
  workdays: number; // Monday–Saturday, not a holiday
  restDays: number; // Sundays and holidays
  benefitDays: number; // Monday–Friday, not a holiday
  totalDays: number;
}

const SUNDAY = 0;
const SATURDAY = 6;

/**
 * Classifies every day of a month as workday or rest day.
 * A holiday on a Saturday is a rest day; a holiday on a Sunday counts once.
 *
 * @param year - Calendar year
 * @param month - Month number (1-12)
 * @param region - Holiday region code passed through to the provider
 * @param holidays - Holiday lookup; its InvalidRegionError propagates unchanged
 */
export function classifyMonth(
  year: number,
  month: number,
  region: string,
  holidays: HolidayProvider
): MonthCalendar {
  if (!Number.isInteger(year) || !Number.isInteger(month) || month < 1 || month > 12) {
    throw new InvalidMonthError(`${year}-${month}`, "month must be an integer between 1 and 12");
  }

  const holidayDates = holidays.holidaysFor(year, region);
  const totalDays = daysInMonth(year, month);

  let workdays = 0;
  let restDays = 0;
  let benefitDays = 0;

  for (let day = 1; day <= totalDays; day++) {
    const weekday = dayOfWeek(year, month, day);
    const isHoliday = holidayDates.has(isoDate(year, month, day));

    if (weekday === SUNDAY || isHoliday) {
      restDays++;
    } else {
      workdays++;
      if (weekday !== SATURDAY) {
        benefitDays++;
      }
    }
  }

  return { workdays, restDays, benefitDays, totalDays };
}
