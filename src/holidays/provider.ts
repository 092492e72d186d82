import { InvalidRegionError } from "../utils/errors";

/**
 * Holiday lookup capability used by the calendar classifier.
 */

export interface Holiday {
  date: string; // YYYY-MM-DD
  name: string;
}

export interface HolidayProvider {
  /**
   * Non-working holidays for a year and region, as "YYYY-MM-DD" dates.
   * Throws InvalidRegionError when the region is unknown.
   */
  holidaysFor(year: number, region: string): ReadonlySet<string>;
}

/**
 * Provider backed by a fixed map of region → dates. Useful for embedding a
 * precomputed calendar and for deterministic tests.
 */
export class StaticHolidayProvider implements HolidayProvider {
  private readonly byRegion: ReadonlyMap<string, ReadonlySet<string>>;

  constructor(datesByRegion: Record<string, readonly string[]>) {
    this.byRegion = new Map(
      Object.entries(datesByRegion).map(([region, dates]) => [region, new Set(dates)])
    );
  }

  holidaysFor(year: number, region: string): ReadonlySet<string> {
    const dates = this.byRegion.get(region);
    if (!dates) {
      throw new InvalidRegionError(region);
    }
    const prefix = `${year}-`;
    return new Set([...dates].filter((date) => date.startsWith(prefix)));
  }
}
