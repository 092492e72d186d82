import {
  addMonths,
  compareYearMonth,
  currentYearMonth,
  dayOfWeek,
  daysInMonth,
  formatYearMonth,
  isWithinMonths,
  isoDate,
  parseYearMonth,
} from '../../utils/time';

describe('parseYearMonth', () => {
  it('should parse YYYY-MM', () => {
    expect(parseYearMonth('2024-11')).toEqual({ year: 2024, month: 11 });
    expect(parseYearMonth(' 2025-01 ')).toEqual({ year: 2025, month: 1 });
  });

  it('should return null for invalid input', () => {
    expect(parseYearMonth('2024-13')).toBeNull();
    expect(parseYearMonth('2024-00')).toBeNull();
    expect(parseYearMonth('2024-1')).toBeNull();
    expect(parseYearMonth('11/2024')).toBeNull();
    expect(parseYearMonth('')).toBeNull();
  });
});

describe('formatYearMonth', () => {
  it('should zero-pad the month', () => {
    expect(formatYearMonth({ year: 2025, month: 3 })).toBe('2025-03');
    expect(formatYearMonth({ year: 2024, month: 12 })).toBe('2024-12');
  });
});

describe('compareYearMonth', () => {
  it('should order by year before month', () => {
    expect(compareYearMonth({ year: 2024, month: 12 }, { year: 2025, month: 1 })).toBeLessThan(0);
    expect(compareYearMonth({ year: 2025, month: 1 }, { year: 2024, month: 12 })).toBeGreaterThan(0);
    expect(compareYearMonth({ year: 2025, month: 6 }, { year: 2025, month: 6 })).toBe(0);
  });

  it('should order months that string comparison would get wrong', () => {
    // "2025-10" < "2025-9" as strings
    expect(compareYearMonth({ year: 2025, month: 9 }, { year: 2025, month: 10 })).toBeLessThan(0);
  });
});

describe('isWithinMonths', () => {
  const start = { year: 2024, month: 11 };
  const end = { year: 2025, month: 2 };

  it('should be inclusive on both ends', () => {
    expect(isWithinMonths(start, start, end)).toBe(true);
    expect(isWithinMonths(end, start, end)).toBe(true);
  });

  it('should span the year boundary', () => {
    expect(isWithinMonths({ year: 2024, month: 12 }, start, end)).toBe(true);
    expect(isWithinMonths({ year: 2025, month: 1 }, start, end)).toBe(true);
    expect(isWithinMonths({ year: 2025, month: 3 }, start, end)).toBe(false);
    expect(isWithinMonths({ year: 2024, month: 10 }, start, end)).toBe(false);
  });
});

describe('addMonths', () => {
  it('should roll December over to January', () => {
    expect(addMonths({ year: 2024, month: 12 }, 1)).toEqual({ year: 2025, month: 1 });
  });

  it('should add across several years', () => {
    expect(addMonths({ year: 2024, month: 11 }, 3)).toEqual({ year: 2025, month: 2 });
    expect(addMonths({ year: 2024, month: 1 }, 25)).toEqual({ year: 2026, month: 2 });
  });

  it('should return the same month for 0', () => {
    expect(addMonths({ year: 2024, month: 5 }, 0)).toEqual({ year: 2024, month: 5 });
  });
});

describe('daysInMonth', () => {
  it('should handle month lengths and leap years', () => {
    expect(daysInMonth(2024, 1)).toBe(31);
    expect(daysInMonth(2024, 2)).toBe(29);
    expect(daysInMonth(2025, 2)).toBe(28);
    expect(daysInMonth(2024, 4)).toBe(30);
    expect(daysInMonth(2024, 12)).toBe(31);
  });
});

describe('dayOfWeek', () => {
  it('should return 0 for Sunday and 6 for Saturday', () => {
    expect(dayOfWeek(2024, 4, 21)).toBe(0);
    expect(dayOfWeek(2024, 11, 2)).toBe(6);
    expect(dayOfWeek(2024, 7, 9)).toBe(2);
  });
});

describe('isoDate', () => {
  it('should format a calendar day', () => {
    expect(isoDate(2024, 7, 9)).toBe('2024-07-09');
  });
});

describe('currentYearMonth', () => {
  it('should take the month from the given date', () => {
    expect(currentYearMonth(new Date(2025, 0, 15))).toEqual({ year: 2025, month: 1 });
    expect(currentYearMonth(new Date(2024, 11, 31))).toEqual({ year: 2024, month: 12 });
  });
});
