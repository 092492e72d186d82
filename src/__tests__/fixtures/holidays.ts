import { StaticHolidayProvider } from '../../holidays/provider';

/**
 * Partial SP calendar for Nov/2024 to Oct/2025 so projections do not depend
 * on the bundled holiday data. Finados (2024-11-02) and the SP state holiday
 * (2025-07-09) are left out, so Nov/2024 has 24 workdays here against 23
 * with BrazilHolidayProvider.
 */
export const spHolidays = new StaticHolidayProvider({
  SP: [
    '2024-11-15',
    '2024-11-20',
    '2024-12-25',
    '2025-01-01',
    '2025-04-18',
    '2025-04-21',
    '2025-05-01',
  ],
});

/** Every day of Feb/2025 is a holiday, leaving no workdays. */
export const noWorkdayFebruary = new StaticHolidayProvider({
  SP: Array.from({ length: 28 }, (_, i) => `2025-02-${String(i + 1).padStart(2, '0')}`),
});
