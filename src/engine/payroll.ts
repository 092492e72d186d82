import { Configuration } from "../models/Budget";
import { MonthlyPayroll } from "../models/MonthlyPayroll";
import { HolidayProvider } from "../holidays/provider";
import { classifyMonth } from "./calendar";
import { withhold } from "./taxTable";
import { INSS_2024, IRRF_2024 } from "../utils/constants";
import { InvalidMonthError } from "../utils/errors";
import { formatYearMonth } from "../utils/time";

/**
 * Payroll figures for known day counts, before any calendar lookup.
 */
export type Payslip = Omit<MonthlyPayroll, "benefitDays">;

/**
 * Calculates DSR, gross pay, INSS, IRRF and net pay for given day counts.
 *
 * DSR (descanso semanal remunerado) pays the rest days in proportion to the
 * productivity earned on workdays: DSR = (productivity / workdays) × restDays.
 * INSS is withheld on gross; IRRF on gross minus INSS (no dependents).
 *
 * @param configuration - Salary and productivity figures
 * @param workdays - Workdays in the month (must be > 0)
 * @param restDays - Sundays and holidays in the month
 * @param monthLabel - Month identifier used in the error when workdays is 0
 */
export function calculatePayslip(
  configuration: Configuration,
  workdays: number,
  restDays: number,
  monthLabel = "unknown"
): Payslip {
  if (workdays <= 0) {
    throw new InvalidMonthError(monthLabel, "month has no workdays");
  }

  const productivity = configuration.averageProductivity;
  const dsr = (productivity / workdays) * restDays;
  const grossSalary = configuration.baseSalary + productivity + dsr;

  const inss = withhold(grossSalary, INSS_2024);
  const irrfBase = grossSalary - inss;
  const irrf = withhold(irrfBase, IRRF_2024);

  return {
    workdays,
    restDays,
    dsr,
    grossSalary,
    inss,
    irrfBase,
    irrf,
    netSalary: grossSalary - inss - irrf,
  };
}

/**
 * Computes the payroll for one calendar month.
 *
 * @throws InvalidRegionError when the holiday region is unknown
 * @throws InvalidMonthError when the month classifies to zero workdays
 */
export function computeMonth(
  year: number,
  month: number,
  configuration: Configuration,
  holidays: HolidayProvider
): MonthlyPayroll {
  const calendar = classifyMonth(year, month, configuration.holidayRegion, holidays);
  const payslip = calculatePayslip(
    configuration,
    calendar.workdays,
    calendar.restDays,
    formatYearMonth({ year, month })
  );
  return { ...payslip, benefitDays: calendar.benefitDays };
}
