import { BudgetData, Installment, getFixedExpensesTotal } from "../models/Budget";
import { ProjectionSnapshot, ProjectionSummary } from "../models/ProjectionSnapshot";
import { HolidayProvider } from "../holidays/provider";
import { computeMonth } from "./payroll";
import { DEFAULT_PROJECTION_MONTHS } from "../utils/constants";
import { MalformedInstallmentError } from "../utils/errors";
import { average, sumAmounts } from "../utils/math";
import {
  YearMonth,
  addMonths,
  compareYearMonth,
  formatYearMonth,
  isWithinMonths,
  parseYearMonth,
} from "../utils/time";

export interface ProjectionOptions {
  months?: number;
}

interface InstallmentWindow {
  installment: Installment;
  start: YearMonth;
  end: YearMonth;
}

/**
 * Parses every installment window up front so a bad entry fails the run
 * before any month is computed.
 *
 * @throws MalformedInstallmentError on an unparseable month or start > end
 */
export function assertInstallments(installments: readonly Installment[]): InstallmentWindow[] {
  return installments.map((installment) => {
    const start = parseYearMonth(installment.start);
    if (!start) {
      throw new MalformedInstallmentError(installment.name, `start "${installment.start}" is not a YYYY-MM month`);
    }
    const end = parseYearMonth(installment.end);
    if (!end) {
      throw new MalformedInstallmentError(installment.name, `end "${installment.end}" is not a YYYY-MM month`);
    }
    if (compareYearMonth(start, end) > 0) {
      throw new MalformedInstallmentError(
        installment.name,
        `start ${installment.start} is after end ${installment.end}`
      );
    }
    if (installment.amount < 0) {
      throw new MalformedInstallmentError(installment.name, "amount must not be negative");
    }
    return { installment, start, end };
  });
}

/**
 * Projects payroll, expenses and free balance month by month.
 *
 * The run is all-or-nothing: if any month fails (unknown region, a month
 * with no workdays) the error propagates and no snapshots are returned.
 * The same inputs always produce the same snapshots.
 *
 * @param budget - Validated budget data
 * @param start - First projected month
 * @param holidays - Holiday lookup for the configured region
 * @param options - Horizon length (default 12 months)
 * @returns Frozen, chronologically ordered snapshots
 */
export function projectBudget(
  budget: BudgetData,
  start: YearMonth,
  holidays: HolidayProvider,
  options: ProjectionOptions = {}
): readonly ProjectionSnapshot[] {
  const months = options.months ?? DEFAULT_PROJECTION_MONTHS;
  if (!Number.isInteger(months) || months < 1) {
    throw new RangeError(`Projection horizon must be a positive integer, got ${months}`);
  }

  const windows = assertInstallments(budget.installments);
  const { configuration } = budget;
  const fixedExpensesTotal = getFixedExpensesTotal(budget.fixedExpenses);
  const dailyBenefits = configuration.dailyTransportAllowance + configuration.dailyMealAllowance;

  const snapshots: ProjectionSnapshot[] = [];

  for (let offset = 0; offset < months; offset++) {
    const current = addMonths(start, offset);
    const payroll = computeMonth(current.year, current.month, configuration, holidays);

    const active = windows.filter((w) => isWithinMonths(current, w.start, w.end));
    const installmentsTotal = sumAmounts(active.map((w) => w.installment.amount));

    const benefitsTotal = dailyBenefits * payroll.benefitDays;
    const netIncome = payroll.netSalary + benefitsTotal;
    const totalExpenses = fixedExpensesTotal + installmentsTotal;

    snapshots.push(
      Object.freeze({
        month: formatYearMonth(current),
        payroll: Object.freeze(payroll),
        benefitsTotal,
        netIncome,
        fixedExpensesTotal,
        installmentsTotal,
        totalExpenses,
        freeBalance: netIncome - totalExpenses,
        investmentGoal: netIncome * configuration.investmentGoalPercent,
        activeInstallments: Object.freeze(active.map((w) => w.installment.name)),
        endingInstallments: Object.freeze(
          active.filter((w) => compareYearMonth(w.end, current) === 0).map((w) => w.installment.name)
        ),
      })
    );
  }

  return Object.freeze(snapshots);
}

/**
 * Installments that ended in the month before `index`, whose charge no
 * longer weighs on that month's free balance.
 */
export function releasedInstallments(
  snapshots: readonly ProjectionSnapshot[],
  index: number
): readonly string[] {
  const previous = index > 0 ? snapshots[index - 1] : undefined;
  return previous?.endingInstallments ?? [];
}

/**
 * Aggregates a projection: totals, average free balance, and the tightest month.
 */
export function summarizeProjection(snapshots: readonly ProjectionSnapshot[]): ProjectionSummary {
  let lowest: ProjectionSnapshot | null = null;
  for (const snapshot of snapshots) {
    if (lowest === null || snapshot.freeBalance < lowest.freeBalance) {
      lowest = snapshot;
    }
  }

  const balances = snapshots.map((s) => s.freeBalance);

  return Object.freeze({
    months: snapshots.length,
    totalNetIncome: sumAmounts(snapshots.map((s) => s.netIncome)),
    totalExpenses: sumAmounts(snapshots.map((s) => s.totalExpenses)),
    totalFreeBalance: sumAmounts(balances),
    averageFreeBalance: average(balances),
    lowestBalanceMonth: lowest?.month ?? null,
    lowestFreeBalance: lowest?.freeBalance ?? null,
    negativeMonths: Object.freeze(snapshots.filter((s) => s.freeBalance < 0).map((s) => s.month)),
  });
}
