/**
 * Projection output structures
 */

import { MonthlyPayroll } from "./MonthlyPayroll";

export interface ProjectionSnapshot {
  month: string; // YYYY-MM
  payroll: MonthlyPayroll;
  benefitsTotal: number;
  netIncome: number; // net salary + benefits
  fixedExpensesTotal: number;
  installmentsTotal: number;
  totalExpenses: number;
  freeBalance: number;
  investmentGoal: number;
  activeInstallments: readonly string[];
  endingInstallments: readonly string[]; // installments whose last month is this one
}

export interface ProjectionSummary {
  months: number;
  totalNetIncome: number;
  totalExpenses: number;
  totalFreeBalance: number;
  averageFreeBalance: number;
  lowestBalanceMonth: string | null;
  lowestFreeBalance: number | null;
  negativeMonths: readonly string[];
}
