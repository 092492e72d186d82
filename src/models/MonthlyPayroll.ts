/**
 * Payroll figures for a single month. Every intermediate value is kept so
 * the result can be audited line by line.
 */

export interface MonthlyPayroll {
  workdays: number;
  restDays: number;
  benefitDays: number; // Monday–Friday non-holiday days
  dsr: number;
  grossSalary: number;
  inss: number;
  irrfBase: number;
  irrf: number;
  netSalary: number;
}
