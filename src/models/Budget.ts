/**
 * Budget data structures: payroll configuration, fixed expenses and
 * installment obligations. Values are loaded once at the boundary and
 * never mutated by the engine.
 */

export interface Configuration {
  baseSalary: number;
  averageProductivity: number;
  investmentGoalPercent: number; // fraction in [0, 1], e.g. 0.2 for 20%
  holidayRegion: string; // UF code, e.g. "SP"
  dailyTransportAllowance: number; // VT per benefit day
  dailyMealAllowance: number; // VA per benefit day
}

export interface FixedExpense {
  name: string;
  amount: number;
  category: string;
}

export interface Installment {
  name: string;
  amount: number; // per-month installment value
  start: string; // YYYY-MM
  end: string; // YYYY-MM, inclusive
}

export interface BudgetData {
  configuration: Configuration;
  fixedExpenses: readonly FixedExpense[];
  installments: readonly Installment[];
}

/**
 * Total of all fixed expenses; applies to every projected month.
 */
export function getFixedExpensesTotal(expenses: readonly FixedExpense[]): number {
  return expenses.reduce((sum, expense) => sum + expense.amount, 0);
}

/**
 * Fixed expense totals grouped by category, in first-seen order.
 */
export function getExpensesByCategory(expenses: readonly FixedExpense[]): Record<string, number> {
  const totals = new Map<string, number>();
  for (const expense of expenses) {
    totals.set(expense.category, (totals.get(expense.category) ?? 0) + expense.amount);
  }
  // fromEntries keeps "__proto__" as an own key
  return Object.fromEntries(totals);
}
