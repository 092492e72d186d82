#!/usr/bin/env node
import { BrazilHolidayProvider } from "./src/holidays/brazil";
import { projectBudget, releasedInstallments, summarizeProjection } from "./src/engine/projection";
import { DEFAULT_BUDGET_FILE, loadBudgetFile } from "./src/storage/budgetStore";
import { ProjectionSnapshot } from "./src/models/ProjectionSnapshot";
import { currentYearMonth, parseYearMonth } from "./src/utils/time";
import { formatBRL, formatMonthLabel } from "./src/utils/format";

/**
 * Print the projection table for a budget file.
 * Usage: run-projection [budget-file] [YYYY-MM]
 * Defaults: orcamento.json (or BUDGET_FILE), current month
 */
const budgetPath = process.argv[2] ?? process.env.BUDGET_FILE ?? DEFAULT_BUDGET_FILE;
const startArg = process.argv[3];

const start = startArg !== undefined ? parseYearMonth(startArg) : currentYearMonth();
if (!start) {
  console.error(`Start month "${startArg}" must be in YYYY-MM format.`);
  process.exit(1);
}

const COLUMNS = ["Mês", "Dias Úteis", "DSR", "Receita Líq.", "Gastos Totais", "Saldo Livre", "Parcelas Ativas"];

// A balance marked ▲ rose because an installment ended the month before
function row(snapshot: ProjectionSnapshot, index: number, all: readonly ProjectionSnapshot[]): string[] {
  const [year, month] = snapshot.month.split("-").map(Number);
  const installments = snapshot.activeInstallments
    .map((name) => (snapshot.endingInstallments.includes(name) ? `${name} (última)` : name))
    .join(", ");
  const relief = releasedInstallments(all, index).length > 0;
  return [
    formatMonthLabel(year, month),
    String(snapshot.payroll.workdays),
    formatBRL(snapshot.payroll.dsr),
    formatBRL(snapshot.netIncome),
    formatBRL(snapshot.totalExpenses),
    relief ? `${formatBRL(snapshot.freeBalance)} ▲` : formatBRL(snapshot.freeBalance),
    installments || "-",
  ];
}

function printTable(rows: string[][]): void {
  const widths = COLUMNS.map((title, i) => Math.max(title.length, ...rows.map((r) => r[i].length)));
  const line = (cells: string[]) => cells.map((cell, i) => cell.padEnd(widths[i])).join("  ");
  console.log(line(COLUMNS));
  console.log(widths.map((w) => "-".repeat(w)).join("  "));
  for (const r of rows) {
    console.log(line(r));
  }
}

try {
  const budget = loadBudgetFile(budgetPath);
  const snapshots = projectBudget(budget, start, new BrazilHolidayProvider());
  const [current] = snapshots;

  console.log(`Projeção a partir de ${current.month} (${budget.configuration.holidayRegion})\n`);
  console.log(`Receita líquida:  ${formatBRL(current.netIncome)}`);
  console.log(`Gastos totais:    ${formatBRL(current.totalExpenses)}`);
  console.log(`Meta de aporte:   ${formatBRL(current.investmentGoal)}`);
  console.log(`Saldo livre:      ${formatBRL(current.freeBalance)}\n`);

  printTable(snapshots.map(row));
  console.log("\n▲ saldo livre após o fim de um parcelamento");

  const summary = summarizeProjection(snapshots);
  console.log(`\nSaldo livre médio: ${formatBRL(summary.averageFreeBalance)}`);
  if (summary.negativeMonths.length > 0) {
    console.log(`Meses no negativo: ${summary.negativeMonths.join(", ")}`);
  }
} catch (err) {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Failed to project "${budgetPath}": ${message}`);
  process.exit(1);
}
