import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { BudgetData, Configuration } from "../models/Budget";
import { BudgetDocumentSchema, ConfiguracaoSchema } from "../utils/validation";
import { BudgetValidationError, MalformedInstallmentError, ValidationIssue } from "../utils/errors";

/** Budget file read when no path is configured. */
export const DEFAULT_BUDGET_FILE = "orcamento.json";

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

/**
 * Maps a validated configuration block to the domain model.
 */
export function toConfiguration(block: z.output<typeof ConfiguracaoSchema>): Configuration {
  return Object.freeze({
    baseSalary: block.salario_base,
    averageProductivity: block.produtividade_media,
    investmentGoalPercent: block.meta_investimento_percentual,
    holidayRegion: block.estado_feriados,
    dailyTransportAllowance: block.valor_diario_vt,
    dailyMealAllowance: block.valor_diario_va,
  });
}

/**
 * Validates a raw budget document and converts it to frozen domain data.
 *
 * @throws MalformedInstallmentError when an installment window is invalid
 * @throws BudgetValidationError for any other schema violation
 */
export function parseBudgetData(raw: unknown): BudgetData {
  const result = BudgetDocumentSchema.safeParse(raw);
  if (!result.success) {
    const installmentIssue = result.error.issues.find((issue) => issue.path[0] === "parcelamentos");
    if (installmentIssue && installmentIssue.path.length > 1) {
      const index = installmentIssue.path[1];
      const name = parcelamentoName(raw, index);
      throw new MalformedInstallmentError(
        name,
        `${installmentIssue.path.slice(2).join(".") || "entry"}: ${installmentIssue.message}`
      );
    }
    throw new BudgetValidationError(toIssues(result.error));
  }

  const doc = result.data;
  return Object.freeze({
    configuration: toConfiguration(doc.configuracao),
    fixedExpenses: Object.freeze(
      doc.gastos_fixos.map((g) => Object.freeze({ name: g.nome, amount: g.valor, category: g.categoria }))
    ),
    installments: Object.freeze(
      doc.parcelamentos.map((p) =>
        Object.freeze({ name: p.nome, amount: p.valor_parcela, start: p.inicio, end: p.fim })
      )
    ),
  });
}

/**
 * Best-effort installment name for error messages.
 */
function parcelamentoName(raw: unknown, index: string | number): string {
  const fallback = `parcelamentos[${index}]`;
  if (typeof raw !== "object" || raw === null || !("parcelamentos" in raw)) {
    return fallback;
  }
  const list = raw.parcelamentos;
  if (!Array.isArray(list) || typeof index !== "number") {
    return fallback;
  }
  const entry: unknown = list[index];
  if (typeof entry === "object" && entry !== null && "nome" in entry && typeof entry.nome === "string") {
    return entry.nome;
  }
  return fallback;
}

/**
 * Reads and validates a budget JSON file.
 *
 * @param filePath - Path to the budget file (relative paths resolve from cwd)
 * @throws BudgetValidationError when the file cannot be read or is not JSON
 */
export function loadBudgetFile(filePath: string = DEFAULT_BUDGET_FILE): BudgetData {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(path.resolve(filePath), "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new BudgetValidationError([{ path: "", message: `Failed to read "${filePath}": ${message}` }]);
  }
  return parseBudgetData(raw);
}
