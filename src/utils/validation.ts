import { z } from "zod";
import { MAX_PROJECTION_MONTHS } from "./constants";
import { parseYearMonth } from "./time";

/**
 * Zod validation schemas for the persisted budget document and API requests.
 * Field names follow the stored JSON (Portuguese); the budget store maps
 * them to the camelCase domain model.
 */

/**
 * A "YYYY-MM" month string with a month number between 01 and 12.
 */
export const YearMonthSchema = z
  .string()
  .refine((value) => parseYearMonth(value) !== null, { message: "Expected a YYYY-MM month" });

/**
 * Schema for the payroll configuration block.
 * Daily benefit values are optional and default to zero.
 */
export const ConfiguracaoSchema = z.object({
  salario_base: z.number().positive(),
  produtividade_media: z.number().min(0),
  meta_investimento_percentual: z.number().min(0).max(1),
  estado_feriados: z
    .string()
    .trim()
    .length(2)
    .transform((uf) => uf.toUpperCase()),
  valor_diario_vt: z.number().min(0).default(0),
  valor_diario_va: z.number().min(0).default(0),
});

/**
 * Schema for a fixed monthly expense.
 */
export const GastoFixoSchema = z.object({
  nome: z.string().min(1),
  valor: z.number().min(0),
  categoria: z.string().min(1),
});

/**
 * Schema for an installment window. Start must not be after end.
 */
export const ParcelamentoSchema = z
  .object({
    nome: z.string().min(1),
    valor_parcela: z.number().min(0),
    inicio: YearMonthSchema,
    fim: YearMonthSchema,
  })
  .refine(
    (p) => {
      const start = parseYearMonth(p.inicio);
      const end = parseYearMonth(p.fim);
      // Unparseable months are reported by the field schemas
      if (!start || !end) return true;
      return start.year * 12 + start.month <= end.year * 12 + end.month;
    },
    { message: "inicio must not be after fim", path: ["fim"] }
  );

/**
 * Schema for the complete budget document.
 */
export const BudgetDocumentSchema = z.object({
  configuracao: ConfiguracaoSchema,
  gastos_fixos: z.array(GastoFixoSchema).default([]),
  parcelamentos: z.array(ParcelamentoSchema).default([]),
});

export type BudgetDocument = z.input<typeof BudgetDocumentSchema>;

/**
 * Projection request options sent alongside a budget document.
 */
export const ProjectionOptionsSchema = z.object({
  start: YearMonthSchema.optional(),
  months: z.number().int().min(1).max(MAX_PROJECTION_MONTHS).optional(),
});

/**
 * Single payslip request: configuration plus explicit day counts.
 */
export const PayslipRequestSchema = z.object({
  configuracao: ConfiguracaoSchema,
  diasUteis: z.number().int().min(1).max(31),
  diasDescanso: z.number().int().min(0).max(31),
});

/**
 * Query-string form of the projection options (all values arrive as strings).
 */
export const ProjectionQuerySchema = z.object({
  start: YearMonthSchema.optional(),
  months: z.coerce.number().int().min(1).max(MAX_PROJECTION_MONTHS).optional(),
});
