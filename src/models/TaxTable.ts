/**
 * Progressive withholding table structures
 */

export interface TaxBracket {
  upTo: number | null; // inclusive upper bound of the base; null for the top bracket
  rate: number; // marginal rate as a fraction
  deduction: number; // "parcela a deduzir" that linearizes the progressive calculation
}

export interface TaxTable {
  name: string;
  brackets: readonly TaxBracket[];
  ceiling?: number; // base is capped here before lookup (INSS "teto")
}
