import { TaxBracket, TaxTable } from "../models/TaxTable";

/**
 * Finds the bracket for a base: the first whose upper bound is ≥ base,
 * falling back to the unbounded top bracket.
 */
export function findBracket(baseAmount: number, table: TaxTable): TaxBracket {
  for (const bracket of table.brackets) {
    if (bracket.upTo === null || baseAmount <= bracket.upTo) {
      return bracket;
    }
  }
  // Only reachable for a table without an unbounded top bracket
  return table.brackets[table.brackets.length - 1];
}

/**
 * Applies a progressive withholding table to a base amount.
 * Formula: tax = base × rate − deduction, never below zero.
 *
 * @param baseAmount - Taxable base in reais
 * @param table - Bracket table (e.g. INSS_2024, IRRF_2024)
 * @returns Amount withheld
 *
 * @example
 * ```ts
 * withhold(2000, INSS_2024) // returns 158.82 (2000 × 9% − 21.18)
 * ```
 */
export function withhold(baseAmount: number, table: TaxTable): number {
  if (baseAmount <= 0 || table.brackets.length === 0) {
    return 0;
  }
  const base = table.ceiling !== undefined ? Math.min(baseAmount, table.ceiling) : baseAmount;
  const bracket = findBracket(base, table);
  return Math.max(0, base * bracket.rate - bracket.deduction);
}

/**
 * Checks the structural invariants of a table: ascending upper bounds,
 * exactly one unbounded bracket in last position, non-negative rates.
 *
 * @returns List of problems found (empty when the table is valid)
 */
export function validateTaxTable(table: TaxTable): string[] {
  const problems: string[] = [];
  const { brackets } = table;

  if (brackets.length === 0) {
    return [`${table.name}: table has no brackets`];
  }

  let previous = 0;
  brackets.forEach((bracket, index) => {
    const isLast = index === brackets.length - 1;
    if (bracket.rate < 0) {
      problems.push(`${table.name}: bracket ${index + 1} has a negative rate`);
    }
    if (bracket.upTo === null) {
      if (!isLast) {
        problems.push(`${table.name}: only the top bracket may be unbounded (bracket ${index + 1})`);
      }
      return;
    }
    if (isLast) {
      problems.push(`${table.name}: top bracket must have no upper bound`);
    }
    if (bracket.upTo <= previous) {
      problems.push(`${table.name}: bracket ${index + 1} upper bound must be above ${previous}`);
    }
    previous = bracket.upTo;
  });

  return problems;
}

/**
 * Validates a table and returns a deep-frozen copy.
 *
 * @throws Error listing every problem when the table is malformed
 */
export function defineTaxTable(table: TaxTable): TaxTable {
  const problems = validateTaxTable(table);
  if (problems.length > 0) {
    throw new Error(`Invalid tax table: ${problems.join("; ")}`);
  }
  const brackets = Object.freeze(table.brackets.map((bracket) => Object.freeze({ ...bracket })));
  return Object.freeze({ ...table, brackets });
}
