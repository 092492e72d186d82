/**
 * Shared constants for payroll and projection.
 * Tax tables are validated and frozen when the module loads.
 */

import { TaxTable } from "../models/TaxTable";
import { defineTaxTable } from "../engine/taxTable";

/** Months covered by a projection when no horizon is given. */
export const DEFAULT_PROJECTION_MONTHS = 12;

/** Largest horizon the API accepts. */
export const MAX_PROJECTION_MONTHS = 60;

/**
 * INSS 2024 employee contribution (Portaria Interministerial MPS/MF nº 2/2024).
 * Base above the ceiling pays the ceiling's contribution.
 */
export const INSS_2024: TaxTable = defineTaxTable({
  name: "INSS 2024",
  ceiling: 7786.02,
  brackets: [
    { upTo: 1412.0, rate: 0.075, deduction: 0 },
    { upTo: 2666.68, rate: 0.09, deduction: 21.18 },
    { upTo: 4000.03, rate: 0.12, deduction: 101.18 },
    { upTo: null, rate: 0.14, deduction: 181.18 },
  ],
});

/**
 * IRRF monthly table in force from February 2024.
 * Bases up to 2259.20 come out at zero through the clamp on the first bracket.
 */
export const IRRF_2024: TaxTable = defineTaxTable({
  name: "IRRF 2024",
  brackets: [
    { upTo: 2826.65, rate: 0.075, deduction: 169.44 },
    { upTo: 3751.05, rate: 0.15, deduction: 381.44 },
    { upTo: 4664.68, rate: 0.225, deduction: 662.77 },
    { upTo: null, rate: 0.275, deduction: 896.0 },
  ],
});
