/**
 * Error taxonomy for the projection engine and its loaders.
 * Every failure is a distinct subclass so callers can branch on `code`
 * (or `instanceof`) without parsing messages.
 */

export type ProjectionErrorCode =
  | "INVALID_REGION"
  | "INVALID_MONTH"
  | "MALFORMED_INSTALLMENT"
  | "BUDGET_VALIDATION";

export abstract class ProjectionError extends Error {
  abstract readonly code: ProjectionErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The holiday provider does not know the configured region.
 */
export class InvalidRegionError extends ProjectionError {
  readonly code = "INVALID_REGION" as const;

  constructor(readonly region: string) {
    super(`Unknown holiday region "${region}"`);
  }
}

/**
 * A month that cannot be computed: out-of-range month number, or a month
 * that classifies to zero workdays.
 */
export class InvalidMonthError extends ProjectionError {
  readonly code = "INVALID_MONTH" as const;

  constructor(readonly monthId: string, reason: string) {
    super(`Invalid month ${monthId}: ${reason}`);
  }
}

export class MalformedInstallmentError extends ProjectionError {
  readonly code = "MALFORMED_INSTALLMENT" as const;

  constructor(readonly installment: string, reason: string) {
    super(`Malformed installment "${installment}": ${reason}`);
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class BudgetValidationError extends ProjectionError {
  readonly code = "BUDGET_VALIDATION" as const;

  constructor(readonly issues: ValidationIssue[]) {
    super(
      `Invalid budget data: ${issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join("; ")}`
    );
  }
}
