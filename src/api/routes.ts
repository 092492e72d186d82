import { Router, Request, Response } from "express";
import { ZodError } from "zod";
import { HolidayProvider } from "../holidays/provider";
import { BrazilHolidayProvider, SUPPORTED_REGIONS } from "../holidays/brazil";
import { projectBudget, summarizeProjection } from "../engine/projection";
import { calculatePayslip } from "../engine/payroll";
import { BudgetData, getExpensesByCategory } from "../models/Budget";
import { DEFAULT_BUDGET_FILE, loadBudgetFile, parseBudgetData, toConfiguration } from "../storage/budgetStore";
import {
  BudgetValidationError,
  InvalidMonthError,
  InvalidRegionError,
  MalformedInstallmentError,
} from "../utils/errors";
import { DEFAULT_PROJECTION_MONTHS } from "../utils/constants";
import { YearMonth, currentYearMonth, formatYearMonth, parseYearMonth } from "../utils/time";
import { PayslipRequestSchema, ProjectionOptionsSchema, ProjectionQuerySchema } from "../utils/validation";

/**
 * Maps an error to an HTTP response. Validation and input errors are the
 * caller's to fix (4xx); anything else is logged and reported as 500.
 */
export function sendError(res: Response, error: unknown, context: string): void {
  if (error instanceof ZodError) {
    res.status(400).json({
      error: "Invalid request",
      message: "Request failed validation",
      details: error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
    });
    return;
  }
  if (error instanceof BudgetValidationError) {
    res.status(400).json({ error: error.code, message: error.message, details: error.issues });
    return;
  }
  if (error instanceof MalformedInstallmentError || error instanceof InvalidRegionError) {
    res.status(400).json({ error: error.code, message: error.message });
    return;
  }
  if (error instanceof InvalidMonthError) {
    res.status(422).json({ error: error.code, message: error.message, month: error.monthId });
    return;
  }

  console.error(`Error in ${context}:`, error);
  res.status(500).json({
    error: "Internal server error",
    message: error instanceof Error ? error.message : String(error),
  });
}

function resolveStart(start: string | undefined, now: Date): YearMonth {
  return (start !== undefined ? parseYearMonth(start) : null) ?? currentYearMonth(now);
}

function buildProjectionResponse(
  budget: BudgetData,
  start: YearMonth,
  months: number,
  holidays: HolidayProvider
) {
  const snapshots = projectBudget(budget, start, holidays, { months });
  return {
    start: formatYearMonth(start),
    months,
    region: budget.configuration.holidayRegion,
    expensesByCategory: getExpensesByCategory(budget.fixedExpenses),
    snapshots,
    summary: summarizeProjection(snapshots),
  };
}

export interface RouteOptions {
  holidays?: HolidayProvider;
  /** Budget file for GET /projection; read on every request. */
  budgetFile?: () => string;
  now?: () => Date;
}

/**
 * Builds the API router. Every projection request recomputes from scratch;
 * nothing is cached between requests.
 */
export function createRoutes(options: RouteOptions = {}): Router {
  const router = Router();
  const holidays = options.holidays ?? new BrazilHolidayProvider();
  const budgetFile = options.budgetFile ?? (() => process.env.BUDGET_FILE || DEFAULT_BUDGET_FILE);
  const now = options.now ?? (() => new Date());

  /**
   * GET /api/projection
   * Re-reads the budget file and projects from the requested (or current) month
   */
  router.get("/projection", (req: Request, res: Response) => {
    try {
      const query = ProjectionQuerySchema.parse(req.query);
      const budget = loadBudgetFile(budgetFile());
      const start = resolveStart(query.start, now());
      res.json(buildProjectionResponse(budget, start, query.months ?? DEFAULT_PROJECTION_MONTHS, holidays));
    } catch (error) {
      sendError(res, error, "projection from budget file");
    }
  });

  /**
   * POST /api/projection
   * Projects the budget document sent in the body
   */
  router.post("/projection", (req: Request, res: Response) => {
    try {
      const options = ProjectionOptionsSchema.parse(req.body ?? {});
      const budget = parseBudgetData(req.body);
      const start = resolveStart(options.start, now());
      res.json(buildProjectionResponse(budget, start, options.months ?? DEFAULT_PROJECTION_MONTHS, holidays));
    } catch (error) {
      sendError(res, error, "projection");
    }
  });

  /**
   * POST /api/payslip
   * Single-month payroll for explicit workday/rest-day counts
   */
  router.post("/payslip", (req: Request, res: Response) => {
    try {
      const request = PayslipRequestSchema.parse(req.body ?? {});
      const configuration = toConfiguration(request.configuracao);
      res.json(calculatePayslip(configuration, request.diasUteis, request.diasDescanso));
    } catch (error) {
      sendError(res, error, "payslip");
    }
  });

  /**
   * GET /api/holidays
   * Federative units with a bundled holiday calendar
   */
  router.get("/holidays", (req: Request, res: Response) => {
    res.json({ regions: SUPPORTED_REGIONS });
  });

  /**
   * GET /api/holidays/:region/:year
   * Holiday calendar used for rest-day classification
   */
  router.get("/holidays/:region/:year", (req: Request, res: Response) => {
    const year = Number(req.params.year);
    if (!Number.isInteger(year) || year < 1900 || year > 2199) {
      res.status(400).json({ error: "Invalid request", message: "year must be an integer between 1900 and 2199" });
      return;
    }
    try {
      const region = req.params.region.toUpperCase();
      if (holidays instanceof BrazilHolidayProvider) {
        res.json({ region, year, holidays: holidays.listHolidays(year, region) });
      } else {
        res.json({ region, year, holidays: [...holidays.holidaysFor(year, region)].sort().map((date) => ({ date })) });
      }
    } catch (error) {
      sendError(res, error, "holiday lookup");
    }
  });

  /**
   * GET /api
   * API information endpoint
   */
  router.get("/", (req: Request, res: Response) => {
    res.json({
      message: "Household payroll and budget projection API",
      version: "1.0.0",
      endpoints: {
        projectionFromFile: "GET /api/projection?start=YYYY-MM&months=N - Project the configured budget file",
        projection: "POST /api/projection - Project the budget document in the request body",
        payslip: "POST /api/payslip - DSR, INSS, IRRF and net salary for given day counts",
        regions: "GET /api/holidays - Supported federative units",
        holidays: "GET /api/holidays/:region/:year - Holidays used for rest-day classification",
        health: "GET /api/health - Health check",
      },
    });
  });

  /**
   * GET /api/health
   * Health check endpoint
   */
  router.get("/health", (req: Request, res: Response) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  return router;
}
