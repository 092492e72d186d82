import express from "express";
import { createRoutes, RouteOptions } from "./routes";

/**
 * Builds the express application. Route options allow a fixed holiday
 * calendar, budget file or clock to be injected.
 */
export function createApp(options: RouteOptions = {}): express.Express {
  const app = express();

  // Middleware
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // CORS headers for development
  app.use((req, res, next) => {
    res.header("Access-Control-Allow-Origin", "*");
    res.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.header("Access-Control-Allow-Headers", "Origin, X-Requested-With, Content-Type, Accept");
    if (req.method === "OPTIONS") {
      res.sendStatus(200);
    } else {
      next();
    }
  });

  // Routes
  app.use("/api", createRoutes(options));

  // Root endpoint
  app.get("/", (req, res) => {
    res.json({
      message: "Household payroll and budget projection API",
      version: "1.0.0",
      endpoints: {
        projection: "GET|POST /api/projection",
        payslip: "POST /api/payslip",
        holidays: "GET /api/holidays/:region/:year",
        health: "GET /api/health",
      },
    });
  });

  // Error handling middleware (malformed JSON bodies land here)
  app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "Invalid request", message: "Request body is not valid JSON" });
      return;
    }
    console.error("Unhandled error:", err);
    res.status(500).json({
      error: "Internal server error",
      message: err instanceof Error ? err.message : String(err),
    });
  });

  return app;
}

const app = createApp();
const PORT = process.env.PORT || 3000;

// Start server
if (require.main === module) {
  app.listen(PORT, () => {
    console.log(`Server running on port ${PORT}`);
    console.log(`API available at http://localhost:${PORT}/api`);
  });
}

export default app;
