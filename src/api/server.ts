import express from "express";
import { createRouter } from "./routes";
import { AppConfig, loadConfig } from "../utils/config";

/**
 * Build the express application. Exported separately from `listen` so tests
 * can drive it in-process.
 */
export function createApp(config: AppConfig): express.Express {
  const app = express();

  // Middleware
  app.use(express.json());

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
  app.use("/api", createRouter({ strictByDefault: config.strictValidation }));

  // Root endpoint
  app.get("/", (req, res) => {
    res.json({
      message: "Investment Return Calculator API",
      version: "1.0.0",
      endpoints: {
        calculate: "POST /api/calculate",
        health: "GET /api/health",
      },
    });
  });

  // Error handling middleware
  app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    console.error("Unhandled error:", err);
    const status = err instanceof SyntaxError ? 400 : 500;
    res.status(status).json({
      error: status === 400 ? "Malformed JSON body" : "Internal server error",
      message: err instanceof Error ? err.message : String(err),
    });
  });

  return app;
}

const config = loadConfig();
const app = createApp(config);

// Start server
if (require.main === module) {
  app.listen(config.port, () => {
    console.log(`Server running on port ${config.port}`);
    console.log(`API available at http://localhost:${config.port}/api`);
  });
}

export default app;
