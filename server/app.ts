import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { AppConfig } from "./src/config";
import type { ComplianceEngine } from "./src/compliance/complianceEngine";
import { registerRoutes } from "./routes";
import { log } from "./log";

function errorStatus(err: unknown): number {
  if (err && typeof err === "object") {
    if ("status" in err && typeof err.status === "number") return err.status;
    if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  }
  return 500;
}

export function createApp(engine: ComplianceEngine, config: AppConfig): Express {
  const app = express();

  app.use(express.json({ limit: "5mb" }));
  app.use(express.urlencoded({ extended: false }));

  const verbosity = config.logging.verbosity;
  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;
    let capturedJsonResponse: unknown = undefined;

    const originalResJson = res.json;
    res.json = function (bodyJson) {
      capturedJsonResponse = bodyJson;
      return originalResJson.call(res, bodyJson);
    };

    res.on("finish", () => {
      if (verbosity === "minimal" || !path.startsWith("/api")) return;
      const duration = Date.now() - start;
      let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
      if (verbosity === "verbose" && capturedJsonResponse !== undefined) {
        logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
      }
      log(logLine);
    });

    next();
  });

  registerRoutes(app, { engine, config });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = errorStatus(err);
    const message = err instanceof Error && err.message ? err.message : "Internal Server Error";

    if (status >= 500) {
      console.error("[Server] Request failed:", err);
    }
    res.status(status).json({ message });
  });

  return app;
}
