import "dotenv/config";
import { createServer } from "http";
import { createApp } from "./app";
import { log } from "./log";
import { loadConfig } from "./src/config";
import { ComplianceEngine, loadReferenceData, ReferenceDataError } from "./src/compliance";

process.on("unhandledRejection", (reason) => {
  console.error("[Process] Unhandled Rejection:", reason);
});

process.on("uncaughtException", (error) => {
  console.error("[Process] Uncaught Exception:", error);
  process.exit(1);
});

(async () => {
  try {
    const config = loadConfig();
    const ref = await loadReferenceData(config.referenceData);
    const engine = new ComplianceEngine(ref, config.engine);

    const app = createApp(engine, config);
    const httpServer = createServer(app);

    function shutdown(signal: string) {
      log(`Received ${signal}, shutting down`, "process");
      httpServer.close(() => process.exit(0));
    }
    process.on("SIGTERM", () => shutdown("SIGTERM"));
    process.on("SIGINT", () => shutdown("SIGINT"));

    const port = config.server.port;
    httpServer.listen(port, "0.0.0.0", () => {
      log(`serving on port ${port}`);
    });
  } catch (error) {
    console.error("Failed to start server:", error);
    if (error instanceof ReferenceDataError) {
      for (const issue of error.issues) {
        console.error(`  ${error.source} ${issue.field || "(root)"}: ${issue.message}`);
      }
    }
    process.exit(1);
  }
})();
