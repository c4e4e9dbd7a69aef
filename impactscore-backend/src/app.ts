// impactscore-backend/src/app.ts

import express from "express";
import cors from "cors";
import { AppConfig } from "./config";
import { createAlignmentRouter } from "./routes/alignment";
import { createCompetencyRouter } from "./routes/competencies";
import dateRangeRouter from "./routes/dateRange";

export const SERVICE_NAME = "impactscore-backend";

export function createApp(config: AppConfig): express.Express {
  const app = express();

  app.use(
    cors({
      origin: (origin, callback) => {
        // Requests without an origin (curl, server-to-server)
        if (!origin) {
          return callback(null, true);
        }
        if (config.allowedOrigins.includes(origin)) {
          return callback(null, true);
        }
        console.warn(`[CORS] Blocked origin: ${origin}`);
        return callback(new Error("Not allowed by CORS policy"), false);
      },
      credentials: true,
    })
  );

  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      service: SERVICE_NAME,
      policy: `${config.policy.id}@${config.policy.version}`,
    });
  });

  app.use("/api/date-range", dateRangeRouter);
  app.use("/api/alignment", createAlignmentRouter(config.policy));
  app.use("/api/competencies", createCompetencyRouter(config.policy));

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({
      ok: false,
      error: "Endpoint not found",
    });
  });

  // Global error handler
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    console.error(`[${new Date().toISOString()}] Unhandled error:`, err.message);
    // body-parser errors carry a 4xx status (bad JSON, oversized body)
    const status =
      "status" in err && typeof err.status === "number" && err.status >= 400 && err.status < 500
        ? err.status
        : 500;
    let message = "Internal server error";
    if (err instanceof SyntaxError) message = "Malformed JSON body";
    else if (status < 500) message = err.message;
    res.status(err instanceof SyntaxError ? 400 : status).json({ ok: false, error: message });
  });

  return app;
}
