import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import type { TemporalEnv } from "./types.js";
import { createHealthRouter } from "./routes/health.js";
import { createTemporalRouter } from "./routes/temporal.js";
import { createCalendarRouter } from "./routes/calendar.js";
import { createPlannerRouter } from "./routes/planner.js";

export type AppOptions = {
  apiKey: string | null;
};

function apiKeyMiddleware(apiKey: string | null) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!apiKey) return next();
    if (req.path.toLowerCase().startsWith("/health")) return next();
    const header = req.headers["authorization"];
    if (!header || !header.startsWith("Bearer ")) return res.status(401).json({ error: "Unauthorized" });
    const token = header.slice("Bearer ".length).trim();
    if (token !== apiKey) return res.status(403).json({ error: "Forbidden" });
    return next();
  };
}

export function createApp(env: TemporalEnv, options: AppOptions) {
  const app = express();

  app.use(cors());
  app.use(express.json());
  app.use(apiKeyMiddleware(options.apiKey));

  app.use(createHealthRouter(env));
  app.use(createTemporalRouter(env));
  app.use(createCalendarRouter(env));
  app.use(createPlannerRouter(env));

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    console.error(`Unhandled error in ${req.method} ${req.path}:`, err);
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
