import { Router } from "express";
import type { TemporalEnv } from "../types.js";

export function createHealthRouter(env: TemporalEnv) {
  const router = Router();

  router.get("/health", (_req, res) => {
    res.json({ ok: true, ts: env.clock.now().getTime() });
  });

  return router;
}
