import express from "express";
import rateLimit from "express-rate-limit";
import { z } from "zod";
import type { TradingEngine } from "./application/trading-engine.js";

const StatusQuerySchema = z.object({
  limit: z.coerce.number().int().min(0).max(1000).optional(),
});

export interface AppDeps {
  engine: Pick<TradingEngine, "start" | "stop" | "isRunning" | "getStatus">;
  now?: () => number;
}

export function createApp(deps: AppDeps): express.Express {
  const { engine } = deps;
  const now = deps.now ?? Date.now;
  const app = express();
  app.use(express.json({ limit: "10kb" }));

  // Rate limit POST endpoints: 10 req/min per IP
  const postLimiter = rateLimit({ windowMs: 60_000, max: 10, standardHeaders: false, legacyHeaders: false }) as unknown as express.RequestHandler;

  app.get("/health", (_req, res) => {
    res.json({ status: "healthy", running: engine.isRunning(), timestamp: new Date(now()).toISOString() });
  });

  app.get("/api/status", (req, res) => {
    const parsed = StatusQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: "Invalid query", details: parsed.error.issues });
      return;
    }
    res.json(engine.getStatus(parsed.data.limit));
  });

  app.post("/api/start", postLimiter, (_req, res) => {
    const started = engine.start();
    res.json({ started, message: started ? "Trader started" : "Trader is already running" });
  });

  app.post("/api/stop", postLimiter, (_req, res) => {
    const stopped = engine.stop();
    res.json({ stopped, message: stopped ? "Trader stopping" : "Trader is not running" });
  });

  return app;
}
