import express from "express";
import pinoHttp from "pino-http";
import { componentLogger } from "./lib/logger";
import { healthRouter } from "./routes/health";
import { adminRouter } from "./routes/admin";
import type { Scheduler } from "./schedule";

export type AppOptions = {
  scheduler: Scheduler;
  adminToken: string | null;
  cursorBackend: string;
};

export function createApp(opts: AppOptions) {
  const app = express();
  app.use(pinoHttp({ logger: componentLogger("server") }));

  app.get("/", (_req, res) => {
    res.send("disclosure relay is running");
  });
  app.use("/health", healthRouter(opts.scheduler, opts.cursorBackend));
  app.use("/admin", adminRouter(opts.scheduler, opts.adminToken));

  return app;
}
