import { Router, type Request, type Response } from "express";
import type { Scheduler } from "../schedule";

export function healthRouter(scheduler: Scheduler, cursorBackend: string) {
  const router = Router();

  // 1) Liveness
  router.get("/live", (_req: Request, res: Response) => {
    res.json({ ok: true, service: "disclosure-relay", status: "alive" });
  });

  // 2) What the poll loop is doing and how the last cycle went
  router.get("/status", (_req: Request, res: Response) => {
    const status = scheduler.status();
    res.json({ ok: status.state !== "terminated", cursorBackend, ...status });
  });

  return router;
}
