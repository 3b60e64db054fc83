import { Router, type Request, type Response } from "express";
import { adminOnly } from "../middleware/admin";
import type { Scheduler } from "../schedule";

export function adminRouter(scheduler: Scheduler, adminToken: string | null) {
  const router = Router();

  // Wakes the poll loop; cycles still never overlap
  router.post("/run", adminOnly(adminToken), (_req: Request, res: Response) => {
    if (!scheduler.requestRun()) {
      res.status(409).json({ ok: false, error: "monitor has stopped" });
      return;
    }
    res.status(202).json({ ok: true, state: scheduler.status().state });
  });

  return router;
}
