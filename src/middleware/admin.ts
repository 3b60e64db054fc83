import type { Request, Response, NextFunction } from "express";

/** Rejects unless `x-admin-token` matches. No token configured → 401. */
export function adminOnly(adminToken: string | null) {
  return (req: Request, res: Response, next: NextFunction) => {
    const token = req.header("x-admin-token") ?? "";
    if (!adminToken || token !== adminToken) {
      res.status(401).json({ ok: false, error: "unauthorized (admin)" });
      return;
    }
    next();
  };
}
