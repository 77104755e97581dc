import { Router } from "express";
import type { DatabaseService } from "../services/database.service";

/**
 * Liveness and readiness probes
 */
export function createHealthRouter(database: Pick<DatabaseService, "testConnection">): Router {
  const router = Router();

  /**
   * Basic health check endpoint
   */
  router.get("/healthz", (_req, res) => {
    res.json({ status: "ok", service: "api" });
  });

  /**
   * Readiness check - verifies the vector store is reachable with SELECT 1
   */
  router.get("/readyz", async (_req, res) => {
    const result = await database.testConnection();
    if (result.success) {
      res.json({ ready: true });
    } else {
      res.status(503).json({ ready: false, reason: result.message });
    }
  });

  return router;
}
