import express, { Express, NextFunction, Request, Response } from "express";
import { createHealthRouter } from "./routes/health.routes";
import { createQueryRouter } from "./routes/query.routes";
import { requestIdMiddleware } from "./middleware/requestId";
import { commonValidationMiddleware, sendValidationError } from "./middleware/validation";
import { logger } from "./lib/logger";
import type { QueryOrchestrator } from "./services/query-orchestrator.service";
import type { DatabaseService } from "./services/database.service";

export interface AppDependencies {
  orchestrator: Pick<QueryOrchestrator, "run">;
  database: Pick<DatabaseService, "testConnection">;
  /** Called for every response so the server can track in-flight requests */
  onResponse?: (res: Response) => void;
}

function isBodyParseError(error: unknown): error is { type: string } {
  return typeof error === "object" && error !== null && "type" in error && error.type === "entity.parse.failed";
}

/**
 * Build the Express application. Listening and shutdown belong to the caller.
 */
export function createApp({ orchestrator, database, onResponse }: AppDependencies): Express {
  const app = express();

  app.disable("x-powered-by");

  app.use(requestIdMiddleware);

  if (onResponse) {
    app.use((_req, res, next) => {
      onResponse(res);
      next();
    });
  }

  app.use(commonValidationMiddleware);
  app.use(express.json({ limit: "1mb", type: "application/json" }));

  app.use(createHealthRouter(database));
  app.use(createQueryRouter(orchestrator));

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(error)) {
      sendValidationError(res, [{ field: "body", message: "Request body must be valid JSON" }]);
      return;
    }
    logger.error({ error }, "Unhandled request error");
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
