import { Router, Request, Response } from "express";
import { QueryResponse } from "../types/query.types";
import { sendValidationError } from "../middleware/validation";
import { QueryValidators } from "../middleware/queryValidation";
import { logger } from "../lib/logger";
import { errorMessage } from "../lib/errors";
import type { QueryOrchestrator } from "../services/query-orchestrator.service";

/**
 * Routes for asking questions about the documentation
 */
export function createQueryRouter(orchestrator: Pick<QueryOrchestrator, "run">): Router {
  const router = Router();

  /**
   * POST /v1/query
   * Query the RAG pipeline with a natural language question
   */
  router.post("/v1/query", async (req: Request, res: Response) => {
    const body: unknown = req.body;
    const parsed = QueryValidators.parseQueryRequest(body);
    if (!parsed.success) {
      sendValidationError(res, parsed.errors);
      return;
    }

    try {
      const { query, limit } = parsed.request;
      logger.info({ queryLength: query.length, limit }, "Processing query request");

      const result = await orchestrator.run(query, { matchCount: limit });

      const response: QueryResponse = {
        query,
        answer: result.answer,
        status: result.status,
        context: result.documents.map(doc => ({ ...doc })),
        matches: result.documents.length
      };

      logger.info({ status: result.status, matches: response.matches, embeddingDegraded: result.embeddingDegraded }, "Query processed");
      res.json(response);
    } catch (error: unknown) {
      logger.error({ error }, "Query processing failed");
      res.status(500).json({
        error: "Internal server error",
        message: errorMessage(error)
      });
    }
  });

  return router;
}
