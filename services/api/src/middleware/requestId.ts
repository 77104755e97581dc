import { Request, Response, NextFunction } from "express";
import { v4 as uuidv4 } from "uuid";
import { runWithRequestContext } from "../lib/logger";

export const REQUEST_ID_HEADER = "Request-Id";

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

/**
 * Reuse the caller's id when it is a plain token, otherwise mint a UUID.
 */
export function resolveRequestId(incoming: string | undefined): string {
  const candidate = incoming?.trim();
  return candidate && REQUEST_ID_PATTERN.test(candidate) ? candidate : uuidv4();
}

/**
 * Echo the request id and bind it to the logging context for the rest of the request
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const requestId = resolveRequestId(req.get(REQUEST_ID_HEADER));
  res.set(REQUEST_ID_HEADER, requestId);
  runWithRequestContext(requestId, next);
}
