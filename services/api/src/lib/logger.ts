import pino, { Logger } from "pino";
import { AsyncLocalStorage } from "async_hooks";

const level = process.env.LOG_LEVEL ?? "info";
const baseLogger = pino({ level, base: undefined, timestamp: pino.stdTimeFunctions.isoTime });

// AsyncLocalStorage to store request context
const requestContext = new AsyncLocalStorage<{ requestId: string; logger: Logger }>();

// Create a request-scoped logger that automatically includes request ID
function createRequestLogger(requestId: string): Logger {
  return baseLogger.child({ requestId });
}

// Run a function with request context
export function runWithRequestContext<T>(requestId: string, fn: () => T): T {
  const requestLogger = createRequestLogger(requestId);
  return requestContext.run({ requestId, logger: requestLogger }, fn);
}

type Level = "info" | "error" | "warn" | "debug";

function write(levelName: Level, objOrMsg: object | string, msg?: string): void {
  const actualLogger = requestContext.getStore()?.logger ?? baseLogger;
  if (typeof objOrMsg === "string") {
    actualLogger[levelName](objOrMsg);
  } else {
    actualLogger[levelName](objOrMsg, msg);
  }
}

export interface AppLogger {
  info(msg: string): void;
  info(obj: object, msg?: string): void;
  error(msg: string): void;
  error(obj: object, msg?: string): void;
  warn(msg: string): void;
  warn(obj: object, msg?: string): void;
  debug(msg: string): void;
  debug(obj: object, msg?: string): void;
}

// Simple logger that checks context - no Proxy overhead
export const logger: AppLogger = {
  info: (objOrMsg: object | string, msg?: string) => write("info", objOrMsg, msg),
  error: (objOrMsg: object | string, msg?: string) => write("error", objOrMsg, msg),
  warn: (objOrMsg: object | string, msg?: string) => write("warn", objOrMsg, msg),
  debug: (objOrMsg: object | string, msg?: string) => write("debug", objOrMsg, msg),
};

