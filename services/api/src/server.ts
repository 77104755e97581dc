import "dotenv/config";
import type { Server } from "http";
import type { Response } from "express";
import { createApp } from "./app";
import { AppConfig, loadConfig } from "./lib/config";
import { logger } from "./lib/logger";
import { QueryPipeline, createQueryPipeline } from "./services/pipeline";

let server: Server | null = null; // Store server reference for graceful shutdown
let pipeline: QueryPipeline | null = null;
let isShuttingDown = false; // Flag to prevent concurrent shutdown attempts
const activeConnections = new Set<Response>(); // Track active HTTP responses

function trackResponse(res: Response): void {
  activeConnections.add(res);
  res.on('finish', () => {
    activeConnections.delete(res);
  });
  res.on('close', () => {
    activeConnections.delete(res);
  });
}

/**
 * Initialize external clients before starting the server
 * This ensures clients are ready before serving traffic
 */
async function initializeClients(config: AppConfig): Promise<QueryPipeline> {
  logger.info("Initializing external clients...");

  const built = createQueryPipeline(config);

  const dbTest = await built.database.testConnection();
  if (!dbTest.success) {
    throw new Error(`Database connection failed: ${dbTest.message}`);
  }
  logger.info("Vector store connection verified");

  built.openai.getClient();

  logger.info("All external clients initialized successfully");
  return built;
}

/**
 * Graceful shutdown handler
 */
async function gracefulShutdown(signal: string): Promise<void> {
  // Prevent multiple shutdown attempts
  if (isShuttingDown) {
    logger.warn("Shutdown already in progress, ignoring signal");
    return;
  }

  isShuttingDown = true;
  logger.info({ signal }, "Received shutdown signal, starting graceful shutdown...");

  // Set a timeout to force exit if graceful shutdown takes too long
  const shutdownTimeout = setTimeout(() => {
    logger.error("Graceful shutdown timeout (25s), forcing exit");
    process.exit(1);
  }, 25000);

  try {
    // Step 1: Stop accepting new connections
    const activeServer = server;
    if (activeServer) {
      logger.info("Closing HTTP server to new connections...");

      await new Promise<void>((resolve, reject) => {
        activeServer.close((err) => {
          if (err) {
            logger.error({ error: err }, "Error closing HTTP server");
            reject(err);
          } else {
            logger.info("HTTP server closed, no longer accepting new connections");
            resolve();
          }
        });
      });

      // Step 2: Wait for in-flight requests to complete naturally
      const activeConnectionsCount = activeConnections.size;
      if (activeConnectionsCount > 0) {
        logger.info({ activeConnections: activeConnectionsCount }, "Waiting for active connections to finish...");

        while (activeConnections.size > 0) {
          await new Promise(resolve => setTimeout(resolve, 100));
        }

        logger.info("All active connections closed");
      }
    }

    // Step 3: Close database connections
    if (pipeline) {
      logger.info("Closing database connections...");
      await pipeline.database.close();
      logger.info("Database connections closed");
    }

    clearTimeout(shutdownTimeout);

    logger.info("Graceful shutdown completed successfully");
    process.exit(0);
  } catch (error) {
    logger.error({ error }, "Error during graceful shutdown");
    clearTimeout(shutdownTimeout);
    process.exit(1);
  }
}

// Handle shutdown signals
process.on('SIGTERM', () => {
  void gracefulShutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void gracefulShutdown('SIGINT');
});

// Run cleanup (DB pool, in-flight requests) before the process dies
process.on('uncaughtException', (error) => {
  logger.error({ error, stack: error.stack }, "Uncaught exception, shutting down gracefully");
  void gracefulShutdown('uncaughtException');
});

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, "Unhandled rejection, shutting down gracefully");
  void gracefulShutdown('unhandledRejection');
});

// Start server after validating config and initializing clients
async function startServer(): Promise<void> {
  try {
    const config = loadConfig();
    logger.info("Environment variables validated");

    pipeline = await initializeClients(config);

    const app = createApp({
      orchestrator: pipeline.orchestrator,
      database: pipeline.database,
      onResponse: trackResponse,
    });

    server = app.listen(config.port, () => {
      logger.info({ port: config.port }, "API server started and ready to serve traffic");
    });
  } catch (error) {
    logger.error({ error }, "Failed to start server");
    process.exit(1);
  }
}

void startServer();
