import { Pool, PoolConfig, QueryResult, QueryResultRow } from "pg";
import { DatabaseConfig } from "../lib/config";
import { logger } from "../lib/logger";
import { SqlQueries } from "./queries/sql.queries";

/**
 * Anything that can run a parameterised query
 */
export interface Queryable {
  query<T extends QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>>;
}

/**
 * Service for managing the PostgreSQL connection pool used by the vector store
 */
export class DatabaseService implements Queryable {
  private pool?: Pool;

  constructor(
    private readonly config: DatabaseConfig,
    private readonly sqlQueries: SqlQueries = new SqlQueries()
  ) {}

  /**
   * Initialize the connection pool
   */
  private initializePool(): Pool {
    if (this.pool) {
      return this.pool;
    }

    const connection: PoolConfig = this.config.connectionString
      ? { connectionString: this.config.connectionString }
      : {
          host: this.config.host,
          port: this.config.port,
          database: this.config.database,
          user: this.config.user,
          password: this.config.password,
        };

    this.pool = new Pool({
      ...connection,
      max: 20, // Maximum number of clients in the pool
      idleTimeoutMillis: 30000, // Close idle clients after 30 seconds
      connectionTimeoutMillis: 10000, // Return an error after 10 seconds if connection could not be established
      ssl: this.config.ssl ? { rejectUnauthorized: false } : false,
    });

    // Handle pool errors
    this.pool.on("error", (error) => {
      logger.error({ error }, "Unexpected error on idle database client");
    });

    logger.info(
      this.config.connectionString
        ? { connection: this.config.connectionString.replace(/:[^:@/]*@/, ":***@") }
        : { host: this.config.host, port: this.config.port, database: this.config.database },
      "Database pool initialized"
    );

    return this.pool;
  }

  /**
   * Execute a query directly
   */
  async query<T extends QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>> {
    const pool = this.initializePool();
    if (params) {
      return pool.query<T>(text, params);
    }
    return pool.query<T>(text);
  }

  /**
   * Test database connectivity
   */
  async testConnection(): Promise<{ success: boolean; message: string }> {
    try {
      const ok = await this.sqlQueries.executeHealthCheck(this);
      if (ok) {
        return {
          success: true,
          message: "Database connection successful",
        };
      }
      return {
        success: false,
        message: "Database returned unexpected result",
      };
    } catch (error: unknown) {
      logger.error({ error }, "Database connection test failed");
      return {
        success: false,
        message: error instanceof Error ? error.message : "Database connection failed",
      };
    }
  }

  /**
   * Close the connection pool
   */
  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = undefined;
      logger.info("Database pool closed");
    }
  }
}

export function createDatabaseService(config: DatabaseConfig): DatabaseService {
  return new DatabaseService(config);
}
