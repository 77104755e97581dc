/**
 * Environment-driven configuration for the API service.
 * All variables are validated before any client is built.
 */

export interface DatabaseConfig {
  connectionString?: string;
  host: string;
  port: number;
  database: string;
  user?: string;
  password?: string;
  ssl: boolean;
}

export interface OpenAIConfig {
  apiKey: string;
  chatModel: string;
  embeddingModel: string;
  embeddingDimensions: number;
  timeoutMs: number;
}

export interface RetrievalConfig {
  source: string;
  matchCount: number;
  matchFunction: string;
}

export interface AppConfig {
  port: number;
  docsName: string;
  openai: OpenAIConfig;
  database: DatabaseConfig;
  retrieval: RetrievalConfig;
}

export const DEFAULT_CHAT_MODEL = "gpt-4o-mini";
export const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-small";
export const DEFAULT_EMBEDDING_DIMENSIONS = 1536;
export const DEFAULT_MATCH_COUNT = 5;
export const DEFAULT_MATCH_FUNCTION = "match_site_pages";
export const DEFAULT_DOCS_SOURCE = "ultravox_docs";
export const DEFAULT_DOCS_NAME = "Ultravox";

const SQL_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Check the shape of an OpenAI API key
 */
export function isValidOpenAIKey(key: unknown): key is string {
  return typeof key === "string" && key.startsWith("sk-") && key.length > 40;
}

/**
 * Check that a database URL uses a Postgres scheme
 */
export function isValidDatabaseUrl(url: string): boolean {
  return url.startsWith("postgres://") || url.startsWith("postgresql://");
}

function parsePositiveInt(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined || value === "") {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function requiredDatabaseVars(env: NodeJS.ProcessEnv): string[] {
  if (env.DATABASE_URL) {
    return [];
  }
  return ["DB_HOST", "DB_NAME", "DB_USER", "DB_PASSWORD"].filter(varName => !env[varName]);
}

/**
 * Validate required environment variables and build the typed config.
 * Throws on the first category of problem found.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const missingVars = [
    ...(env.OPENAI_API_KEY ? [] : ["OPENAI_API_KEY"]),
    ...requiredDatabaseVars(env),
  ];

  if (missingVars.length > 0) {
    throw new Error(`Missing required environment variables: ${missingVars.join(", ")}`);
  }

  const apiKey = env.OPENAI_API_KEY;
  if (!isValidOpenAIKey(apiKey)) {
    throw new Error("OPENAI_API_KEY has an invalid format");
  }

  const connectionString = env.DATABASE_URL || undefined;
  if (connectionString && !isValidDatabaseUrl(connectionString)) {
    throw new Error("Invalid DATABASE_URL. Must start with postgres:// or postgresql://");
  }

  const matchFunction = env.MATCH_FUNCTION || DEFAULT_MATCH_FUNCTION;
  if (!SQL_IDENTIFIER.test(matchFunction)) {
    throw new Error(`MATCH_FUNCTION must be a plain SQL identifier, got "${matchFunction}"`);
  }

  return {
    port: parsePositiveInt(env.PORT, 3000, "PORT"),
    docsName: env.DOCS_NAME || DEFAULT_DOCS_NAME,
    openai: {
      apiKey,
      chatModel: env.LLM_MODEL || DEFAULT_CHAT_MODEL,
      embeddingModel: env.EMBEDDING_MODEL || DEFAULT_EMBEDDING_MODEL,
      embeddingDimensions: parsePositiveInt(env.EMBEDDING_DIMENSIONS, DEFAULT_EMBEDDING_DIMENSIONS, "EMBEDDING_DIMENSIONS"),
      timeoutMs: parsePositiveInt(env.OPENAI_TIMEOUT_MS, 60_000, "OPENAI_TIMEOUT_MS"),
    },
    database: {
      connectionString,
      host: env.DB_HOST || "localhost",
      port: parsePositiveInt(env.DB_PORT, 5432, "DB_PORT"),
      database: env.DB_NAME || "postgres",
      user: env.DB_USER,
      password: env.DB_PASSWORD,
      ssl: env.DB_SSL !== "false",
    },
    retrieval: {
      source: env.DOCS_SOURCE || DEFAULT_DOCS_SOURCE,
      matchCount: parsePositiveInt(env.MATCH_COUNT, DEFAULT_MATCH_COUNT, "MATCH_COUNT"),
      matchFunction,
    },
  };
}
