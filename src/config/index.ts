/**
 * Centralized configuration for the court forms search service.
 *
 * Reads every tunable from the environment once at startup:
 * - HTTP and JSON-RPC listener ports
 * - PostgreSQL / pgvector connection parameters
 * - Embedding model and vector dimensionality
 * - Search limits, similarity threshold and timeouts
 * - Crawler trigger endpoint
 * - Logging
 *
 * Presence of the OpenAI key is checked by the server bootstrap, not here, so
 * that modules importing the config stay loadable without credentials.
 */
import path from "path";

import dotenv from "dotenv";

dotenv.config();

export type VectorStoreDriver = "pgvector" | "memory";

function readVectorStore(value: string | undefined): VectorStoreDriver {
  return value === "memory" ? "memory" : "pgvector";
}

function readBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === "") {
    return fallback;
  }

  return !["false", "0", "no", "off"].includes(value.toLowerCase());
}

/**
 * Numeric setting with a default for unset or empty values. Anything that is
 * not a finite number stops startup.
 */
export function readNumber(
  name: string,
  fallback: number,
  env: NodeJS.ProcessEnv = process.env
): number {
  const raw = env[name];

  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }

  const value = Number(raw);

  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a number, got "${raw}"`);
  }

  return value;
}

function fromCwd(value: string): string {
  return path.isAbsolute(value) ? value : path.join(process.cwd(), value);
}

export const config = {
  env: process.env.NODE_ENV || "development",

  port: readNumber("PORT", 3000),
  rpcPort: readNumber("RPC_PORT", 8052),

  openai: {
    key: process.env.OPENAI_API_KEY || "",
    embeddingModel:
      process.env.OPENAI_EMBEDDING_MODEL || "text-embedding-3-small",
    baseUrl: process.env.OPENAI_BASE_URL || undefined,
  },

  embedding: {
    dimensions: readNumber("EMBEDDING_DIMENSIONS", 384),
  },

  db: {
    connectionString: process.env.DATABASE_URL || undefined,
    host: process.env.DB_HOST || "localhost",
    port: readNumber("DB_PORT", 5432),
    user: process.env.DB_USER,
    password: process.env.DB_PASSWORD,
    database: process.env.DB_NAME,
    max: readNumber("DB_POOL_MAX", 10),
    idleTimeoutMs: readNumber("DB_IDLE_TIMEOUT_MS", 30000),
    connectionTimeoutMs: readNumber("DB_CONN_TIMEOUT_MS", 10000),
  },

  store: {
    driver: readVectorStore(process.env.VECTOR_STORE),
    catalogPath: fromCwd(process.env.FORMS_CATALOG_PATH || "data/forms.json"),
  },

  guidance: {
    dataPath: fromCwd(process.env.GUIDANCE_PATH || "data/guidance.json"),
  },

  search: {
    defaultLimit: readNumber("SEARCH_DEFAULT_LIMIT", 5),
    maxResults: readNumber("SEARCH_MAX_RESULTS", 20),
    similarityThreshold: readNumber("SEARCH_SIMILARITY_THRESHOLD", 0),
    timeoutMs: readNumber("SEARCH_TIMEOUT_MS", 5000),
    // An explicitly empty SEARCH_SOURCE_ID disables source filtering.
    sourceId:
      process.env.SEARCH_SOURCE_ID ?? "california_courts_comprehensive",
  },

  crawler: {
    url: process.env.CRAWLER_URL || undefined,
    // Each tools/call returns only once its crawl has finished.
    timeoutMs: readNumber("CRAWLER_TIMEOUT_MS", 600000),
    formsUrl:
      process.env.CRAWLER_FORMS_URL ||
      "https://selfhelp.courts.ca.gov/find-forms",
  },

  http: {
    publicDir: fromCwd(process.env.PUBLIC_DIR || "public"),
  },

  observability: {
    logLevel: process.env.LOG_LEVEL || "info",
    logToFile: readBoolean(process.env.LOG_TO_FILE, true),
    logDir: fromCwd(process.env.LOG_DIR || "logs"),
  },
} as const;

export type AppConfig = typeof config;
