// Copyright (c) 2026 Ahmad Faruk (Signal18 ID). All rights reserved.
// Ownership: Ahmad Faruk (Signal18 ID)

const DEFAULT_DB_PORT = 3306;
const DEFAULT_DB_CONNECTION_LIMIT = 10;
const DEFAULT_ALLOW_NEGATIVE_STOCK = true;
const DEFAULT_SALES_LIST_LIMIT = 5;
const MAX_LIST_LIMIT = 200;
const ENV_VALIDATION_PREFIX = "Invalid API environment configuration:";
const REPO_ROOT_ENV_AUTOLOAD_DISABLE_KEY = "VINSTOCK_DISABLE_REPO_ROOT_ENV_AUTOLOAD";

export function parsePositiveInt(value: string | undefined, fallback: number, key: string): number {
  if (value == null || value.length === 0) {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${key} must be a positive integer`);
  }

  return parsed;
}

export function parseBooleanString(value: string | undefined, fallback: boolean, key: string): boolean {
  if (value == null || value.length === 0) {
    return fallback;
  }

  const normalized = value.toLowerCase();
  if (normalized === "true") {
    return true;
  }

  if (normalized === "false") {
    return false;
  }

  throw new Error(`${key} must be "true" or "false"`);
}

function createEnvValidationError(cause: unknown): Error {
  const message = cause instanceof Error ? cause.message : "unknown configuration error";
  return new Error(
    `${ENV_VALIDATION_PREFIX} ${message}. Set required variables in server env (for local dev, update repo-root .env).`
  );
}

export type AppEnv = {
  db: {
    host: string;
    port: number;
    user: string;
    password: string;
    database: string;
    connectionLimit: number;
  };
  inventory: {
    allowNegativeStock: boolean;
  };
  sales: {
    defaultListLimit: number;
  };
};

let cachedEnv: AppEnv | null = null;
let cachedEnvError: Error | null = null;

function loadRepoRootEnv(): void {
  if (process.env.NODE_ENV === "production") {
    return;
  }

  if (process.env[REPO_ROOT_ENV_AUTOLOAD_DISABLE_KEY] === "true") {
    return;
  }

  if (process.env.DB_NAME) {
    return;
  }

  if (typeof process.loadEnvFile !== "function") {
    return;
  }

  const candidatePaths = [".env", "../.env", "../../.env"];

  for (const candidatePath of candidatePaths) {
    if (process.env.DB_NAME) {
      return;
    }

    try {
      process.loadEnvFile(candidatePath);
    } catch {
      // Ignore missing/unreadable path and continue probing.
    }
  }
}

export function getAppEnv(): AppEnv {
  loadRepoRootEnv();

  if (cachedEnv) {
    return cachedEnv;
  }

  if (cachedEnvError) {
    throw cachedEnvError;
  }

  try {
    const salesListLimit = parsePositiveInt(
      process.env.SALES_LIST_DEFAULT_LIMIT,
      DEFAULT_SALES_LIST_LIMIT,
      "SALES_LIST_DEFAULT_LIMIT"
    );
    if (salesListLimit > MAX_LIST_LIMIT) {
      throw new Error(`SALES_LIST_DEFAULT_LIMIT must not exceed ${MAX_LIST_LIMIT}`);
    }

    const env: AppEnv = {
      db: {
        host: process.env.DB_HOST ?? "127.0.0.1",
        port: parsePositiveInt(process.env.DB_PORT, DEFAULT_DB_PORT, "DB_PORT"),
        user: process.env.DB_USER ?? "root",
        password: process.env.DB_PASSWORD ?? "",
        database: process.env.DB_NAME ?? "vinstock",
        connectionLimit: parsePositiveInt(
          process.env.DB_CONNECTION_LIMIT,
          DEFAULT_DB_CONNECTION_LIMIT,
          "DB_CONNECTION_LIMIT"
        )
      },
      inventory: {
        allowNegativeStock: parseBooleanString(
          process.env.INVENTORY_ALLOW_NEGATIVE_STOCK,
          DEFAULT_ALLOW_NEGATIVE_STOCK,
          "INVENTORY_ALLOW_NEGATIVE_STOCK"
        )
      },
      sales: {
        defaultListLimit: salesListLimit
      }
    };

    cachedEnv = Object.freeze(env);
  } catch (error) {
    cachedEnvError = createEnvValidationError(error);
    throw cachedEnvError;
  }

  return cachedEnv;
}

export function assertAppEnvReady(): void {
  getAppEnv();
}

/**
 * Drops the cached configuration so the next read re-parses process.env.
 */
export function resetAppEnvCache(): void {
  cachedEnv = null;
  cachedEnvError = null;
}
