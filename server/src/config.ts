import { join, resolve } from "path";

/**
 * Central app config. All values can be overridden via environment variables.
 * Set them in the shell (or the process manager) when running the server.
 */

/** Application display name (home banner, API docs). Env: APP_NAME */
export const APP_NAME = process.env.APP_NAME?.trim() || "Chatterbox";

/** Slug form of APP_NAME (lowercase, spaces to hyphens) for filenames. */
export const APP_NAME_SLUG = APP_NAME.toLowerCase().replace(/\s+/g, "-");

/** Server port. Env: PORT. Default 5555. */
export const PORT = Number(process.env.PORT) || 5555;

/** Server listen host. Env: HOST. Default "0.0.0.0". */
export const HOST = process.env.HOST?.trim() || "0.0.0.0";

/** Enable Fastify logger. Env: LOGGER. Set to "false" or "0" to disable. Default true. */
export const LOGGER =
  process.env.LOGGER !== "false" && process.env.LOGGER !== "0";

/** Trust X-Forwarded-* headers (set true when behind a reverse proxy). Env: TRUST_PROXY. Set to "false" or "0" to disable. Default true. */
export const TRUST_PROXY =
  process.env.TRUST_PROXY === "false" || process.env.TRUST_PROXY === "0"
    ? false
    : true;

/** CORS origin: true = allow request origin, false = no CORS. Env: CORS_ORIGIN. Default true. */
export const CORS_ORIGIN =
  process.env.CORS_ORIGIN !== undefined
    ? process.env.CORS_ORIGIN === "true" || process.env.CORS_ORIGIN === "1"
    : true;

/** Directory holding the SQLite database. Env: DATA_DIR. Default "data" under the working directory. */
export const DATA_DIR = resolve(
  process.env.DATA_DIR ?? join(process.cwd(), "data"),
);

/** SQLite database filename (under DATA_DIR). Env: DB_FILENAME. Default derived from APP_NAME (e.g. chatterbox.db). */
export const DB_FILENAME =
  process.env.DB_FILENAME?.trim() || `${APP_NAME_SLUG}.db`;

export const DB_PATH = join(DATA_DIR, DB_FILENAME);

/** Global rate limit: max requests per time window. Env: RATE_LIMIT_MAX. Default 100. */
export const RATE_LIMIT_MAX = Number(process.env.RATE_LIMIT_MAX) || 100;

/** Global rate limit: time window (e.g. "1 minute"). Env: RATE_LIMIT_TIME_WINDOW. Default "1 minute". */
export const RATE_LIMIT_TIME_WINDOW =
  process.env.RATE_LIMIT_TIME_WINDOW?.trim() || "1 minute";

/** Swagger UI route prefix. Env: SWAGGER_UI_ROUTE_PREFIX. Default "/docs". */
export const SWAGGER_UI_ROUTE_PREFIX =
  process.env.SWAGGER_UI_ROUTE_PREFIX?.trim() || "/docs";

/** Whether to serve Swagger UI. In non-production always true; in production set SWAGGER_ENABLED=true to enable. */
export const SWAGGER_ENABLED =
  process.env.NODE_ENV !== "production" ||
  process.env.SWAGGER_ENABLED === "true";
