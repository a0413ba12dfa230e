/**
 * @module config
 * @fileoverview Centralized service configuration loaded from environment variables.
 *
 * Every setting has a default so the service starts with no environment at all.
 * This module imports nothing from the application itself; the HTTP entry point,
 * the MCP entry point and the logger all read from it.
 *
 * ```
 *  +-----------+   +-----------+   +-----------+
 *  |  index    |   |   mcp     |   |  logger   |
 *  +-----+-----+   +-----+-----+   +-----+-----+
 *        |               |               |
 *        +-------+-------+-------+-------+
 *                |
 *          +-----v-----+
 *          |  config   |
 *          +-----------+
 * ```
 *
 * ## Environment Variable Naming Convention
 * - All uppercase with underscores (SCREAMING_SNAKE_CASE).
 * - Numeric values are parsed with `parseInt(..., 10)`.
 * - Boolean values are `"true"` / `"false"` (case-insensitive); anything else is false.
 *
 * @example
 * ```ts
 * import { config } from "./config.js";
 * console.log(config.port); // 5000
 *
 * // For tests, pass an explicit environment:
 * const testConfig = loadConfig({ PORT: "8080" });
 * console.log(testConfig.port); // 8080
 * ```
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Type Definitions
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Strategy used when none of the known receipt containers is present.
 *
 * - `"document"`: render the whole parsed document.
 * - `"readability"`: run Mozilla Readability and render its article fragment,
 *   falling back to the whole document when it finds no article.
 */
export type ContainerFallback = "document" | "readability";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

/**
 * Complete service configuration.
 */
export interface AppConfig {
  /**
   * Username accepted by HTTP Basic authentication on `/extract-text`.
   *
   * @default "admin"
   */
  authUsername: string;

  /**
   * Password accepted by HTTP Basic authentication on `/extract-text`.
   *
   * @default "password"
   */
  authPassword: string;

  /** @default "0.0.0.0" */
  host: string;

  /** @default 5000 */
  port: number;

  /**
   * Debug mode. Lowers the default log level to `debug`, which adds the
   * container-selection decision of every request to the log.
   *
   * @default false
   */
  debug: boolean;

  /**
   * Minimum pino log level. An explicit `LOG_LEVEL` wins over `DEBUG`.
   *
   * @default "info" ("debug" when DEBUG=true)
   */
  logLevel: LogLevel;

  /** @default "document" */
  containerFallback: ContainerFallback;

  /**
   * Decode HTML entities over the whole request body before parsing.
   *
   * Off by default: decoding first turns the escaped markup of an encoded
   * receipt container into live markup before the container rule can see it.
   *
   * @default false
   */
  decodeInputEntities: boolean;

  /**
   * Maximum accepted request body size in bytes. Larger bodies get a 413.
   *
   * @default 10485760 (10 MB)
   */
  maxBodySize: number;

  /**
   * Optional path to a JSON file overriding the built-in extraction rules
   * (containers, URL patterns, noise patterns, unwanted tags).
   *
   * @default undefined
   */
  rulesFile?: string;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Config Loader
 * ──────────────────────────────────────────────────────────────────────────── */

const LOG_LEVELS: readonly LogLevel[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

function parseBoolean(value: string | undefined): boolean {
  return (value ?? "").trim().toLowerCase() === "true";
}

function parseInteger(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? "", 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseLogLevel(value: string | undefined, debug: boolean): LogLevel {
  const normalized = (value ?? "").trim().toLowerCase();
  const match = LOG_LEVELS.find((level) => level === normalized);
  if (match) return match;
  return debug ? "debug" : "info";
}

function parseFallback(value: string | undefined): ContainerFallback {
  return (value ?? "").trim().toLowerCase() === "readability"
    ? "readability"
    : "document";
}

/**
 * Build a complete {@link AppConfig} from an environment map.
 *
 * Pure: reads only the given map, so tests can pass a literal object.
 * Unparseable numbers fall back to their defaults.
 *
 * @example
 * ```ts
 * loadConfig({}).port;                    // 5000
 * loadConfig({ DEBUG: "True" }).logLevel; // "debug"
 * ```
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const debug = parseBoolean(env.DEBUG);
  const rulesFile = env.RULES_FILE?.trim();

  return {
    authUsername: env.BASIC_AUTH_USERNAME ?? "admin",
    authPassword: env.BASIC_AUTH_PASSWORD ?? "password",
    host: env.HOST ?? "0.0.0.0",
    port: parseInteger(env.PORT, 5000),
    debug,
    logLevel: parseLogLevel(env.LOG_LEVEL, debug),
    containerFallback: parseFallback(env.CONTAINER_FALLBACK),
    decodeInputEntities: parseBoolean(env.DECODE_INPUT_ENTITIES),
    maxBodySize: parseInteger(env.MAX_BODY_SIZE, 10 * 1024 * 1024),
    ...(rulesFile ? { rulesFile } : {}),
  };
}

/* ────────────────────────────────────────────────────────────────────────────
 * Singleton Export
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Configuration snapshot taken once at module load. Call {@link loadConfig}
 * directly for a fresh one.
 */
export const config: AppConfig = loadConfig();
