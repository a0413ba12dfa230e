/**
 * @module utils/logger
 * @fileoverview pino logger factory.
 *
 * One root logger is created per process and handed down explicitly; request
 * handlers derive child loggers that carry `reqId` and `remoteAddress`.
 *
 * The HTTP entry point logs to stdout. The MCP entry point must keep stdout
 * free for JSON-RPC frames, so it passes file descriptor 2.
 */

import { pino, destination, type Logger } from "pino";
import type { AppConfig } from "../config.js";

export type { Logger };

export interface LoggerOptions {
  /** File descriptor to write to. @default 1 (stdout) */
  destination?: 1 | 2;
}

export function createLogger(
  cfg: Pick<AppConfig, "logLevel">,
  options: LoggerOptions = {},
): Logger {
  return pino(
    {
      name: "receipt-text-extractor",
      level: cfg.logLevel,
    },
    destination(options.destination ?? 1),
  );
}

/** A logger that drops everything; for tests and library callers. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
