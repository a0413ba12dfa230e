#!/usr/bin/env node
/**
 * @module index
 * @fileoverview receipt-text-extractor HTTP service entry point.
 *
 * ## Startup Flow
 * 1. Load configuration from environment variables (via {@link config})
 * 2. Create the pino root logger
 * 3. Load the extraction rules (built-in, or `RULES_FILE`)
 * 4. Wire the Basic auth guard and the extraction pipeline into the router
 * 5. Listen on `HOST:PORT`; close the server on SIGINT / SIGTERM
 *
 * ## Architecture
 * ```
 * HTTP client
 *   |
 *   v
 * server/http.ts  -- body reading, 413
 *   |
 *   v
 * server/router.ts -- /health, /extract-text, auth guard, validation
 *   |
 *   v
 * extractor/pipeline.ts -- HTML -> { text, length, links }
 * ```
 *
 * ## Environment Variables
 * See {@link AppConfig}: `BASIC_AUTH_USERNAME`, `BASIC_AUTH_PASSWORD`,
 * `HOST`, `PORT`, `DEBUG`, `LOG_LEVEL`, `CONTAINER_FALLBACK`,
 * `DECODE_INPUT_ENTITIES`, `MAX_BODY_SIZE`, `RULES_FILE`.
 */

import { config } from "./config.js";
import { extractText } from "./extractor/pipeline.js";
import { DEFAULT_RULES, loadRulesFile } from "./extractor/rules.js";
import { BasicAuthGuard } from "./server/auth.js";
import { createHttpServer } from "./server/http.js";
import { createRouter } from "./server/router.js";
import { createLogger } from "./utils/logger.js";

const logger = createLogger(config);

async function main(): Promise<void> {
  const rules = config.rulesFile
    ? await loadRulesFile(config.rulesFile)
    : DEFAULT_RULES;
  if (config.rulesFile) {
    logger.info({ rulesFile: config.rulesFile }, "Loaded extraction rules");
  }

  const router = createRouter({
    guard: new BasicAuthGuard(config.authUsername, config.authPassword),
    logger,
    extract: (html, log) =>
      extractText(html, {
        rules,
        fallback: config.containerFallback,
        decodeInputEntities: config.decodeInputEntities,
        logger: log,
      }),
  });

  const server = createHttpServer(router, {
    maxBodySize: config.maxBodySize,
    logger,
  });

  server.listen(config.port, config.host, () => {
    logger.info(
      `Starting HTTP server on ${config.host}:${config.port} (debug=${config.debug})`,
    );
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, "Shutting down");
    server.close((error) => {
      if (error) {
        logger.error({ err: error }, "Error while closing server");
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, "Server error");
  process.exit(1);
});
