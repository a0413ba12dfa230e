/**
 * @module server/router
 * @fileoverview Routes of the HTTP surface, independent of the socket layer.
 *
 * The router maps an {@link HttpRequest} value to an {@link HttpResponse}
 * value; `server/http.ts` does the reading and writing. Routes:
 *
 * | Method | Path            | Auth  | Handler               |
 * |--------|-----------------|-------|-----------------------|
 * | GET    | `/health`       | none  | `{"status":"healthy"}`|
 * | POST   | `/extract-text` | Basic | extraction pipeline   |
 *
 * ```
 * HttpRequest ──> route lookup ──404/405──> HttpResponse
 *                     │
 *                     ├── /health ──> 200
 *                     │
 *                     └── /extract-text ──> AuthGuard ──401──> HttpResponse
 *                                               │
 *                                               ├── body validation ──400──>
 *                                               │
 *                                               └── extract() ──200 / 500──>
 * ```
 */

import { randomUUID } from "node:crypto";
import type { ExtractionResult } from "../extractor/pipeline.js";
import {
  TextExtractorError,
  ValidationError,
  errorMessage,
} from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";
import {
  BASIC_CHALLENGE,
  parseBasicAuthorization,
  type AuthGuard,
} from "./auth.js";
import { parseExtractRequest } from "./extract-request.js";

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

/** A fully-read request. Header names are lower-case. */
export interface HttpRequest {
  method: string;
  path: string;
  headers: Readonly<Record<string, string | undefined>>;
  body: string;
  remoteAddress: string;
}

/** A response whose `body` is serialized as JSON. */
export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: unknown;
}

export type ExtractFn = (html: string, logger: Logger) => ExtractionResult;

export interface RouterDeps {
  guard: AuthGuard;
  extract: ExtractFn;
  logger: Logger;
}

export type Router = (request: HttpRequest) => HttpResponse;

type RouteHandler = (request: HttpRequest, log: Logger) => HttpResponse;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function jsonResponse(
  status: number,
  body: unknown,
  headers: Record<string, string> = {},
): HttpResponse {
  return { status, headers, body };
}

// ---------------------------------------------------------------------------
// Router
// ---------------------------------------------------------------------------

/**
 * Build the request router.
 *
 * @example
 * ```ts
 * const route = createRouter({ guard, extract, logger });
 * const response = route({
 *   method: "GET", path: "/health", headers: {}, body: "", remoteAddress: "127.0.0.1",
 * });
 * // { status: 200, headers: {}, body: { status: "healthy" } }
 * ```
 */
export function createRouter(deps: RouterDeps): Router {
  const health: RouteHandler = (_request, log) => {
    log.info("Health check");
    return jsonResponse(200, { status: "healthy" });
  };

  const extractTextRoute: RouteHandler = (request, log) => {
    const credentials = parseBasicAuthorization(request.headers.authorization);
    if (!deps.guard.check(credentials)) {
      log.warn(`Authentication failed for ${request.remoteAddress}`);
      return jsonResponse(
        401,
        { error: "Authentication required" },
        { "WWW-Authenticate": BASIC_CHALLENGE },
      );
    }

    let html: string;
    try {
      html = parseExtractRequest(request.body, request.headers["content-type"]).html;
    } catch (error) {
      if (error instanceof ValidationError) {
        log.error(error.message);
        return jsonResponse(400, { error: error.message });
      }
      throw error;
    }

    log.info(
      { inputLength: html.length },
      `Processing HTML content from ${request.remoteAddress} (length: ${html.length})`,
    );

    try {
      const result = deps.extract(html, log);
      log.info(
        { outputLength: result.length },
        `Successfully extracted text (length: ${result.length})`,
      );
      return jsonResponse(200, result);
    } catch (error) {
      const message = `Error processing request: ${errorMessage(error)}`;
      log.error(
        {
          err: error,
          ...(error instanceof TextExtractorError ? { code: error.code } : {}),
        },
        message,
      );
      return jsonResponse(500, { error: message });
    }
  };

  const routes = new Map<string, ReadonlyMap<string, RouteHandler>>([
    ["/health", new Map([["GET", health]])],
    ["/extract-text", new Map([["POST", extractTextRoute]])],
  ]);

  return (request) => {
    const log = deps.logger.child({
      reqId: randomUUID(),
      method: request.method,
      path: request.path,
      remoteAddress: request.remoteAddress,
    });

    const methods = routes.get(request.path);
    if (!methods) {
      return jsonResponse(404, { error: "Not found" });
    }

    const handler = methods.get(request.method.toUpperCase());
    if (!handler) {
      return jsonResponse(
        405,
        { error: "Method not allowed" },
        { Allow: [...methods.keys()].join(", ") },
      );
    }

    return handler(request, log);
  };
}
