/**
 * @module server/http
 * @fileoverview node:http adapter for the {@link Router}.
 *
 * Reads the request body (bounded by `maxBodySize`), hands a plain
 * {@link HttpRequest} to the router and writes its {@link HttpResponse} as
 * JSON. A body over the limit is answered with 413 before it reaches the
 * router.
 */

import {
  createServer,
  type IncomingHttpHeaders,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from "node:http";
import type { Readable } from "node:stream";
import { PayloadTooLargeError, errorMessage } from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";
import type { HttpRequest, HttpResponse, Router } from "./router.js";

export interface HttpServerOptions {
  /** Largest accepted request body in bytes. */
  maxBodySize: number;
  logger: Logger;
}

/**
 * Read a request body as UTF-8, failing once it grows past `limit` bytes.
 *
 * Over the limit the promise rejects, but the stream is left flowing and
 * the remaining chunks are discarded, so the connection stays usable for the
 * 413 reply.
 *
 * @throws {PayloadTooLargeError} When the body exceeds `limit`.
 */
export function readBody(stream: Readable, limit: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let settled = false;

    stream.on("data", (chunk: Buffer | string) => {
      if (settled) return;
      const buffer = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
      size += buffer.length;
      if (size > limit) {
        settled = true;
        chunks.length = 0;
        reject(new PayloadTooLargeError(limit));
        return;
      }
      chunks.push(buffer);
    });

    stream.once("end", () => {
      if (settled) return;
      settled = true;
      resolve(Buffer.concat(chunks).toString("utf8"));
    });

    stream.once("error", (error: Error) => {
      if (settled) return;
      settled = true;
      reject(error);
    });
  });
}

/** Lower-case header map with repeated headers joined by ", ". */
export function flattenHeaders(
  headers: IncomingHttpHeaders,
): Record<string, string | undefined> {
  const flat: Record<string, string | undefined> = {};
  for (const [name, value] of Object.entries(headers)) {
    flat[name.toLowerCase()] = Array.isArray(value) ? value.join(", ") : value;
  }
  return flat;
}

function requestPath(url: string | undefined): string {
  return new URL(url ?? "/", "http://localhost").pathname;
}

function send(res: ServerResponse, response: HttpResponse): void {
  const payload = JSON.stringify(response.body);
  res.writeHead(response.status, {
    ...response.headers,
    "Content-Type": "application/json",
    "Content-Length": Buffer.byteLength(payload),
  });
  res.end(payload);
}

async function handle(
  router: Router,
  options: HttpServerOptions,
  req: IncomingMessage,
  res: ServerResponse,
): Promise<void> {
  const remoteAddress = req.socket.remoteAddress ?? "unknown";

  let body: string;
  try {
    body = await readBody(req, options.maxBodySize);
  } catch (error) {
    if (error instanceof PayloadTooLargeError) {
      options.logger.error(
        { limit: error.limit, remoteAddress },
        "Request body too large",
      );
      send(res, {
        status: 413,
        headers: { Connection: "close" },
        body: { error: "Request body too large" },
      });
      return;
    }
    throw error;
  }

  const request: HttpRequest = {
    method: req.method ?? "GET",
    path: requestPath(req.url),
    headers: flattenHeaders(req.headers),
    body,
    remoteAddress,
  };

  send(res, router(request));
}

/**
 * Create (but do not start) the HTTP server.
 *
 * @example
 * ```ts
 * const server = createHttpServer(router, { maxBodySize: 1_048_576, logger });
 * server.listen(5000, "0.0.0.0");
 * ```
 */
export function createHttpServer(
  router: Router,
  options: HttpServerOptions,
): Server {
  return createServer((req, res) => {
    handle(router, options, req, res).catch((error: unknown) => {
      options.logger.error({ err: error }, "Unhandled request error");
      if (!res.headersSent) {
        send(res, {
          status: 500,
          headers: {},
          body: { error: `Error processing request: ${errorMessage(error)}` },
        });
      } else {
        res.destroy();
      }
    });
  });
}
