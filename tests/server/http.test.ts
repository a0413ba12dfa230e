/**
 * @fileoverview Tests for the node:http adapter.
 *
 * Covers: readBody, flattenHeaders, and createHttpServer listening on an
 * ephemeral loopback port inside the test process.
 */

import type { Server } from "node:http";
import { Readable } from "node:stream";
import { afterEach, describe, it, expect } from "vitest";
import { extractText } from "../../src/extractor/pipeline.js";
import { BasicAuthGuard } from "../../src/server/auth.js";
import {
  createHttpServer,
  flattenHeaders,
  readBody,
} from "../../src/server/http.js";
import { createRouter, type Router } from "../../src/server/router.js";
import { PayloadTooLargeError } from "../../src/utils/errors.js";
import { createSilentLogger } from "../../src/utils/logger.js";

const AUTH = `Basic ${Buffer.from("user:test-secret").toString("base64")}`;

// ---------------------------------------------------------------------------
// readBody / flattenHeaders
// ---------------------------------------------------------------------------

describe("readBody", () => {
  it("concatenates chunks as UTF-8", async () => {
    const stream = Readable.from([Buffer.from("{\"html\":"), Buffer.from("\"Чек\"}")]);
    await expect(readBody(stream, 1024)).resolves.toBe('{"html":"Чек"}');
  });

  it("reassembles a character split across chunks", async () => {
    const bytes = Buffer.from("Чек", "utf8");
    const stream = Readable.from([bytes.subarray(0, 1), bytes.subarray(1)]);
    await expect(readBody(stream, 1024)).resolves.toBe("Чек");
  });

  it("accepts a body exactly at the limit", async () => {
    const stream = Readable.from([Buffer.from("12345")]);
    await expect(readBody(stream, 5)).resolves.toBe("12345");
  });

  it("counts bytes, not characters", async () => {
    // 3 characters, 6 bytes
    const stream = Readable.from([Buffer.from("Чек", "utf8")]);
    await expect(readBody(stream, 5)).rejects.toBeInstanceOf(PayloadTooLargeError);
  });

  it("rejects a body over the limit", async () => {
    const stream = Readable.from([Buffer.from("123"), Buffer.from("456")]);
    await expect(readBody(stream, 5)).rejects.toThrow(
      "Request body exceeds limit of 5 bytes",
    );
  });

  it("reads an empty body", async () => {
    await expect(readBody(Readable.from([]), 5)).resolves.toBe("");
  });
});

describe("flattenHeaders", () => {
  it("joins repeated headers", () => {
    expect(
      flattenHeaders({
        "content-type": "application/json",
        "x-forwarded-for": ["10.0.0.1", "10.0.0.2"],
      }),
    ).toEqual({
      "content-type": "application/json",
      "x-forwarded-for": "10.0.0.1, 10.0.0.2",
    });
  });
});

// ---------------------------------------------------------------------------
// createHttpServer
// ---------------------------------------------------------------------------

describe("createHttpServer", () => {
  let server: Server | undefined;

  afterEach(async () => {
    const running = server;
    server = undefined;
    if (!running) return;
    running.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      running.close((error) => (error ? reject(error) : resolve()));
    });
  });

  async function start(router: Router, maxBodySize = 1024): Promise<string> {
    const started = createHttpServer(router, {
      maxBodySize,
      logger: createSilentLogger(),
    });
    server = started;
    await new Promise<void>((resolve) => {
      started.listen(0, "127.0.0.1", () => resolve());
    });
    const address = started.address();
    if (address === null || typeof address === "string") {
      throw new Error("server is not listening on a TCP port");
    }
    return `http://127.0.0.1:${address.port}`;
  }

  function extractRouter(): Router {
    return createRouter({
      guard: new BasicAuthGuard("user", "test-secret"),
      extract: (html, log) => extractText(html, { logger: log }),
      logger: createSilentLogger(),
    });
  }

  it("answers an authenticated extraction with JSON", async () => {
    const base = await start(extractRouter());
    const response = await fetch(`${base}/extract-text`, {
      method: "POST",
      headers: { Authorization: AUTH, "Content-Type": "application/json" },
      body: JSON.stringify({ html: "<h1>Title</h1><p>Body</p>" }),
    });

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe("application/json");
    await expect(response.json()).resolves.toEqual({
      text: "Title\nBody",
      length: 10,
      links: {},
    });
  });

  it("sends router headers such as the auth challenge", async () => {
    const base = await start(extractRouter());
    const response = await fetch(`${base}/extract-text`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ html: "<p>x</p>" }),
    });

    expect(response.status).toBe(401);
    expect(response.headers.get("www-authenticate")).toBe(
      'Basic realm="Login Required"',
    );
    await expect(response.json()).resolves.toEqual({
      error: "Authentication required",
    });
  });

  it("answers 413 for a body over the limit", async () => {
    const base = await start(extractRouter(), 1024);
    const response = await fetch(`${base}/extract-text`, {
      method: "POST",
      headers: { Authorization: AUTH, "Content-Type": "application/json" },
      body: JSON.stringify({ html: "x".repeat(2048) }),
    });

    expect(response.status).toBe(413);
    await expect(response.json()).resolves.toEqual({
      error: "Request body too large",
    });
  });

  it("answers 500 when the router throws", async () => {
    const base = await start(() => {
      throw new Error("router exploded");
    });
    const response = await fetch(`${base}/health`);

    expect(response.status).toBe(500);
    await expect(response.json()).resolves.toEqual({
      error: "Error processing request: router exploded",
    });
  });
});
