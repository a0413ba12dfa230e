/**
 * @module server/extract-request
 * @fileoverview Validation of the `POST /extract-text` request body.
 *
 * Each way the body can be wrong has its own message, and every one of them
 * maps to a 400:
 *
 * | Body                                        | Message                            |
 * |---------------------------------------------|------------------------------------|
 * | not JSON content type, empty, unparseable   | `No JSON data provided`            |
 * | `null`, `false`, `0`, `""`, `[]`, `{}`      | `No JSON data provided`            |
 * | any other value without an `html` key       | `Missing 'html' field in request`  |
 * | `html` is empty, `null` or not a string     | `Invalid 'html' field`             |
 */

import { z } from "zod";
import { ValidationError } from "../utils/errors.js";

export const NO_JSON_MESSAGE = "No JSON data provided";
export const MISSING_HTML_MESSAGE = "Missing 'html' field in request";
export const INVALID_HTML_MESSAGE = "Invalid 'html' field";

/**
 * Zod schema for the request body. Keys other than `html` are ignored.
 */
export const ExtractRequestSchema = z.object({
  html: z
    .string({
      required_error: MISSING_HTML_MESSAGE,
      invalid_type_error: INVALID_HTML_MESSAGE,
    })
    .min(1, INVALID_HTML_MESSAGE),
});

type ExtractRequest = z.infer<typeof ExtractRequestSchema>;

function isJsonContentType(contentType: string | undefined): boolean {
  if (!contentType) return false;
  const mime = contentType.split(";")[0]?.trim().toLowerCase() ?? "";
  return mime === "application/json" || mime.endsWith("+json");
}

function isEmptyJson(value: unknown): boolean {
  if (value === null || value === false || value === 0 || value === "") {
    return true;
  }
  if (Array.isArray(value)) return value.length === 0;
  if (typeof value === "object") return Object.keys(value).length === 0;
  return false;
}

/**
 * Parse and validate a raw request body.
 *
 * @param body        - The body as received, decoded as UTF-8.
 * @param contentType - The request's `Content-Type` header.
 * @throws {ValidationError} With one of the messages in the table above.
 *
 * @example
 * ```ts
 * parseExtractRequest('{"html":"<p>Hi</p>"}', "application/json");
 * // { html: "<p>Hi</p>" }
 * ```
 */
export function parseExtractRequest(
  body: string,
  contentType: string | undefined,
): ExtractRequest {
  if (!isJsonContentType(contentType) || body.trim().length === 0) {
    throw new ValidationError(NO_JSON_MESSAGE);
  }

  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch {
    throw new ValidationError(NO_JSON_MESSAGE);
  }

  if (isEmptyJson(data)) {
    throw new ValidationError(NO_JSON_MESSAGE);
  }
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new ValidationError(MISSING_HTML_MESSAGE);
  }

  const parsed = ExtractRequestSchema.safeParse(data);
  if (!parsed.success) {
    throw new ValidationError(
      parsed.error.issues[0]?.message ?? INVALID_HTML_MESSAGE,
    );
  }
  return parsed.data;
}
