/**
 * @module utils/errors
 * @fileoverview Custom error class hierarchy for receipt-text-extractor.
 *
 * Every error raised by the service extends {@link TextExtractorError}, which
 * carries a machine-readable `code` next to the human-readable `message`. The
 * HTTP router maps codes to status codes; the MCP tool prints them in brackets.
 *
 * ## Error Hierarchy
 * ```
 * Error (built-in)
 *   └── TextExtractorError (base)  ─── code: string
 *         ├── ValidationError       ─── "INVALID_REQUEST"     (400)
 *         ├── PayloadTooLargeError  ─── "PAYLOAD_TOO_LARGE"   (413)
 *         ├── ParseError            ─── "PARSE_FAILED"        (500)
 *         ├── ExtractionError       ─── "EXTRACTION_FAILED"   (500)
 *         └── ConfigError           ─── "CONFIG_INVALID"      (startup)
 * ```
 *
 * @example
 * ```ts
 * import { ValidationError, formatError } from "./utils/errors.js";
 *
 * try {
 *   throw new ValidationError("Invalid 'html' field");
 * } catch (err) {
 *   console.error(formatError(err));
 *   // => "[INVALID_REQUEST] Invalid 'html' field"
 * }
 * ```
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Base Error Class
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Base error class for all receipt-text-extractor errors.
 *
 * Subclasses get a stable {@link code} and a `name` matching their class so
 * stack traces read `ValidationError: ...` rather than `Error: ...`.
 */
export class TextExtractorError extends Error {
  /**
   * Machine-readable error code (SCREAMING_SNAKE_CASE). Codes are part of the
   * public surface; changing one is a breaking change.
   */
  public readonly code: string;

  /**
   * @param message - Human-readable description of what went wrong.
   * @param code    - Stable machine-readable error code.
   */
  constructor(message: string, code: string) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    if (typeof Error.captureStackTrace === "function") {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Concrete Error Subclasses
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Thrown when a request body fails validation: no JSON, no `html` key, or an
 * `html` value that is empty or not a string.
 */
export class ValidationError extends TextExtractorError {
  constructor(message: string) {
    super(message, "INVALID_REQUEST");
  }
}

/**
 * Thrown while reading a request body that grows past the configured limit.
 */
export class PayloadTooLargeError extends TextExtractorError {
  /** The limit that was exceeded, in bytes. */
  public readonly limit: number;

  constructor(limit: number) {
    super(`Request body exceeds limit of ${limit} bytes`, "PAYLOAD_TOO_LARGE");
    this.limit = limit;
  }
}

/**
 * Thrown when the HTML parser gives up on its input.
 *
 * The parser tolerates malformed markup, so this only surfaces for input it
 * cannot recover from at all.
 *
 * @example
 * ```ts
 * throw new ParseError("Failed to parse HTML: unexpected end of input");
 * ```
 */
export class ParseError extends TextExtractorError {
  constructor(message: string) {
    super(message, "PARSE_FAILED");
  }
}

/**
 * Thrown when any stage of the extraction pipeline fails: container
 * decoding, Readability, rendering or text cleanup.
 */
export class ExtractionError extends TextExtractorError {
  constructor(message: string) {
    super(message, "EXTRACTION_FAILED");
  }
}

/**
 * Thrown at startup when a rules file cannot be read, parsed or compiled.
 */
export class ConfigError extends TextExtractorError {
  constructor(message: string) {
    super(message, "CONFIG_INVALID");
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Error Formatting
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Message text of any caught value, without the code prefix.
 *
 * Used for the `Error processing request: <message>` body of a 500.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Convert any error (known or unknown) to a single human-readable line.
 *
 * - {@link TextExtractorError} subclasses: `"[CODE] message"`.
 * - Standard `Error` instances: just the `.message` property.
 * - Everything else: coerced via `String()`.
 *
 * @example
 * ```ts
 * formatError(new ParseError("bad input"));    // "[PARSE_FAILED] bad input"
 * formatError(new TypeError("x is undefined")); // "x is undefined"
 * formatError(42);                              // "42"
 * ```
 */
export function formatError(error: unknown): string {
  if (error instanceof TextExtractorError) {
    return `[${error.code}] ${error.message}`;
  }
  return errorMessage(error);
}
