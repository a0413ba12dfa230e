/**
 * @fileoverview Tests for the error hierarchy and formatting helpers.
 */

import { describe, it, expect } from "vitest";
import {
  ConfigError,
  ExtractionError,
  ParseError,
  PayloadTooLargeError,
  TextExtractorError,
  ValidationError,
  errorMessage,
  formatError,
} from "../../src/utils/errors.js";

describe("error classes", () => {
  it.each([
    [new ValidationError("v"), "ValidationError", "INVALID_REQUEST"],
    [new ParseError("p"), "ParseError", "PARSE_FAILED"],
    [new ExtractionError("e"), "ExtractionError", "EXTRACTION_FAILED"],
    [new ConfigError("c"), "ConfigError", "CONFIG_INVALID"],
  ])("%s has its name and code", (error, name, code) => {
    expect(error).toBeInstanceOf(TextExtractorError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe(name);
    expect(error.code).toBe(code);
  });

  it("records the exceeded limit", () => {
    const error = new PayloadTooLargeError(512);
    expect(error.limit).toBe(512);
    expect(error.code).toBe("PAYLOAD_TOO_LARGE");
    expect(error.message).toBe("Request body exceeds limit of 512 bytes");
  });
});

describe("errorMessage", () => {
  it("returns the message of an Error", () => {
    expect(errorMessage(new ParseError("bad input"))).toBe("bad input");
  });

  it("stringifies anything else", () => {
    expect(errorMessage("plain")).toBe("plain");
    expect(errorMessage(42)).toBe("42");
  });
});

describe("formatError", () => {
  it("prefixes service errors with their code", () => {
    expect(formatError(new ParseError("bad input"))).toBe("[PARSE_FAILED] bad input");
  });

  it("returns the message of other errors", () => {
    expect(formatError(new TypeError("x is undefined"))).toBe("x is undefined");
  });

  it("coerces non-errors", () => {
    expect(formatError(null)).toBe("null");
  });
});
