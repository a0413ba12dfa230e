/**
 * @module tools/extract-text
 * @fileoverview MCP Tool: extract_text -- turn raw HTML into clean text.
 *
 * Runs the same pipeline as `POST /extract-text`. The tool result is the
 * extracted text, which already ends with the links trailer when the page
 * had a receipt PDF or verification link.
 *
 * ## Usage Example (from MCP client)
 * ```json
 * {
 *   "tool": "extract_text",
 *   "arguments": { "html": "<html><body><p>Итого: 100.00</p></body></html>" }
 * }
 * ```
 *
 * @see {@link extractText} for the extraction pipeline
 * @see {@link formatError} for error formatting
 */
import { z } from "zod";
import type { ExtractionResult } from "../extractor/pipeline.js";
import { formatError } from "../utils/errors.js";

/**
 * Zod schema for the `extract_text` tool parameters.
 *
 * A **plain object** with Zod fields, not wrapped in `z.object()`: the MCP
 * SDK `server.tool()` method takes the shape directly.
 */
export const ExtractTextSchema = {
  /** Raw HTML document to extract text from */
  html: z.string().min(1).describe("Raw HTML document to extract text from"),
};

interface ExtractTextParams {
  html: string;
}

/**
 * Build the handler for the `extract_text` tool around a configured
 * extraction function.
 *
 * Errors are returned as an `isError: true` result, not thrown.
 *
 * @example
 * ```typescript
 * const handle = createExtractTextHandler((html) => extractText(html, { rules }));
 * const result = await handle({ html: "<p>Hi</p>" });
 * // result.content[0].text === "Hi"
 * ```
 */
export function createExtractTextHandler(
  extract: (html: string) => ExtractionResult,
) {
  return async (params: ExtractTextParams) => {
    try {
      const result = extract(params.html);
      return {
        content: [{ type: "text" as const, text: result.text }],
      };
    } catch (error) {
      return {
        content: [{ type: "text" as const, text: formatError(error) }],
        isError: true,
      };
    }
  };
}
