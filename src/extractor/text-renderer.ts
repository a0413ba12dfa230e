/**
 * @fileoverview HTML-to-plain-text rendering with html-to-text.
 *
 * The converter is compiled once at module load with a fixed configuration:
 *
 *   - no word wrapping (receipt lines are kept whole);
 *   - link targets and `#anchor` URLs hidden, only anchor text is rendered;
 *   - images skipped;
 *   - headings and table header cells keep their case;
 *   - every table rendered as a column-aligned data table.
 *
 * Block elements become line breaks; paragraphs and headings get a blank
 * line around them. Later cleanup stages compact the spacing.
 *
 * @module extractor/text-renderer
 */

import { compile, type HtmlToTextOptions } from "html-to-text";
import { ExtractionError, errorMessage } from "../utils/errors.js";

const HEADINGS = ["h1", "h2", "h3", "h4", "h5", "h6"] as const;

const RENDER_OPTIONS: HtmlToTextOptions = {
  wordwrap: false,
  selectors: [
    { selector: "a", options: { ignoreHref: true, noAnchorUrl: true } },
    { selector: "img", format: "skip" },
    ...HEADINGS.map((selector) => ({ selector, options: { uppercase: false } })),
    {
      selector: "table",
      format: "dataTable",
      options: { uppercaseHeaderCells: false, maxColumnWidth: 200 },
    },
  ],
};

const convert = compile(RENDER_OPTIONS);

/**
 * Render HTML markup as plain text.
 *
 * @throws {ExtractionError} If the converter fails on the markup.
 *
 * @example
 * ```typescript
 * renderText("<h1>Чек</h1><p>Итого: 100.00</p>");
 * // "Чек\n\nИтого: 100.00"
 * ```
 */
export function renderText(html: string): string {
  try {
    return convert(html);
  } catch (error) {
    throw new ExtractionError(`Failed to render text: ${errorMessage(error)}`);
  }
}
