/**
 * @fileoverview Content extraction pipeline — the orchestration layer.
 *
 * {@link extractText} runs every stage in a fixed order on one request's
 * HTML and assembles the result:
 *
 *   1. **Entity decode** (optional) — decode entities over the whole input.
 *   2. **Comment strip** — drop `<!-- ... -->` from the raw markup.
 *   3. **Parse** — build a cheerio tree.
 *   4. **Link harvest** — collect PDF / verification links from the full tree.
 *   5. **Container select** — pick the receipt container or a fallback.
 *   6. **Tag prune** — remove script, style, media and similar elements.
 *   7. **Render** — HTML to plain text, tables kept as aligned rows.
 *   8. **URL filter** — drop tracking URLs, line by line.
 *   9. **Noise scrub** — drop promotional phrases, compact lines.
 *  10. **Whitespace normalize** — cap blank lines, trim.
 *  11. **Link append** — add the harvested links as a trailer.
 *
 * Each call owns its trees and strings; the only shared state is the frozen
 * {@link ExtractionRules}. Nothing here performs I/O.
 *
 * @module extractor/pipeline
 */

import { decodeHTML } from "entities";
import type { ContainerFallback } from "../config.js";
import {
  ExtractionError,
  TextExtractorError,
  errorMessage,
} from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";
import { selectContainer, selectionHtml } from "./container-selector.js";
import { loadDocument } from "./dom-loader.js";
import {
  appendLinks,
  harvestLinks,
  type ImportantLinks,
} from "./link-harvester.js";
import { DEFAULT_RULES, type ExtractionRules } from "./rules.js";
import { pruneTags } from "./tag-pruner.js";
import { renderText } from "./text-renderer.js";
import {
  normalizeWhitespace,
  scrubNoise,
  stripHtmlComments,
} from "./text-cleaner.js";
import { filterTrackingUrls } from "./url-filter.js";

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

/**
 * The outcome of one extraction, serialized as the HTTP response body.
 *
 * `length` is always `text.length` (UTF-16 code units, as a JavaScript
 * client measures the string).
 *
 * @example
 * ```typescript
 * const result = extractText("<p>Итого: 100.00</p>");
 * result.text;   // "Итого: 100.00"
 * result.length; // 13
 * result.links;  // {}
 * ```
 */
export interface ExtractionResult {
  text: string;
  length: number;
  links: ImportantLinks;
}

/**
 * Options for one pipeline run. All are optional; the defaults give the
 * built-in OFD rules with the whole-document fallback.
 */
export interface ExtractOptions {
  /** @default DEFAULT_RULES */
  rules?: ExtractionRules;

  /** @default "document" */
  fallback?: ContainerFallback;

  /**
   * Decode HTML entities across the whole input before anything else.
   *
   * @default false
   */
  decodeInputEntities?: boolean;

  /** Receives debug events about container selection and pruning. */
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Extract clean, human-readable text from raw HTML.
 *
 * @param html    - The raw HTML document. Any string is accepted; malformed
 *                  markup is repaired by the parser.
 * @param options - See {@link ExtractOptions}.
 * @returns The text, its length and the harvested links.
 *
 * @throws {ParseError} If the parser cannot build a tree at all.
 * @throws {ExtractionError} If any later stage fails.
 *
 * @example
 * ```typescript
 * const result = extractText(receiptHtml, { rules, fallback: "readability", logger });
 * ```
 */
export function extractText(
  html: string,
  options: ExtractOptions = {},
): ExtractionResult {
  const rules = options.rules ?? DEFAULT_RULES;
  const fallback = options.fallback ?? "document";
  const logger = options.logger;

  try {
    const source = stripHtmlComments(
      options.decodeInputEntities ? decodeHTML(html) : html,
    );
    const $ = loadDocument(source);

    // Harvest before any stage detaches or replaces parts of the tree.
    const links = harvestLinks($);

    const selection = selectContainer($, rules.containers, fallback);
    if (selection.kind === "container" || selection.kind === "decoded") {
      logger?.debug(
        { selector: selection.selector, kind: selection.kind },
        "Found receipt container",
      );
    } else {
      logger?.debug({ kind: selection.kind }, "No receipt container, using fallback");
    }

    const pruned = pruneTags(selection, rules.unwantedTags);
    logger?.debug({ pruned }, "Removed unwanted elements");

    let text = renderText(selectionHtml(selection));
    text = filterTrackingUrls(text, rules);
    text = scrubNoise(text, rules.noisePatterns);
    text = normalizeWhitespace(text);
    text = appendLinks(text, links);

    return { text, length: text.length, links };
  } catch (error) {
    if (error instanceof TextExtractorError) throw error;
    throw new ExtractionError(errorMessage(error));
  }
}
