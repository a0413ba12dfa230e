/**
 * @fileoverview Parse HTML text into a queryable cheerio tree.
 *
 * cheerio parses with parse5, which follows the HTML5 error-recovery rules:
 * unclosed tags, stray end tags and misnested elements all produce a tree.
 * Anything the parser still throws on is reported as a {@link ParseError}.
 *
 * @module extractor/dom-loader
 */

import * as cheerio from "cheerio";
import { ParseError, errorMessage } from "../utils/errors.js";

/**
 * Parse a full HTML document (`<html>`, `<head>` and `<body>` are implied
 * when missing).
 *
 * @throws {ParseError} If the parser cannot produce a tree.
 *
 * @example
 * ```typescript
 * const $ = loadDocument("<p>Hello <b>world");
 * $("b").text(); // "world"
 * ```
 */
export function loadDocument(html: string): cheerio.CheerioAPI {
  try {
    return cheerio.load(html);
  } catch (error) {
    throw new ParseError(`Failed to parse HTML: ${errorMessage(error)}`);
  }
}
