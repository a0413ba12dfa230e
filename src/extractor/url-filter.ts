/**
 * @fileoverview Remove tracking URLs from rendered text.
 *
 * Works line by line on text, not on the DOM. The first URL of a line
 * decides: when it matches a tracking pattern and no keep pattern, every URL
 * on that line is removed. The rest of the line stays as it was.
 *
 * @module extractor/url-filter
 */

import type { ExtractionRules } from "./rules.js";

/** `http(s)://` up to the first whitespace, quote or angle bracket. */
const URL_PATTERN = /https?:\/\/[^\s<>"]+/;

const URL_PATTERN_GLOBAL = new RegExp(URL_PATTERN.source, "g");

export type UrlPatterns = Pick<
  ExtractionRules,
  "trackingUrlPatterns" | "keepUrlPatterns"
>;

/**
 * Whether a URL should be dropped: it is tracking and not keep-listed.
 */
export function isTrackingUrl(url: string, patterns: UrlPatterns): boolean {
  const tracking = patterns.trackingUrlPatterns.some((p) => p.test(url));
  if (!tracking) return false;
  return !patterns.keepUrlPatterns.some((p) => p.test(url));
}

/**
 * Remove the URLs of every line whose first URL satisfies
 * {@link isTrackingUrl}.
 *
 * @example
 * ```typescript
 * filterTrackingUrls(
 *   "Акция: https://share.floctory.com/x\nhttps://www.nalog.gov.ru/check",
 *   DEFAULT_RULES,
 * );
 * // "Акция: \nhttps://www.nalog.gov.ru/check"
 * ```
 */
export function filterTrackingUrls(text: string, patterns: UrlPatterns): string {
  return text
    .split("\n")
    .map((line) => {
      const match = URL_PATTERN.exec(line);
      if (!match || !isTrackingUrl(match[0], patterns)) return line;
      return line.replace(URL_PATTERN_GLOBAL, "");
    })
    .join("\n");
}
