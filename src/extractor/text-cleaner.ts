/**
 * @fileoverview String-level cleanup stages of the extraction pipeline.
 *
 *   - {@link stripHtmlComments} runs on the raw markup, before parsing.
 *   - {@link scrubNoise} and {@link normalizeWhitespace} run on rendered text,
 *     after the URL filter.
 *
 * @module extractor/text-cleaner
 */

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const HTML_COMMENT_REGEX = /<!--[\s\S]*?-->/g;

const BLANK_LINE_RUN_REGEX = /\n{2,}/g;

const SPACE_RUN_REGEX = / {2,}/g;

/** Three or more line breaks: more than one blank line in a row. */
const EXCESSIVE_NEWLINES_REGEX = /\n{3,}/g;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Remove every `<!-- ... -->` comment from raw markup, including comments
 * spanning several lines.
 *
 * @example
 * ```typescript
 * stripHtmlComments("<!-- tracker --><p>Hi</p>"); // "<p>Hi</p>"
 * ```
 */
export function stripHtmlComments(html: string): string {
  return html.replace(HTML_COMMENT_REGEX, "");
}

/**
 * Remove promotional and decorative phrases, then compact the text.
 *
 * Noise patterns are applied in order and replaced with nothing. Removing a
 * phrase can leave an empty line behind, so compaction comes after: runs of
 * line breaks and of spaces collapse to one, every line is trimmed, and empty
 * lines are dropped.
 *
 * @param noisePatterns - Global regexes, as compiled in {@link ExtractionRules}.
 *
 * @example
 * ```typescript
 * scrubNoise("Итого: 100\n\nВыбрать подарок\nСпасибо", DEFAULT_RULES.noisePatterns);
 * // "Итого: 100\nСпасибо"
 * ```
 */
export function scrubNoise(
  text: string,
  noisePatterns: readonly RegExp[],
): string {
  let cleaned = text;
  for (const pattern of noisePatterns) {
    cleaned = cleaned.replace(pattern, "");
  }

  cleaned = cleaned
    .replace(BLANK_LINE_RUN_REGEX, "\n")
    .replace(SPACE_RUN_REGEX, " ");

  return cleaned
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join("\n");
}

/**
 * Cap blank-line runs at one blank line, strip trailing whitespace from every
 * line and trim the whole text. Idempotent.
 *
 * @example
 * ```typescript
 * normalizeWhitespace("  A  \n\n\n\nB\t\n"); // "A\n\nB"
 * ```
 */
export function normalizeWhitespace(text: string): string {
  return text
    .replace(EXCESSIVE_NEWLINES_REGEX, "\n\n")
    .split("\n")
    .map((line) => line.trimEnd())
    .join("\n")
    .trim();
}
