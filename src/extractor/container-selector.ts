/**
 * @fileoverview Pick the part of a parsed page that holds the content.
 *
 * Receipt pages carry their content inside one of a few known containers;
 * the container rules list them in priority order. The first rule whose
 * selector matches decides the selection:
 *
 *   - **Standard rule** — the matched element itself, a live reference into
 *     the parsed tree.
 *   - **Encoded rule** — the matched element's text content is HTML-escaped
 *     markup. It is decoded and parsed into a fresh tree, but only when the
 *     text is longer than {@link MIN_ENCODED_CONTENT_LENGTH}; a shorter one
 *     does not count as a match and the next rule is tried.
 *
 * When nothing matches, the configured {@link ContainerFallback} applies:
 * the whole document, or the article fragment Mozilla Readability finds in it.
 *
 * @module extractor/container-selector
 */

import * as cheerio from "cheerio";
import { Readability } from "@mozilla/readability";
import type { AnyNode } from "domhandler";
import { decodeHTML } from "entities";
import { JSDOM } from "jsdom";
import type { ContainerFallback } from "../config.js";
import { loadDocument } from "./dom-loader.js";
import type { ContainerRule } from "./rules.js";

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

/**
 * The subtree chosen for rendering.
 *
 * `container` points into the request's own tree; every other kind owns a
 * tree of its own (`$`), rendered from its root.
 */
export type ContentSelection =
  | {
      kind: "container";
      $: cheerio.CheerioAPI;
      root: cheerio.Cheerio<AnyNode>;
      selector: string;
    }
  | { kind: "decoded"; $: cheerio.CheerioAPI; selector: string }
  | { kind: "readability"; $: cheerio.CheerioAPI }
  | { kind: "document"; $: cheerio.CheerioAPI };

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/**
 * Encoded containers whose text content is this long or shorter are ignored.
 * Near-empty placeholders of the encoded container exist on pages that carry
 * the receipt in a different container.
 */
export const MIN_ENCODED_CONTENT_LENGTH = 100;

// ---------------------------------------------------------------------------
// Internal Helpers
// ---------------------------------------------------------------------------

/**
 * Run Readability over a copy of the document and return its article HTML,
 * or `null` when it finds no article.
 */
function readabilityFragment(html: string): string | null {
  const dom = new JSDOM(html);
  try {
    const article = new Readability(dom.window.document).parse();
    return article?.content ? article.content : null;
  } finally {
    dom.window.close();
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Select the content subtree of a parsed page.
 *
 * Deterministic for a given tree and rule order. Never fails for lack of a
 * match: the fallback always yields a selection.
 *
 * @param $        - The request's parsed tree. Not mutated here.
 * @param rules    - Container rules, highest priority first.
 * @param fallback - What to use when no rule matches.
 *
 * @example
 * ```typescript
 * const $ = loadDocument('<div class="check_ctn"><p>Итого</p></div>');
 * const selection = selectContainer($, DEFAULT_RULES.containers, "document");
 * selection.kind; // "container"
 * ```
 */
export function selectContainer(
  $: cheerio.CheerioAPI,
  rules: readonly ContainerRule[],
  fallback: ContainerFallback,
): ContentSelection {
  for (const rule of rules) {
    const match = $(rule.selector).first();
    if (match.length === 0) continue;

    if (!rule.encoded) {
      return { kind: "container", $, root: match, selector: rule.selector };
    }

    // .text() has already decoded one level of entities; the second decode
    // unwraps containers that were escaped twice.
    const encoded = match.text();
    if (encoded.length > MIN_ENCODED_CONTENT_LENGTH) {
      return {
        kind: "decoded",
        $: loadDocument(decodeHTML(encoded)),
        selector: rule.selector,
      };
    }
  }

  if (fallback === "readability") {
    const fragment = readabilityFragment($.html());
    if (fragment !== null) {
      return { kind: "readability", $: loadDocument(fragment) };
    }
  }

  return { kind: "document", $ };
}

/**
 * Serialize a selection to HTML for the text renderer.
 *
 * A `container` selection serializes as the element's outer HTML; the other
 * kinds serialize their whole tree.
 */
export function selectionHtml(selection: ContentSelection): string {
  if (selection.kind === "container") {
    return selection.$.html(selection.root);
  }
  return selection.$.html();
}
