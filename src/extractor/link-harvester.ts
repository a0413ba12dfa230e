/**
 * @fileoverview Harvest the few links worth keeping from a receipt page,
 * and append them to the extracted text as a trailer.
 *
 * Link targets are not rendered inline (the text renderer hides hrefs), so
 * the receipt PDF and the tax-service verification link are collected from
 * the full tree before any pruning and surfaced here instead.
 *
 * @module extractor/link-harvester
 */

import type * as cheerio from "cheerio";

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

/** The kinds of link that are harvested, in trailer order. */
export type LinkKind = "pdf" | "fns";

/**
 * At most one URL per {@link LinkKind}.
 *
 * Serialized as the `links` object of the HTTP response, so absent kinds
 * are left out rather than set to `undefined`.
 */
export type ImportantLinks = Partial<Record<LinkKind, string>>;

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Path fragment of receipt PDF downloads. */
const PDF_PATH = "/cheque/pdf";

/** PDF links whose target mentions this (any case) are the public offer, not the receipt. */
const PDF_EXCLUSION = "oferta";

/** Domain of the tax service's receipt verification. */
const FNS_DOMAIN = "nalog.gov.ru";

const LINKS_HEADER = "--- Ссылки ---";

const LINK_LABELS: Readonly<Record<LinkKind, string>> = {
  pdf: "PDF чека",
  fns: "Проверка ФНС",
};

const LINK_ORDER: readonly LinkKind[] = ["pdf", "fns"];

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Classify one href. PDF is checked first, so a link matching both kinds
 * counts as a PDF link only.
 */
export function classifyLink(href: string): LinkKind | null {
  if (href.includes(PDF_PATH) && !href.toLowerCase().includes(PDF_EXCLUSION)) {
    return "pdf";
  }
  if (href.includes(FNS_DOMAIN)) {
    return "fns";
  }
  return null;
}

/**
 * Collect the important links of a parsed page.
 *
 * Scans every `a[href]` in document order; a later match of a kind
 * overwrites an earlier one. Hrefs are taken verbatim, not resolved.
 *
 * @example
 * ```typescript
 * const $ = loadDocument('<a href="https://check.ofd.example/web/noauth/cheque/pdf?id=7">PDF</a>');
 * harvestLinks($); // { pdf: "https://check.ofd.example/web/noauth/cheque/pdf?id=7" }
 * ```
 */
export function harvestLinks($: cheerio.CheerioAPI): ImportantLinks {
  const links: ImportantLinks = {};

  $("a[href]").each((_index, element) => {
    const href = $(element).attr("href");
    if (!href) return;

    const kind = classifyLink(href);
    if (kind) {
      links[kind] = href;
    }
  });

  return links;
}

/**
 * Append the harvested links to the text as a labelled trailer.
 *
 * Returns the text unchanged when there are no links.
 *
 * @example
 * ```typescript
 * appendLinks("Итого: 100.00", { fns: "https://check.nalog.gov.ru/" });
 * // "Итого: 100.00\n\n--- Ссылки ---\nПроверка ФНС: https://check.nalog.gov.ru/"
 * ```
 */
export function appendLinks(text: string, links: ImportantLinks): string {
  const lines: string[] = [];
  for (const kind of LINK_ORDER) {
    const url = links[kind];
    if (url !== undefined) {
      lines.push(`${LINK_LABELS[kind]}: ${url}`);
    }
  }

  if (lines.length === 0) return text;
  return `${text}\n\n${LINKS_HEADER}\n${lines.join("\n")}`;
}
