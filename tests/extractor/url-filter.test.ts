/**
 * @fileoverview Tests for tracking URL removal.
 *
 * Covers: isTrackingUrl, filterTrackingUrls.
 */

import { describe, it, expect } from "vitest";
import {
  filterTrackingUrls,
  isTrackingUrl,
} from "../../src/extractor/url-filter.js";
import { DEFAULT_RULES } from "../../src/extractor/rules.js";

// ---------------------------------------------------------------------------
// isTrackingUrl
// ---------------------------------------------------------------------------

describe("isTrackingUrl", () => {
  it("flags URLs on tracking domains", () => {
    expect(isTrackingUrl("https://mc.yandex.ru/watch/1", DEFAULT_RULES)).toBe(true);
    expect(isTrackingUrl("https://abc.page.link/x", DEFAULT_RULES)).toBe(true);
  });

  it("does not flag ordinary URLs", () => {
    expect(isTrackingUrl("https://example.com/", DEFAULT_RULES)).toBe(false);
  });

  it("lets a keep pattern override a tracking pattern", () => {
    const url = "https://urlstats.platformaofd.ru/r?to=nalog.gov.ru";
    expect(isTrackingUrl(url, DEFAULT_RULES)).toBe(false);
  });

  it("matches tracking patterns case-sensitively", () => {
    expect(isTrackingUrl("https://MC.YANDEX.RU/watch", DEFAULT_RULES)).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// filterTrackingUrls
// ---------------------------------------------------------------------------

describe("filterTrackingUrls", () => {
  it("removes a tracking URL and keeps the rest of the line", () => {
    const text = "Акция: https://share.floctory.com/x\nhttps://www.nalog.gov.ru/check";
    expect(filterTrackingUrls(text, DEFAULT_RULES)).toBe(
      "Акция: \nhttps://www.nalog.gov.ru/check",
    );
  });

  it("removes a tracking URL standing on its own line", () => {
    const text = "Итого\nhttps://cdn1.platformaofd.ru/checkmarketing/x\nСпасибо";
    expect(filterTrackingUrls(text, DEFAULT_RULES)).toBe("Итого\n\nСпасибо");
  });

  it("preserves a URL matching both tracking and keep patterns", () => {
    const text = "https://urlstats.platformaofd.ru/r?to=nalog.gov.ru";
    expect(filterTrackingUrls(text, DEFAULT_RULES)).toBe(text);
  });

  it("removes every URL of a line whose first URL is tracking", () => {
    const text = "https://mc.yandex.ru/a https://mc.yandex.ru/b";
    expect(filterTrackingUrls(text, DEFAULT_RULES)).toBe(" ");
  });

  it("removes later URLs along with a tracking first URL", () => {
    const text = "Акция https://page.link/x и https://example.com/y конец";
    expect(filterTrackingUrls(text, DEFAULT_RULES)).toBe("Акция  и  конец");
  });

  it("leaves a line alone when its first URL is not tracking", () => {
    const text = "https://example.com https://mc.yandex.ru/b";
    expect(filterTrackingUrls(text, DEFAULT_RULES)).toBe(text);
  });

  it("ends a URL at a double quote", () => {
    const text = 'see "https://page.link/abc" now';
    expect(filterTrackingUrls(text, DEFAULT_RULES)).toBe('see "" now');
  });

  it("returns text without URLs unchanged", () => {
    const text = "Молоко 89.90\nХлеб 45.00";
    expect(filterTrackingUrls(text, DEFAULT_RULES)).toBe(text);
  });
});
