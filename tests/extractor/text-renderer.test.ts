/**
 * @fileoverview Tests for HTML-to-text rendering.
 */

import { describe, it, expect } from "vitest";
import { renderText } from "../../src/extractor/text-renderer.js";

/** Collapse the column padding of data tables for comparison. */
function compactLines(text: string): string[] {
  return text.split("\n").map((line) => line.replace(/\s+/g, " ").trim());
}

describe("renderText", () => {
  it("renders headings and paragraphs as separate blocks", () => {
    expect(renderText("<h1>Title</h1><p>First paragraph.</p>")).toBe(
      "Title\n\nFirst paragraph.",
    );
  });

  it("keeps heading case", () => {
    expect(renderText("<h2>Кассовый чек</h2>")).toBe("Кассовый чек");
  });

  it("renders link text without the target", () => {
    expect(
      renderText('<p><a href="https://example.com/x">Скачать</a></p>'),
    ).toBe("Скачать");
  });

  it("skips images", () => {
    expect(renderText('<p>A<img src="x.png" alt="Картинка">B</p>')).toBe("AB");
  });

  it("renders line breaks", () => {
    expect(renderText("<p>ИНН 7700000000<br>ФН 9999</p>")).toBe(
      "ИНН 7700000000\nФН 9999",
    );
  });

  it("renders table rows on their own lines with cells side by side", () => {
    const html =
      "<table>" +
      "<tr><td>Молоко</td><td>89.90</td></tr>" +
      "<tr><td>Хлеб</td><td>45.00</td></tr>" +
      "</table>";
    expect(compactLines(renderText(html))).toEqual(["Молоко 89.90", "Хлеб 45.00"]);
  });

  it("keeps header cell case", () => {
    const html = "<table><tr><th>Товар</th></tr><tr><td>Молоко</td></tr></table>";
    expect(renderText(html)).toContain("Товар");
  });

  it("decodes entities in text", () => {
    expect(renderText("<p>&lt;b&gt; &amp; co</p>")).toBe("<b> & co");
  });
});
