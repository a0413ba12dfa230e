/**
 * @fileoverview Remove non-content elements from a selected subtree.
 *
 * @module extractor/tag-pruner
 */

import type { ContentSelection } from "./container-selector.js";

/**
 * Remove every element named in `tags`, with its descendants, from the
 * selection's tree in place.
 *
 * For a `container` selection only the container's descendants are touched;
 * the rest of the page is not rendered anyway. Running it twice is a no-op
 * the second time.
 *
 * @returns The number of elements removed.
 *
 * @example
 * ```typescript
 * const selection = selectContainer(loadDocument(html), rules, "document");
 * pruneTags(selection, ["script", "style"]);
 * ```
 */
export function pruneTags(
  selection: ContentSelection,
  tags: readonly string[],
): number {
  if (tags.length === 0) return 0;

  const selector = tags.join(", ");
  const matches =
    selection.kind === "container"
      ? selection.root.find(selector)
      : selection.$(selector);

  const removed = matches.length;
  matches.remove();
  return removed;
}
