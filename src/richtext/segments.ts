/**
 * Segment tree traversal helpers.
 */

import type { LeafSegment, RichText, Segment } from "./types";

/** Leaf segments in depth-first, left-to-right order. */
export function flattenSegments(tree: RichText): LeafSegment[] {
  const leaves: LeafSegment[] = [];
  const pending: Segment[] = [...tree.segments].reverse();

  while (pending.length > 0) {
    const segment = pending.pop();
    if (!segment) break;
    if (segment.kind === "scope") {
      for (let i = segment.children.length - 1; i >= 0; i--) {
        const child = segment.children[i];
        if (child) pending.push(child);
      }
    } else {
      leaves.push(segment);
    }
  }

  return leaves;
}

/** Names of every placeholder in the tree, in order of appearance. */
export function placeholderNames(tree: RichText): string[] {
  const names: string[] = [];
  for (const leaf of flattenSegments(tree)) {
    if (leaf.kind === "placeholder") names.push(leaf.name);
  }
  return names;
}

/**
 * Concatenate the text of a tree. Placeholders are filled through `lookup`
 * and become empty when it has no value.
 */
export function toPlainText(
  tree: RichText,
  lookup: (name: string) => string | undefined = () => undefined
): string {
  let out = "";
  for (const leaf of flattenSegments(tree)) {
    out += leaf.kind === "literal" ? leaf.text : lookup(leaf.name) ?? "";
  }
  return out;
}

/** Serialize a tree back to markup, escaping literal braces. */
export function toMarkup(tree: RichText): string {
  return tree.segments.map(segmentToMarkup).join("");
}

function segmentToMarkup(segment: Segment): string {
  switch (segment.kind) {
    case "literal":
      return escapeMarkup(segment.text);
    case "placeholder":
      return `{${segment.name}}`;
    case "scope":
      return `{${segment.names.join(",")}:${segment.children.map(segmentToMarkup).join("")}}`;
  }
}

/** Double every brace so the text parses back as a single literal. */
export function escapeMarkup(text: string): string {
  return text.replace(/[{}]/g, (brace) => brace + brace);
}
