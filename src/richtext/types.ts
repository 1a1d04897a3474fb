/**
 * Rich Text Types
 *
 * Segment tree produced by the markup parser.
 */

/** Name of a style, resolved by a {@link StyleSheet}. Matched exactly. */
export type StyleId = string;

/** A run of literal text. */
export interface LiteralSegment {
  kind: "literal";
  text: string;
  /** Accumulated style ids, outermost scope first */
  styles: readonly StyleId[];
}

/** A named slot filled from a fetch source at resolution time. */
export interface PlaceholderSegment {
  kind: "placeholder";
  name: string;
  styles: readonly StyleId[];
}

/** A `{style:...}` scope and everything nested inside it. */
export interface StyleScope {
  kind: "scope";
  /** Style ids introduced by this scope */
  names: readonly StyleId[];
  /** Accumulated style ids including this scope's names */
  styles: readonly StyleId[];
  children: Segment[];
}

export type Segment = LiteralSegment | PlaceholderSegment | StyleScope;

/** Leaf segments, the ones that produce text. */
export type LeafSegment = LiteralSegment | PlaceholderSegment;

/** Root of a parsed markup string. */
export interface RichText {
  segments: Segment[];
}
