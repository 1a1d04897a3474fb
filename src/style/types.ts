/**
 * Style Types
 *
 * Segment styles are partial overrides stacked by nesting; text styles are the
 * fully resolved result handed to the shaping engine.
 */

import type { Color } from "../types/color";

/** Value of a free-form style attribute forwarded to the shaping engine */
export type StyleAttributeValue = string | number | boolean;

/** Partial style contributed by one style id */
export interface SegmentStyle {
  /** Font family name */
  font?: string;
  /** Font size in pixels */
  size?: number;
  /** Font weight, 100-900 */
  weight?: number;
  italic?: boolean;
  /** Fill color */
  color?: Color;
  /** Free value exposed to shaders through the `magicNumber` glyph meta */
  magicNumber?: number;
  underline?: boolean;
  strikethrough?: boolean;
  /** Attributes this core does not interpret */
  attributes?: Readonly<Record<string, StyleAttributeValue>>;
}

/** Fully resolved style of a run or glyph */
export interface TextStyle {
  font: string;
  size: number;
  weight: number;
  italic: boolean;
  color: Color;
  magicNumber: number;
  underline: boolean;
  strikethrough: boolean;
  attributes: Readonly<Record<string, StyleAttributeValue>>;
}

export const FontWeight = {
  THIN: 100,
  LIGHT: 300,
  NORMAL: 400,
  MEDIUM: 500,
  SEMIBOLD: 600,
  BOLD: 700,
  BLACK: 900,
} as const;

/**
 * Merge two styles. Every key set on `inner` wins over `outer`; attribute bags
 * merge per key with the same precedence.
 */
export function joinStyles(outer: SegmentStyle, inner: SegmentStyle): SegmentStyle {
  const joined: SegmentStyle = { ...outer };
  if (inner.font !== undefined) joined.font = inner.font;
  if (inner.size !== undefined) joined.size = inner.size;
  if (inner.weight !== undefined) joined.weight = inner.weight;
  if (inner.italic !== undefined) joined.italic = inner.italic;
  if (inner.color !== undefined) joined.color = inner.color;
  if (inner.magicNumber !== undefined) joined.magicNumber = inner.magicNumber;
  if (inner.underline !== undefined) joined.underline = inner.underline;
  if (inner.strikethrough !== undefined) joined.strikethrough = inner.strikethrough;
  if (inner.attributes !== undefined) {
    joined.attributes = { ...outer.attributes, ...inner.attributes };
  }
  return joined;
}

/** Apply a segment style over a complete base style. */
export function applySegmentStyle(base: TextStyle, style: SegmentStyle): TextStyle {
  return {
    font: style.font ?? base.font,
    size: style.size ?? base.size,
    weight: style.weight ?? base.weight,
    italic: style.italic ?? base.italic,
    color: style.color ?? base.color,
    magicNumber: style.magicNumber ?? base.magicNumber,
    underline: style.underline ?? base.underline,
    strikethrough: style.strikethrough ?? base.strikethrough,
    attributes: style.attributes ? { ...base.attributes, ...style.attributes } : base.attributes,
  };
}
