/**
 * Shaping Types
 *
 * The core consumes positioned glyphs through these interfaces and never
 * depends on a particular font or shaping library.
 */

import type { TextStyle } from "../style/types";

/**
 * One outline command in font units, y up.
 *
 * `coords` holds the control points followed by the end point:
 * M and L take 2 numbers, Q takes 4, C takes 6, Z takes none.
 */
export type PathCommand =
  | { type: "M"; coords: [number, number] }
  | { type: "L"; coords: [number, number] }
  | { type: "Q"; coords: [number, number, number, number] }
  | { type: "C"; coords: [number, number, number, number, number, number] }
  | { type: "Z"; coords: [] };

/** Decoration line placement in font units */
export interface LineMetrics {
  /** Top edge relative to the baseline, y up */
  position: number;
  thickness: number;
}

/** Font face consumed by the shaper and the rasterizer */
export interface FontFace {
  /** Stable identifier, part of every atlas key */
  readonly id: string;
  readonly family: string;
  readonly weight: number;
  readonly italic: boolean;
  readonly unitsPerEm: number;
  /** Distance from baseline to the top of the em box, font units */
  readonly ascender: number;
  /** Distance from baseline to the bottom of the em box, font units (negative) */
  readonly descender: number;
  readonly lineGap: number;
  /** Underline placement, a default is derived from the em size when absent */
  readonly underline?: LineMetrics;
  /** Strikethrough placement, a default is derived from the em size when absent */
  readonly strikeout?: LineMetrics;

  /** Glyph id for a code point, undefined when the face lacks it */
  glyphIndex(codePoint: number): number | undefined;
  /** Horizontal advance in font units */
  advanceWidth(glyphId: number): number;
  /** Kerning adjustment between two glyphs in font units */
  kerning?(left: number, right: number): number;
  outline(glyphId: number): PathCommand[];
}

/** A run of text sharing one resolved style */
export interface StyledRun {
  text: string;
  style: TextStyle;
}

export interface ShapeOptions {
  /** Wrap width in pixels, Infinity disables wrapping */
  maxWidth: number;
  /** Line height as a multiple of font size */
  lineHeight: number;
  /** Tab stop spacing in space advances */
  tabWidth: number;
}

export const DEFAULT_SHAPE_OPTIONS: ShapeOptions = {
  maxWidth: Infinity,
  lineHeight: 1,
  tabWidth: 4,
};

/** A glyph placed in text space (pixels, y up, first baseline at y = 0 minus ascent) */
export interface PositionedGlyph {
  glyphId: number;
  face: FontFace;
  /** Font size in pixels */
  fontSize: number;
  /** Pen position */
  x: number;
  /** Baseline position */
  y: number;
  /** Horizontal advance in pixels */
  advance: number;
  /** Line index */
  line: number;
  codePoint: number;
  /** Code unit index into the concatenated run text */
  cluster: number;
  style: TextStyle;
}

export interface ShapedLine {
  /** Pen extent of the line in pixels, trailing whitespace excluded */
  width: number;
  /** Baseline y */
  baseline: number;
  /** Line box height in pixels */
  height: number;
  firstGlyph: number;
  glyphCount: number;
}

export interface ShapedText {
  /** Glyphs in visual order */
  glyphs: PositionedGlyph[];
  lines: ShapedLine[];
}

/** Turns styled runs into positioned glyphs */
export interface ShapingEngine {
  shape(runs: readonly StyledRun[], options: ShapeOptions): ShapedText;
}
