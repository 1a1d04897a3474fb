/**
 * Synthetic font face that draws every covered code point as a hollow box.
 *
 * Used as the last-resort fallback face and as a deterministic face in tests.
 */

import type { FontFace, LineMetrics, PathCommand } from "./types";
import { isWhitespace } from "./whitespace";

export interface TofuFaceOptions {
  id?: string;
  family?: string;
  weight?: number;
  italic?: boolean;
  /** Advance of every glyph in font units */
  advance?: number;
  /** Code points this face claims, all of them by default */
  coverage?: (codePoint: number) => boolean;
}

const UNITS_PER_EM = 1000;
const BOX_LEFT = 50;
const BOX_BOTTOM = 0;
const BOX_TOP = 700;
const STROKE = 60;

export class TofuFace implements FontFace {
  readonly id: string;
  readonly family: string;
  readonly weight: number;
  readonly italic: boolean;
  readonly unitsPerEm = UNITS_PER_EM;
  readonly ascender = 800;
  readonly descender = -200;
  readonly lineGap = 0;
  readonly underline: LineMetrics = { position: -75, thickness: 50 };
  readonly strikeout: LineMetrics = { position: 375, thickness: 50 };

  private readonly advance: number;
  private readonly coverage: (codePoint: number) => boolean;

  constructor(options: TofuFaceOptions = {}) {
    this.id = options.id ?? "tofu";
    this.family = options.family ?? "tofu";
    this.weight = options.weight ?? 400;
    this.italic = options.italic ?? false;
    this.advance = options.advance ?? 600;
    this.coverage = options.coverage ?? (() => true);
  }

  /** Glyph ids equal code points; glyph 0 is the notdef box. */
  glyphIndex(codePoint: number): number | undefined {
    return this.coverage(codePoint) ? codePoint : undefined;
  }

  advanceWidth(_glyphId: number): number {
    return this.advance;
  }

  outline(glyphId: number): PathCommand[] {
    if (glyphId !== 0 && isWhitespace(glyphId)) {
      return [];
    }
    const right = Math.max(BOX_LEFT + 3 * STROKE, this.advance - BOX_LEFT);
    return [
      // Outer contour counter-clockwise
      ...rect(BOX_LEFT, BOX_BOTTOM, right, BOX_TOP, false),
      // Inner contour clockwise cuts the hole
      ...rect(BOX_LEFT + STROKE, BOX_BOTTOM + STROKE, right - STROKE, BOX_TOP - STROKE, true),
    ];
  }
}

function rect(x0: number, y0: number, x1: number, y1: number, clockwise: boolean): PathCommand[] {
  if (clockwise) {
    return [
      { type: "M", coords: [x0, y0] },
      { type: "L", coords: [x0, y1] },
      { type: "L", coords: [x1, y1] },
      { type: "L", coords: [x1, y0] },
      { type: "Z", coords: [] },
    ];
  }
  return [
    { type: "M", coords: [x0, y0] },
    { type: "L", coords: [x1, y0] },
    { type: "L", coords: [x1, y1] },
    { type: "L", coords: [x0, y1] },
    { type: "Z", coords: [] },
  ];
}
