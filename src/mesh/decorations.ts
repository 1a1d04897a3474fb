/**
 * Underline and strikethrough runs.
 *
 * A run covers consecutive glyphs of one line that share the face, size and
 * color and all carry the decoration. Whitespace at either end of a run is not
 * underlined.
 */

import type { AtlasKey } from "../atlas/types";
import type { GlyphBitmap } from "../sdf/types";
import type { FontFace, LineMetrics, PositionedGlyph } from "../shaping/types";
import { isWhitespace } from "../shaping/whitespace";

export type LineMode = "underline" | "strikethrough";

/** Modes in drawing order */
export const LINE_MODES: readonly LineMode[] = ["underline", "strikethrough"];

/** A decoration line in text space (pixels, y up), before alignment */
export interface LineRun {
  mode: LineMode;
  /** First visible glyph under the line */
  glyph: PositionedGlyph;
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

const INK_SIZE = 4;

/** Atlas key of the solid cell that decoration quads sample */
export const INK_KEY: AtlasKey = { fontId: "\u0000ink", glyphId: 0, size: INK_SIZE, subpixel: 0 };

/** A distance field cell that is inside everywhere */
export function inkBitmap(): GlyphBitmap {
  return {
    width: INK_SIZE,
    height: INK_SIZE,
    data: new Uint8Array(INK_SIZE * INK_SIZE).fill(255),
    left: 0,
    top: INK_SIZE,
    margin: 0,
  };
}

export function lineMetrics(face: FontFace, mode: LineMode): LineMetrics {
  const metrics = mode === "underline" ? face.underline : face.strikeout;
  if (metrics) return metrics;

  const em = face.unitsPerEm;
  return mode === "underline"
    ? { position: -0.075 * em, thickness: 0.05 * em }
    : { position: 0.325 * em, thickness: 0.05 * em };
}

/** Decoration runs of `mode` over glyphs in visual order. */
export function collectLineRuns(glyphs: readonly PositionedGlyph[], mode: LineMode): LineRun[] {
  const runs: LineRun[] = [];
  let previous: PositionedGlyph | undefined;
  let first: PositionedGlyph | undefined;
  let last: PositionedGlyph | undefined;

  const close = (): void => {
    if (first && last) {
      runs.push(lineRun(first, last, mode));
    }
    previous = undefined;
    first = undefined;
    last = undefined;
  };

  for (const glyph of glyphs) {
    if (!glyph.style[mode]) {
      close();
      continue;
    }
    if (previous && !continuesRun(previous, glyph)) {
      close();
    }
    previous = glyph;
    if (isWhitespace(glyph.codePoint)) continue;
    first ??= glyph;
    last = glyph;
  }
  close();

  return runs;
}

function continuesRun(a: PositionedGlyph, b: PositionedGlyph): boolean {
  return (
    a.line === b.line &&
    a.face === b.face &&
    a.fontSize === b.fontSize &&
    a.style.color.every((channel, i) => channel === b.style.color[i])
  );
}

function lineRun(first: PositionedGlyph, last: PositionedGlyph, mode: LineMode): LineRun {
  const { position, thickness } = lineMetrics(first.face, mode);
  const scale = first.fontSize / first.face.unitsPerEm;
  const top = first.y + position * scale;
  return {
    mode,
    glyph: first,
    x0: first.x,
    y0: top - thickness * scale,
    x1: last.x + last.advance,
    y1: top,
  };
}
