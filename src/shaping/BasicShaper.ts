/**
 * Basic Shaper
 *
 * Reference left-to-right shaper: one glyph per code point, pairwise kerning,
 * tab stops, hard line breaks and greedy word wrap. Enough for Latin UI text;
 * complex scripts need a real shaping engine behind `ShapingEngine`.
 */

import type { TextStyle } from "../style/types";
import type { FontLibrary } from "./FontLibrary";
import type {
  FontFace,
  PositionedGlyph,
  ShapedLine,
  ShapedText,
  ShapeOptions,
  ShapingEngine,
  StyledRun,
} from "./types";
import { isWhitespace } from "./whitespace";

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;
const TAB = 0x09;
const SPACE = 0x20;

/** Line under construction; glyph x positions are relative to the line start */
interface LineBuffer {
  glyphs: PositionedGlyph[];
  pen: number;
  /** Index of the first glyph after the latest whitespace, 0 when none */
  breakAt: number;
  /** Style in effect, used to size empty lines */
  style: TextStyle;
}

export class BasicShaper implements ShapingEngine {
  private fonts: FontLibrary;
  private reported = new Set<string>();

  constructor(fonts: FontLibrary) {
    this.fonts = fonts;
  }

  shape(runs: readonly StyledRun[], options: ShapeOptions): ShapedText {
    const glyphs: PositionedGlyph[] = [];
    const lines: ShapedLine[] = [];
    const first = runs.find((run) => run.text.length > 0);
    if (!first) {
      return { glyphs, lines };
    }

    let top = 0;
    let line: LineBuffer = { glyphs: [], pen: 0, breakAt: 0, style: first.style };

    const finish = (next: PositionedGlyph[]): void => {
      top = this.commitLine(line, top, options, glyphs, lines);
      line = { glyphs: next, pen: 0, breakAt: 0, style: line.style };
      for (const glyph of next) {
        line.pen = glyph.x + glyph.advance;
      }
    };

    let cluster = 0;
    for (const run of runs) {
      const style = run.style;
      const requested = this.fonts.resolve(style.font, style.weight, style.italic);

      for (const char of run.text) {
        const codePoint = char.codePointAt(0) ?? 0;
        const index = cluster;
        cluster += char.length;
        line.style = style;

        if (codePoint === CARRIAGE_RETURN) continue;
        if (codePoint === NEWLINE) {
          finish([]);
          continue;
        }

        // Tabs draw nothing and take the space glyph's metrics
        const { face, glyphId } = this.lookupGlyph(requested, codePoint === TAB ? SPACE : codePoint);
        const scale = style.size / face.unitsPerEm;

        let x = line.pen;
        let advance: number;
        if (codePoint === TAB) {
          const stop = options.tabWidth * face.advanceWidth(glyphId) * scale;
          advance = stop > 0 ? (Math.floor(x / stop + 1e-9) + 1) * stop - x : 0;
        } else {
          advance = face.advanceWidth(glyphId) * scale;
          const previous = line.glyphs[line.glyphs.length - 1];
          if (previous && previous.face === face && previous.fontSize === style.size && face.kerning) {
            x += face.kerning(previous.glyphId, glyphId) * scale;
          }
        }

        const whitespace = isWhitespace(codePoint);
        if (!whitespace && line.glyphs.length > 0 && x + advance > options.maxWidth) {
          if (line.breakAt > 0 && line.breakAt < line.glyphs.length) {
            // Carry the partial word over to the next line
            const word = line.glyphs.splice(line.breakAt);
            const shift = word[0]?.x ?? 0;
            for (const glyph of word) glyph.x -= shift;
            x -= shift;
            finish(word);
          } else {
            x = 0;
            finish([]);
          }
        }

        line.glyphs.push({
          glyphId,
          face,
          fontSize: style.size,
          x,
          y: 0,
          advance,
          line: 0,
          codePoint,
          cluster: index,
          style,
        });
        line.pen = x + advance;
        if (whitespace) line.breakAt = line.glyphs.length;
      }
    }

    this.commitLine(line, top, options, glyphs, lines);
    return { glyphs, lines };
  }

  /** Resolve a glyph, substituting from the fallback face when missing. */
  private lookupGlyph(face: FontFace, codePoint: number): { face: FontFace; glyphId: number } {
    const glyphId = face.glyphIndex(codePoint);
    if (glyphId !== undefined) {
      return { face, glyphId };
    }

    const key = `${face.id}:${codePoint}`;
    if (!this.reported.has(key)) {
      this.reported.add(key);
      console.warn(
        `[BasicShaper] Face "${face.id}" has no glyph for U+${codePoint.toString(16).toUpperCase().padStart(4, "0")}, using fallback`
      );
    }
    const fallback = this.fonts.fallback;
    return { face: fallback, glyphId: fallback.glyphIndex(codePoint) ?? 0 };
  }

  /** Fix line metrics, assign baselines and move glyphs to the output. Returns the next line top. */
  private commitLine(
    line: LineBuffer,
    top: number,
    options: ShapeOptions,
    glyphs: PositionedGlyph[],
    lines: ShapedLine[]
  ): number {
    let ascent = 0;
    let descent = 0;
    let height = 0;
    let width = 0;

    if (line.glyphs.length === 0) {
      const face = this.fonts.resolve(line.style.font, line.style.weight, line.style.italic);
      const scale = line.style.size / face.unitsPerEm;
      ascent = face.ascender * scale;
      descent = -face.descender * scale;
      height = line.style.size * options.lineHeight;
    }
    for (const glyph of line.glyphs) {
      const scale = glyph.fontSize / glyph.face.unitsPerEm;
      ascent = Math.max(ascent, glyph.face.ascender * scale);
      descent = Math.max(descent, -glyph.face.descender * scale);
      height = Math.max(height, glyph.fontSize * options.lineHeight);
      if (!isWhitespace(glyph.codePoint)) {
        width = Math.max(width, glyph.x + glyph.advance);
      }
    }

    // Spare line height is split evenly above and below the content
    const baseline = top - ascent - (height - (ascent + descent)) / 2;
    const index = lines.length;
    lines.push({
      width,
      baseline,
      height,
      firstGlyph: glyphs.length,
      glyphCount: line.glyphs.length,
    });
    for (const glyph of line.glyphs) {
      glyph.y = baseline;
      glyph.line = index;
      glyphs.push(glyph);
    }
    return top - height;
  }
}
