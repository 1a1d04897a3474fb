/**
 * Font face backed by an opentype.js font.
 *
 * Metrics come from the font tables unless overridden. Outlines are read in
 * font units, y up.
 */

import { parse, type Font, type Glyph } from "opentype.js";
import type { FontFace, LineMetrics, PathCommand } from "./types";

export interface OpenTypeFaceOptions {
  /** Defaults to the PostScript name */
  id?: string;
  /** Defaults to the family name table entry */
  family?: string;
  /** Defaults to the OS/2 weight class */
  weight?: number;
  /** Defaults to the italic bit of the head table */
  italic?: boolean;
}

const ITALIC_MAC_STYLE = 2;

export class OpenTypeFace implements FontFace {
  readonly id: string;
  readonly family: string;
  readonly weight: number;
  readonly italic: boolean;
  readonly unitsPerEm: number;
  readonly ascender: number;
  readonly descender: number;
  readonly lineGap: number;
  readonly underline?: LineMetrics;
  readonly strikeout?: LineMetrics;

  private readonly font: Font;

  /** Parse a TrueType, OpenType or WOFF file. */
  static fromBuffer(buffer: ArrayBuffer, options: OpenTypeFaceOptions = {}): OpenTypeFace {
    return new OpenTypeFace(parse(buffer), options);
  }

  constructor(font: Font, options: OpenTypeFaceOptions = {}) {
    this.font = font;
    this.family = options.family ?? font.names.fontFamily?.en ?? "unknown";
    this.id = options.id ?? font.names.postScriptName?.en ?? this.family;
    this.weight = options.weight ?? tableNumber(font, "os2", "usWeightClass") ?? 400;
    this.italic = options.italic ?? ((tableNumber(font, "head", "macStyle") ?? 0) & ITALIC_MAC_STYLE) !== 0;
    this.unitsPerEm = font.unitsPerEm;
    this.ascender = font.ascender;
    this.descender = font.descender;
    this.lineGap = tableNumber(font, "hhea", "lineGap") ?? 0;
    this.underline = lineMetrics(font, "post", "underlinePosition", "underlineThickness");
    this.strikeout = lineMetrics(font, "os2", "yStrikeoutPosition", "yStrikeoutSize");
  }

  /** Glyph 0 (.notdef) counts as missing. */
  glyphIndex(codePoint: number): number | undefined {
    const index = this.font.charToGlyphIndex(String.fromCodePoint(codePoint));
    return index > 0 && index < this.font.glyphs.length ? index : undefined;
  }

  advanceWidth(glyphId: number): number {
    return this.glyph(glyphId)?.advanceWidth ?? 0;
  }

  kerning(left: number, right: number): number {
    return this.font.getKerningValue(left, right);
  }

  outline(glyphId: number): PathCommand[] {
    const glyph = this.glyph(glyphId);
    if (!glyph) return [];

    return glyph.path.commands.map((command): PathCommand => {
      switch (command.type) {
        case "M":
          return { type: "M", coords: [command.x, command.y] };
        case "L":
          return { type: "L", coords: [command.x, command.y] };
        case "Q":
          return { type: "Q", coords: [command.x1, command.y1, command.x, command.y] };
        case "C":
          return { type: "C", coords: [command.x1, command.y1, command.x2, command.y2, command.x, command.y] };
        case "Z":
          return { type: "Z", coords: [] };
      }
    });
  }

  private glyph(glyphId: number): Glyph | undefined {
    if (!Number.isInteger(glyphId) || glyphId < 0 || glyphId >= this.font.glyphs.length) {
      return undefined;
    }
    return this.font.glyphs.get(glyphId);
  }
}

function tableNumber(font: Font, table: string, field: string): number | undefined {
  const value: unknown = font.tables[table]?.[field];
  return typeof value === "number" ? value : undefined;
}

function lineMetrics(font: Font, table: string, positionField: string, thicknessField: string): LineMetrics | undefined {
  const position = tableNumber(font, table, positionField);
  const thickness = tableNumber(font, table, thicknessField);
  if (position === undefined || thickness === undefined || thickness <= 0) return undefined;
  return { position, thickness };
}
