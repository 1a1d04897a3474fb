/**
 * Text object styling: the base text style plus layout and mesh settings.
 */

import type { GlyphMeta, TextAlign, TextAnchor, TextShadow } from "../mesh/types";
import { WHITE } from "../types/color";
import type { TextStyle } from "./types";

export interface Text3dStyling extends TextStyle {
  align: TextAlign;
  anchor: TextAnchor;
  /** Line height as a multiple of font size */
  lineHeight: number;
  /** Tab stop spacing in space advances */
  tabWidth: number;
  /** Wrap width in pixels */
  maxWidth: number;
  /** Glyph metas written to the `uvB` channel */
  uvB: [GlyphMeta, GlyphMeta];
  /** Drop shadow drawn behind the text, null for none */
  shadow: TextShadow | null;
}

export const DEFAULT_TEXT3D_STYLING: Text3dStyling = {
  font: "sans-serif",
  size: 16,
  weight: 400,
  italic: false,
  color: WHITE,
  magicNumber: 0,
  underline: false,
  strikethrough: false,
  attributes: {},
  align: "left",
  anchor: [0, 0],
  lineHeight: 1,
  tabWidth: 4,
  maxWidth: Infinity,
  uvB: ["index", "lineProgress"],
  shadow: null,
};

/** The text style segment styles are applied over */
export function baseTextStyle(styling: Text3dStyling): TextStyle {
  const { font, size, weight, italic, color, magicNumber, underline, strikethrough, attributes } = styling;
  return { font, size, weight, italic, color, magicNumber, underline, strikethrough, attributes };
}
