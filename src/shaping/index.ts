export { BasicShaper } from "./BasicShaper";
export { FontLibrary, type FontLibraryOptions } from "./FontLibrary";
export { OpenTypeFace, type OpenTypeFaceOptions } from "./OpenTypeFace";
export { TofuFace, type TofuFaceOptions } from "./TofuFace";
export { isWhitespace } from "./whitespace";
export {
  DEFAULT_SHAPE_OPTIONS,
  type FontFace,
  type LineMetrics,
  type PathCommand,
  type PositionedGlyph,
  type ShapedLine,
  type ShapedText,
  type ShapeOptions,
  type ShapingEngine,
  type StyledRun,
} from "./types";
