/**
 * SDF Module
 *
 * Outline flattening and signed distance field generation for glyphs.
 */

export { rasterizeGlyph } from "./rasterizeGlyph";
export { flattenOutline } from "./flatten";
export {
  DEFAULT_SDF_OPTIONS,
  type SdfOptions,
  type RasterizeOptions,
  type GlyphBitmap,
} from "./types";
