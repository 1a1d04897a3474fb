/**
 * Atlas Module
 *
 * Shelf-packed glyph pages with LRU eviction and dirty region tracking.
 */

export { GlyphAtlas } from "./GlyphAtlas";
export { AtlasPage } from "./AtlasPage";
export { AtlasCapacityError } from "./AtlasCapacityError";
export {
  DEFAULT_ATLAS_OPTIONS,
  atlasKeyString,
  type AtlasOptions,
  type AtlasKey,
  type AtlasRect,
  type AtlasSlot,
  type AtlasStatus,
  type DirtyRegion,
  type UvRect,
} from "./types";
