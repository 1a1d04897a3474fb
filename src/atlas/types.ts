/**
 * Atlas Types
 */

export interface AtlasOptions {
  /** Page width in pixels */
  pageWidth: number;
  /** Page height in pixels */
  pageHeight: number;
  /** Gap kept to the right of and below every glyph, pixels */
  padding: number;
  /** Pages kept before least recently used glyphs are evicted */
  maxPages: number;
}

export const DEFAULT_ATLAS_OPTIONS: AtlasOptions = {
  pageWidth: 1024,
  pageHeight: 1024,
  padding: 1,
  maxPages: 1,
};

/** Identity of one rasterized glyph image */
export interface AtlasKey {
  fontId: string;
  glyphId: number;
  /** Quantized raster size in pixels per em */
  size: number;
  /** Subpixel bucket index */
  subpixel: number;
}

/** Stable string form of a key, used as the cache index */
export function atlasKeyString(key: AtlasKey): string {
  return `${key.fontId}\u0000${key.glyphId}\u0000${key.size}\u0000${key.subpixel}`;
}

export interface AtlasRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Normalized texture coordinates; v0 is the top row */
export interface UvRect {
  u0: number;
  v0: number;
  u1: number;
  v1: number;
}

/** Where a cached glyph lives and how to place it */
export interface AtlasSlot {
  key: AtlasKey;
  /** Page index, -1 for empty glyphs */
  page: number;
  /** Bitmap area on the page, padding excluded */
  rect: AtlasRect;
  /** Bitmap left edge relative to the pen, raster pixels */
  left: number;
  /** Bitmap top edge relative to the baseline, raster pixels, y up */
  top: number;
  /** SDF margin the bitmap was generated with */
  margin: number;
  /** True when the glyph has no ink and occupies no page space */
  empty: boolean;
  uv: UvRect;
}

/** Page area written or cleared since the last drain */
export interface DirtyRegion extends AtlasRect {
  page: number;
}

export interface AtlasStatus {
  pageCount: number;
  entryCount: number;
  evictionCount: number;
  /** Bytes held by page pixel buffers */
  memoryBytes: number;
}
