/**
 * SDF Types
 */

export interface SdfOptions {
  /** Distance field radius in raster pixels, also the padding around the outline */
  margin: number;
  /** Line segments per quadratic or cubic curve */
  curveSteps: number;
}

export const DEFAULT_SDF_OPTIONS: SdfOptions = {
  margin: 4,
  curveSteps: 8,
};

export interface RasterizeOptions extends Partial<SdfOptions> {
  /** Horizontal outline shift in raster pixels, used for subpixel positioning */
  offsetX?: number;
}

/** Single channel distance field image, rows top to bottom */
export interface GlyphBitmap {
  width: number;
  height: number;
  /** `width * height` bytes; 128 is roughly the outline edge */
  data: Uint8Array;
  /** Left edge relative to the pen position, raster pixels */
  left: number;
  /** Top edge relative to the baseline, raster pixels, y up */
  top: number;
  margin: number;
}
