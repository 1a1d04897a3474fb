/** Thrown when a glyph cannot fit on an empty page. */
export class AtlasCapacityError extends Error {
  readonly glyphWidth: number;
  readonly glyphHeight: number;
  readonly pageWidth: number;
  readonly pageHeight: number;

  constructor(glyphWidth: number, glyphHeight: number, pageWidth: number, pageHeight: number) {
    super(`Glyph of ${glyphWidth}x${glyphHeight} px does not fit an atlas page of ${pageWidth}x${pageHeight} px`);
    this.name = "AtlasCapacityError";
    this.glyphWidth = glyphWidth;
    this.glyphHeight = glyphHeight;
    this.pageWidth = pageWidth;
    this.pageHeight = pageHeight;
  }
}
