import { describe, it, expect } from "vitest";
import { Font, Glyph, Path } from "opentype.js";
import { DEFAULT_TEXT3D_STYLING } from "../style/styling";
import { TextPipeline } from "../TextPipeline";
import { FontLibrary } from "./FontLibrary";
import { OpenTypeFace } from "./OpenTypeFace";

function createFont(): Font {
  const notdef = new Glyph({ name: ".notdef", advanceWidth: 650, path: new Path() });

  const triangle = new Path();
  triangle.moveTo(100, 0);
  triangle.lineTo(500, 0);
  triangle.quadraticCurveTo(450, 400, 300, 700);
  triangle.curveTo(250, 600, 150, 300, 100, 0);
  triangle.close();
  const a = new Glyph({ name: "A", unicode: 65, advanceWidth: 600, path: triangle });

  const font = new Font({
    familyName: "Test Sans",
    styleName: "Regular",
    unitsPerEm: 1000,
    ascender: 800,
    descender: -200,
    glyphs: [notdef, a],
  });
  font.kerningPairs = { "1,1": -40 };
  return font;
}

describe("OpenTypeFace", () => {
  it("reads names and vertical metrics from the font", () => {
    const face = new OpenTypeFace(createFont(), { weight: 700 });

    expect(face.family).toBe("Test Sans");
    expect(face.weight).toBe(700);
    expect(face.italic).toBe(false);
    expect([face.unitsPerEm, face.ascender, face.descender]).toEqual([1000, 800, -200]);
  });

  it("lets options override the font tables", () => {
    const face = new OpenTypeFace(createFont(), { id: "test-sans-italic", family: "Other", italic: true });

    expect(face.id).toBe("test-sans-italic");
    expect(face.family).toBe("Other");
    expect(face.italic).toBe(true);
  });

  it("maps code points to glyphs and treats notdef as missing", () => {
    const face = new OpenTypeFace(createFont());

    expect(face.glyphIndex(65)).toBe(1);
    expect(face.glyphIndex(66)).toBeUndefined();
    expect(face.advanceWidth(1)).toBe(600);
    expect(face.advanceWidth(7)).toBe(0);
    expect(face.kerning(1, 1)).toBe(-40);
  });

  it("converts outlines to path commands in font units", () => {
    const face = new OpenTypeFace(createFont());

    expect(face.outline(1)).toEqual([
      { type: "M", coords: [100, 0] },
      { type: "L", coords: [500, 0] },
      { type: "Q", coords: [450, 400, 300, 700] },
      { type: "C", coords: [250, 600, 150, 300, 100, 0] },
      { type: "Z", coords: [] },
    ]);
    expect(face.outline(0)).toEqual([]);
    expect(face.outline(9)).toEqual([]);
  });

  it("renders through the pipeline", () => {
    const face = new OpenTypeFace(createFont(), { id: "test-sans" });
    const pipeline = new TextPipeline({ fonts: new FontLibrary().register(face) });

    const mesh = pipeline.render([{ styles: [], text: "AA" }], { ...DEFAULT_TEXT3D_STYLING, font: "test sans" });

    expect(mesh.quadCount).toBe(2);
    expect(pipeline.atlas.has({ fontId: "test-sans", glyphId: 1, size: 16, subpixel: 0 })).toBe(true);
    expect(pipeline.atlas.getStatus().entryCount).toBe(1);
  });
});
