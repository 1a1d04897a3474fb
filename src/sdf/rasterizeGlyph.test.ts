import { describe, it, expect } from "vitest";
import type { PathCommand } from "../shaping/types";
import { TofuFace } from "../shaping/TofuFace";
import { flattenOutline } from "./flatten";
import { rasterizeGlyph } from "./rasterizeGlyph";

const SQUARE: PathCommand[] = [
  { type: "M", coords: [0, 0] },
  { type: "L", coords: [4, 0] },
  { type: "L", coords: [4, 4] },
  { type: "L", coords: [0, 4] },
  { type: "Z", coords: [] },
];

function pixel(bitmap: { width: number; data: Uint8Array }, row: number, col: number): number | undefined {
  return bitmap.data[row * bitmap.width + col];
}

describe("flattenOutline", () => {
  it("closes contours and scales coordinates", () => {
    const edges = flattenOutline(SQUARE.slice(0, 4), 0.5, 1, 8);
    expect(edges).toEqual([1, 0, 3, 0, 3, 0, 3, 2, 3, 2, 1, 2, 1, 2, 1, 0]);
  });

  it("splits curves into a fixed number of segments", () => {
    const quad: PathCommand[] = [
      { type: "M", coords: [0, 0] },
      { type: "Q", coords: [2, 4, 4, 0] },
    ];
    // 4 curve segments plus the closing edge
    expect(flattenOutline(quad, 1, 0, 4)).toHaveLength(5 * 4);

    const cubic: PathCommand[] = [
      { type: "M", coords: [0, 0] },
      { type: "C", coords: [0, 4, 4, 4, 4, 0] },
      { type: "Z", coords: [] },
    ];
    const edges = flattenOutline(cubic, 1, 0, 2);
    // Midpoint of the cubic at t = 0.5
    expect(edges.slice(0, 4)).toEqual([0, 0, 2, 3]);
  });
});

describe("rasterizeGlyph", () => {
  it("pads the outline bounds by the margin", () => {
    const bitmap = rasterizeGlyph(SQUARE, 10, 10, { margin: 2 });

    expect(bitmap.width).toBe(8);
    expect(bitmap.height).toBe(8);
    expect(bitmap.left).toBe(-2);
    expect(bitmap.top).toBe(6);
    expect(bitmap.margin).toBe(2);
    expect(bitmap.data).toHaveLength(64);
  });

  it("encodes signed distance around 0.5", () => {
    const bitmap = rasterizeGlyph(SQUARE, 10, 10, { margin: 2 });

    // Inside, 1.5px from the nearest edge
    expect(pixel(bitmap, 3, 3)).toBe(223);
    // Inside, 0.5px from the left edge
    expect(pixel(bitmap, 3, 2)).toBe(159);
    // Outside, 0.5px from the left edge
    expect(pixel(bitmap, 3, 1)).toBe(96);
    // Farther than the margin
    expect(pixel(bitmap, 0, 0)).toBe(0);
  });

  it("treats the counter of a hollow glyph as outside", () => {
    const tofu = new TofuFace();
    const bitmap = rasterizeGlyph(tofu.outline(65), tofu.unitsPerEm, 100, { margin: 4 });

    // Box spans x 5..55 and y 0..70 at this size; the hole starts 6px in
    const centre = pixel(bitmap, bitmap.top - 35, 30 - bitmap.left);
    const stroke = pixel(bitmap, bitmap.top - 35, 8 - bitmap.left);
    expect(centre).toBe(0);
    expect(stroke).toBeGreaterThan(128);
  });

  it("returns an empty bitmap for an empty outline", () => {
    const bitmap = rasterizeGlyph([], 1000, 32);
    expect(bitmap.width).toBe(0);
    expect(bitmap.height).toBe(0);
    expect(bitmap.data).toHaveLength(0);
  });

  it("is deterministic", () => {
    const tofu = new TofuFace();
    const a = rasterizeGlyph(tofu.outline(66), tofu.unitsPerEm, 24, { offsetX: 0.25 });
    const b = rasterizeGlyph(tofu.outline(66), tofu.unitsPerEm, 24, { offsetX: 0.25 });
    expect(a).toEqual(b);
  });

  it("shifts the outline by the subpixel offset", () => {
    const shifted = rasterizeGlyph(SQUARE, 10, 10, { margin: 2, offsetX: 0.5 });
    // Outline now spans x 0.5..4.5
    expect(shifted.left).toBe(-2);
    expect(shifted.width).toBe(9);
  });

  it("rejects a non-positive margin", () => {
    expect(() => rasterizeGlyph(SQUARE, 10, 10, { margin: 0 })).toThrow("SDF margin must be positive, got 0");
  });
});
