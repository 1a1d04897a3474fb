/**
 * Glyph Distance Field Rasterizer
 *
 * Produces single channel SDF bitmaps from vector outlines. Values encode
 * `0.5 + distance / (2 * margin)` so the outline edge sits at 0.5 and the
 * shader can antialias with `smoothstep(0.5 - w, 0.5 + w, d)`.
 */

import type { PathCommand } from "../shaping/types";
import { flattenOutline } from "./flatten";
import { DEFAULT_SDF_OPTIONS, type GlyphBitmap, type RasterizeOptions } from "./types";

const EMPTY_DATA = new Uint8Array(0);

/**
 * Rasterize an outline at `pixelSize` pixels per em.
 *
 * The image covers the outline's pixel bounds plus `margin` on each side.
 * Rasterization is pure: identical inputs give identical bytes.
 */
export function rasterizeGlyph(
  outline: readonly PathCommand[],
  unitsPerEm: number,
  pixelSize: number,
  options: RasterizeOptions = {}
): GlyphBitmap {
  const { margin, curveSteps } = { ...DEFAULT_SDF_OPTIONS, ...options };
  if (!(margin > 0)) {
    throw new Error(`SDF margin must be positive, got ${margin}`);
  }

  const scale = pixelSize / unitsPerEm;
  const edges = flattenOutline(outline, scale, options.offsetX ?? 0, curveSteps);
  if (edges.length === 0) {
    return { width: 0, height: 0, data: EMPTY_DATA, left: 0, top: 0, margin };
  }

  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (let i = 0; i < edges.length; i += 2) {
    const x = edges[i]!;
    const y = edges[i + 1]!;
    if (x < minX) minX = x;
    if (x > maxX) maxX = x;
    if (y < minY) minY = y;
    if (y > maxY) maxY = y;
  }

  const left = Math.floor(minX) - margin;
  const right = Math.ceil(maxX) + margin;
  const bottom = Math.floor(minY) - margin;
  const top = Math.ceil(maxY) + margin;
  const width = right - left;
  const height = top - bottom;
  const data = new Uint8Array(width * height);

  for (let row = 0; row < height; row++) {
    const sy = top - row - 0.5;
    for (let col = 0; col < width; col++) {
      const sx = left + col + 0.5;
      const distance = signedDistance(edges, sx, sy);
      const value = Math.min(1, Math.max(0, 0.5 + distance / (2 * margin)));
      data[row * width + col] = Math.round(value * 255);
    }
  }

  return { width, height, data, left, top, margin };
}

/** Distance to the nearest edge, positive inside by non-zero winding */
function signedDistance(edges: readonly number[], px: number, py: number): number {
  let best = Infinity;
  let winding = 0;

  for (let i = 0; i < edges.length; i += 4) {
    const x0 = edges[i]!;
    const y0 = edges[i + 1]!;
    const x1 = edges[i + 2]!;
    const y1 = edges[i + 3]!;

    const dx = x1 - x0;
    const dy = y1 - y0;
    const lengthSq = dx * dx + dy * dy;
    let t = lengthSq > 0 ? ((px - x0) * dx + (py - y0) * dy) / lengthSq : 0;
    t = Math.min(1, Math.max(0, t));
    const ex = x0 + t * dx - px;
    const ey = y0 + t * dy - py;
    const distSq = ex * ex + ey * ey;
    if (distSq < best) best = distSq;

    const cross = dx * (py - y0) - dy * (px - x0);
    if (y0 <= py && y1 > py && cross > 0) winding++;
    else if (y1 <= py && y0 > py && cross < 0) winding--;
  }

  const distance = Math.sqrt(best);
  return winding !== 0 ? distance : -distance;
}
